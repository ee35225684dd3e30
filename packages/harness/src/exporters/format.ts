/** Shared formatting for exporters */

export const DURATION_PRECISION = 4;
export const DURATION_WIDTH = 8;

/**
 * Seconds with a fixed number of decimals, e.g. `0.6661`
 */
export function formatSeconds(seconds: number): string {
  return seconds.toFixed(DURATION_PRECISION);
}

/**
 * Escape characters for XML attribute values.
 *
 * Escapes & < > " ' and the whitespace an attribute would otherwise normalize
 * (tab, LF, CR) as character references. Other C0 controls and U+FFFE/U+FFFF are
 * not allowed in XML 1.0 at all and become U+FFFD.
 */
const escapeMap: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
  '\t': '&#9;',
  '\n': '&#10;',
  '\r': '&#13;',
};

const escapeRegex = /[&<>"'\t\n\r]/g;
const disallowedRegex = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

const REPLACEMENT_CHARACTER = '\uFFFD';

export function escapeXml(value: string): string {
  return value
    .replace(disallowedRegex, REPLACEMENT_CHARACTER)
    .replace(escapeRegex, (char) => escapeMap[char] ?? char);
}
