/**
 * XML exporter
 *
 * Output shape:
 *
 * ```xml
 * <?xml version="1.0" encoding="utf-8"?>
 * <test-results>
 *   <test-case>
 *     <test result="passed" duration="0.0012" name="adds numbers"/>
 *   </test-case>
 * </test-results>
 * ```
 *
 * The prologue and root element open on construction and close once on close().
 */

import type { TestRecord } from '../record.js';
import { escapeXml, formatSeconds } from './format.js';
import type { Sink } from './sink.js';
import type { RenderOptions, ResultExporter } from './types.js';

const PROLOGUE = '<?xml version="1.0" encoding="utf-8"?>\n<test-results>\n';
const EPILOGUE = '</test-results>\n';
const INDENT = '  ';

/**
 * Format one record as a self-closing `<test/>` element
 */
export function formatTestElement(record: TestRecord, options: Pick<RenderOptions, 'durations'>): string {
  const result = record.passed ? 'passed' : 'failed';
  const duration = options.durations ? ` duration="${formatSeconds(record.duration)}"` : '';
  return `<test result="${result}"${duration} name="${escapeXml(record.name)}"/>`;
}

export class XmlExporter implements ResultExporter {
  private readonly sink: Sink;
  private readonly options: Pick<RenderOptions, 'durations'>;
  private isClosed = false;

  constructor(sink: Sink, options: Pick<RenderOptions, 'durations'>) {
    this.sink = sink;
    this.options = options;
    this.sink.write(PROLOGUE);
  }

  exportResults(records: readonly TestRecord[]): void {
    this.sink.write(`${INDENT}<test-case>\n`);
    for (const record of records) {
      this.exportResult(record);
    }
    this.sink.write(`${INDENT}</test-case>\n`);
  }

  exportResult(record: TestRecord): void {
    this.sink.write(`${INDENT}${INDENT}${formatTestElement(record, this.options)}\n`);
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    try {
      this.sink.write(EPILOGUE);
    } finally {
      this.sink.close();
    }
  }

  flush(): Promise<void> {
    return this.sink.flush();
  }
}
