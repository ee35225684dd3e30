/**
 * Line-oriented text exporter
 *
 * Each record becomes `[PASSED] <duration>s <name>`, the duration column present
 * only when durations are enabled.
 */

import { Chalk } from 'chalk';
import type { TestRecord } from '../record.js';
import { DURATION_WIDTH, formatSeconds } from './format.js';
import type { Sink } from './sink.js';
import type { RenderOptions, ResultExporter } from './types.js';

export const PASSED_TOKEN = 'PASSED';
export const FAILED_TOKEN = 'FAILED';

type Paint = (text: string) => string;

const plain: Paint = (text) => text;
const colored = new Chalk({ level: 1 });

/**
 * Format one record as a text line (without the trailing newline)
 */
export function formatTextLine(record: TestRecord, options: RenderOptions): string {
  const green: Paint = options.color ? colored.green : plain;
  const red: Paint = options.color ? colored.red : plain;

  const token = record.passed ? green(PASSED_TOKEN) : red(FAILED_TOKEN);
  const duration = options.durations
    ? `${formatSeconds(record.duration).padStart(DURATION_WIDTH)}s `
    : '';

  return `[${token}] ${duration}${record.name}`;
}

export class TextExporter implements ResultExporter {
  private readonly sink: Sink;
  private readonly options: RenderOptions;

  constructor(sink: Sink, options: RenderOptions) {
    this.sink = sink;
    this.options = options;
  }

  exportResults(records: readonly TestRecord[]): void {
    for (const record of records) {
      this.exportResult(record);
    }
  }

  exportResult(record: TestRecord): void {
    this.sink.write(`${formatTextLine(record, this.options)}\n`);
  }

  close(): void {
    this.sink.close();
  }

  flush(): Promise<void> {
    return this.sink.flush();
  }
}
