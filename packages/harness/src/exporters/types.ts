import type { TestRecord } from '../record.js';

/**
 * Renders test records to a sink
 */
export interface ResultExporter {
  /** Render one test case's records as a batch */
  exportResults(records: readonly TestRecord[]): void;
  /** Render a single record */
  exportResult(record: TestRecord): void;
  /** Write any closing framing and release an owned sink. Idempotent. */
  close(): void;
  /** Wait until written output has reached its target */
  flush(): Promise<void>;
}

export interface RenderOptions {
  /** Include each test's duration */
  durations: boolean;
  /** Colour the PASSED/FAILED token (text only) */
  color: boolean;
}
