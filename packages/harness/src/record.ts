/**
 * Stored result of one test invocation
 */
export interface TestRecord {
  /** Display label given at registration */
  readonly name: string;
  readonly passed: boolean;
  /** Elapsed seconds for this invocation alone, 0 until measured */
  readonly duration: number;
  /** Reason attached to the outcome, if any */
  readonly reason?: string;
  /** Set only when the body threw something other than an outcome signal */
  readonly error?: Error;
}

export interface RecordSummary {
  total: number;
  passed: number;
  failed: number;
  /** Sum of test durations in seconds */
  duration: number;
}

/**
 * Record for a test that has not completed yet
 */
export function pendingRecord(name: string): TestRecord {
  return { name, passed: false, duration: 0 };
}

export function summarize(records: readonly TestRecord[]): RecordSummary {
  const passedCount = records.filter((r) => r.passed).length;
  return {
    total: records.length,
    passed: passedCount,
    failed: records.length - passedCount,
    duration: records.reduce((sum, r) => sum + r.duration, 0),
  };
}
