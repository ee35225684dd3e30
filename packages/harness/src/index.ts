/**
 * @trialrun/harness
 *
 * Register test bodies on a TestCase, run them in order, and export the records
 * as text or XML.
 *
 * @example
 * ```ts
 * const suite = new TestCase({ name: 'math' });
 * suite.register(() => assert(1 + 1 === 2), 'adds numbers');
 *
 * const hadFailure = await suite.run();
 * await withExporter({ format: 'text', target: { kind: 'console' }, durations: true }, (exporter) =>
 *   exporter.exportResults(suite.results()),
 * );
 * ```
 */

export {
  assert,
  assertNoException,
  assertSequenceEquals,
  assertSequenceInRange,
  check,
  checkNoException,
  checkSequenceEquals,
  checkSequenceInRange,
  deepEqual,
  naturalOrder,
  type Comparator,
  type Equality,
  type Orderable,
} from './assertions.js';
export {
  describeError,
  HarnessError,
  HarnessStateError,
  isLifecycleError,
  LifecycleError,
  SinkError,
  type LifecyclePhase,
} from './errors.js';
export * from './exporters/index.js';
export {
  fail,
  failed,
  isOutcome,
  OutcomeSignal,
  pass,
  passed,
  settle,
  type Outcome,
  type OutcomeStatus,
} from './outcome.js';
export { pendingRecord, summarize, type RecordSummary, type TestRecord } from './record.js';
export {
  isTestCase,
  TEST_CASE_BRAND,
  TestCase,
  type RunnableTestCase,
  type TestCaseOptions,
  type TestCaseStatus,
  type TestProcedure,
} from './test-case.js';
