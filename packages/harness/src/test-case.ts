/**
 * Test case engine
 *
 * Owns an ordered list of registered test bodies, runs them one at a time between
 * a single setup() and cleanup(), and keeps one record per registered test.
 */

import type { Logger } from '@trialrun/logger';
import { describeError, HarnessStateError, LifecycleError, toError } from './errors.js';
import {
  fail as failSignal,
  isOutcome,
  OutcomeSignal,
  pass as passSignal,
  passed,
  failed,
  type Outcome,
} from './outcome.js';
import { pendingRecord, summarize, type TestRecord } from './record.js';

/**
 * A test body. It may return an `Outcome`, throw an `OutcomeSignal`, or simply
 * return to pass.
 */
export type TestProcedure = () => void | Outcome | Promise<void | Outcome>;

export type TestCaseStatus = 'idle' | 'running' | 'completed';

/**
 * Marks test cases across copies of this package, so a runner bundled with one
 * copy still recognises instances created by another.
 */
export const TEST_CASE_BRAND: unique symbol = Symbol.for('trialrun.TestCase');

/**
 * What a runner needs from a test case
 */
export interface RunnableTestCase {
  readonly name: string;
  run(): Promise<boolean>;
  results(): readonly TestRecord[];
}

/**
 * Whether `value` is a test case, from this copy of the package or another one
 */
export function isTestCase(value: unknown): value is RunnableTestCase {
  if (typeof value !== 'object' || value === null) return false;
  return (
    Reflect.get(value, TEST_CASE_BRAND) === true &&
    typeof Reflect.get(value, 'name') === 'string' &&
    typeof Reflect.get(value, 'run') === 'function' &&
    typeof Reflect.get(value, 'results') === 'function'
  );
}

export interface TestCaseOptions {
  /** Display name, defaults to the class name */
  name?: string;
  logger?: Logger;
}

interface RegisteredTest {
  procedure: TestProcedure;
  name: string;
}

export class TestCase implements RunnableTestCase {
  readonly [TEST_CASE_BRAND] = true;
  readonly name: string;
  protected readonly logger?: Logger;

  private readonly tests: RegisteredTest[] = [];
  private records: TestRecord[] = [];
  private state: TestCaseStatus = 'idle';

  constructor(options: TestCaseOptions = {}) {
    this.name = options.name ?? this.constructor.name;
    this.logger = options.logger?.child({ test_case: this.name });
  }

  get status(): TestCaseStatus {
    return this.state;
  }

  /**
   * Runs once before the first test. Override to prepare shared state.
   */
  protected setup(): void | Promise<void> {}

  /**
   * Runs once after the last test, even when setup() failed.
   */
  protected cleanup(): void | Promise<void> {}

  /**
   * Schedule a test. Registration order is execution order.
   */
  register(procedure: TestProcedure, name: string): void {
    if (this.state === 'running') {
      throw new HarnessStateError(`Cannot register '${name}' while '${this.name}' is running`);
    }
    this.tests.push({ procedure, name });
  }

  /**
   * End the running test as passed
   */
  pass(reason?: string): never {
    return passSignal(reason);
  }

  /**
   * End the running test as failed
   */
  fail(reason?: string): never {
    return failSignal(reason);
  }

  /**
   * Records of the latest run, in registration order
   */
  results(): readonly TestRecord[] {
    return [...this.records];
  }

  /**
   * Run every registered test and replace the stored records.
   *
   * @returns true if any test failed
   * @throws {LifecycleError} If setup() or cleanup() throws
   * @throws {HarnessStateError} If a run is already in progress
   */
  async run(): Promise<boolean> {
    if (this.state === 'running') {
      throw new HarnessStateError(`'${this.name}' is already running`);
    }

    this.state = 'running';
    const tests = [...this.tests];
    this.records = tests.map((test) => pendingRecord(test.name));
    this.logger?.debug('run_started', { tests: tests.length });

    let hadFailure = false;
    let lifecycleError: LifecycleError | undefined;

    try {
      await this.setup();
    } catch (error) {
      lifecycleError = new LifecycleError('setup', this.name, error);
    }

    if (!lifecycleError) {
      for (let i = 0; i < tests.length; i++) {
        const record = await this.execute(tests[i]);
        this.records[i] = record;
        if (!record.passed) hadFailure = true;
      }
    }

    try {
      await this.cleanup();
    } catch (error) {
      if (lifecycleError) {
        this.logger?.error('cleanup_failed', { error: toError(error) });
      } else {
        lifecycleError = new LifecycleError('cleanup', this.name, error);
      }
    }

    this.state = 'completed';

    if (lifecycleError) {
      throw lifecycleError;
    }

    const summary = summarize(this.records);
    this.logger?.info('run_completed', {
      passed: summary.passed,
      failed: summary.failed,
      duration: summary.duration,
    });

    return hadFailure;
  }

  private async execute(test: RegisteredTest): Promise<TestRecord> {
    let outcome: Outcome;
    let fault: Error | undefined;

    const startedAt = performance.now();
    try {
      const returned = await test.procedure();
      outcome = isOutcome(returned) ? returned : passed();
    } catch (error) {
      if (error instanceof OutcomeSignal) {
        outcome = error.outcome;
      } else {
        fault = toError(error);
        outcome = failed(`Unexpected exception: ${describeError(error)}`);
      }
    }
    const duration = (performance.now() - startedAt) / 1000;

    if (fault) {
      this.logger?.warn('test_fault', { test: test.name, error: fault });
    }
    this.logger?.debug('test_finished', { test: test.name, status: outcome.status, duration });

    return {
      name: test.name,
      passed: outcome.status === 'passed',
      duration,
      ...(outcome.reason !== undefined && { reason: outcome.reason }),
      ...(fault && { error: fault }),
    };
  }
}
