/**
 * Outcome of a test body
 *
 * A body reports its outcome either by returning an `Outcome` or by throwing an
 * `OutcomeSignal` to unwind immediately. The engine folds both into an `Outcome`.
 */

export type OutcomeStatus = 'passed' | 'failed';

export interface Outcome {
  readonly status: OutcomeStatus;
  readonly reason?: string;
}

export function passed(reason?: string): Outcome {
  return reason === undefined ? { status: 'passed' } : { status: 'passed', reason };
}

export function failed(reason?: string): Outcome {
  return reason === undefined ? { status: 'failed' } : { status: 'failed', reason };
}

export function isOutcome(value: unknown): value is Outcome {
  if (typeof value !== 'object' || value === null || !('status' in value)) {
    return false;
  }
  return value.status === 'passed' || value.status === 'failed';
}

/**
 * Thrown to end the running test early with the carried outcome
 */
export class OutcomeSignal extends Error {
  readonly outcome: Outcome;

  constructor(outcome: Outcome) {
    super(outcome.reason ?? (outcome.status === 'passed' ? 'Test passed' : 'Test failed'));
    this.name = 'OutcomeSignal';
    this.outcome = outcome;
  }
}

/**
 * End the running test as passed
 */
export function pass(reason?: string): never {
  throw new OutcomeSignal(passed(reason));
}

/**
 * End the running test as failed
 */
export function fail(reason?: string): never {
  throw new OutcomeSignal(failed(reason));
}

/**
 * Raise the Failed signal for a failed outcome; passed outcomes return normally
 */
export function settle(outcome: Outcome): void {
  if (outcome.status === 'failed') {
    throw new OutcomeSignal(outcome);
  }
}
