/**
 * Error types for the harness
 *
 * Outcome signals are not errors in this sense: they never leave `run()`.
 * Everything here is meant to reach the caller.
 */

/**
 * Base class for harness errors
 */
export abstract class HarnessError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when the engine is used outside its lifecycle (e.g. registering mid-run)
 */
export class HarnessStateError extends HarnessError {
  constructor(message: string) {
    super(message);
  }
}

export type LifecyclePhase = 'setup' | 'cleanup';

/**
 * Thrown when a setup() or cleanup() hook fails
 */
export class LifecycleError extends HarnessError {
  readonly phase: LifecyclePhase;
  readonly testCase: string;

  constructor(phase: LifecyclePhase, testCase: string, cause: unknown) {
    super(`${phase} failed for test case '${testCase}': ${describeError(cause)}`, { cause });
    this.phase = phase;
    this.testCase = testCase;
  }
}

/**
 * Recognises a LifecycleError by shape, including one thrown by another copy of
 * this package
 */
export function isLifecycleError(value: unknown): value is LifecycleError {
  if (!(value instanceof Error) || value.name !== 'LifecycleError') return false;
  const phase = Reflect.get(value, 'phase');
  return (phase === 'setup' || phase === 'cleanup') && typeof Reflect.get(value, 'testCase') === 'string';
}

/**
 * Thrown when an exporter sink cannot be opened, written or closed
 */
export class SinkError extends HarnessError {
  /** File path of the sink, when it owns a file */
  readonly path: string | null;

  constructor(message: string, path: string | null = null, cause?: unknown) {
    const fullMessage = path ? `${message} (${path})` : message;
    super(cause === undefined ? fullMessage : `${fullMessage}: ${describeError(cause)}`, { cause });
    this.path = path;
  }
}

/**
 * Render an arbitrary thrown value as a one-line message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
