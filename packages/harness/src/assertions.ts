/**
 * Assertion primitives
 *
 * Each `check*` function returns an `Outcome`; the matching `assert*` function
 * raises the Failed signal when that outcome is failed. Checks stop at the first
 * violation.
 */

import { describeError } from './errors.js';
import { failed, OutcomeSignal, passed, settle, type Outcome } from './outcome.js';

export type Equality<T> = (a: T, b: T) => boolean;

/**
 * Ordering function: negative, zero or positive like `Array.prototype.sort`.
 * `NaN` means the values are incomparable.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Values ordered by `naturalOrder`
 */
export type Orderable = number | bigint | string | Date;

/**
 * Structural equality: primitives by value, arrays by element, plain objects by key
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Number.isNaN(a) && Number.isNaN(b)) return true;
  if (a === null || b === null) return false;
  if (typeof a !== typeof b) return false;

  if (typeof a === 'object' && typeof b === 'object') {
    if (a instanceof Date && b instanceof Date) {
      return a.getTime() === b.getTime();
    }

    if (Array.isArray(a) && Array.isArray(b)) {
      if (a.length !== b.length) return false;
      return a.every((item, i) => deepEqual(item, b[i]));
    }

    if (Array.isArray(a) || Array.isArray(b)) return false;

    const aEntries = Object.entries(a);
    const bKeys = Object.keys(b);

    if (aEntries.length !== bKeys.length) return false;
    return aEntries.every(
      ([key, value]) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(value, Reflect.get(b, key)),
    );
  }

  return false;
}

function order(lower: boolean, higher: boolean, same: boolean): number {
  if (lower) return -1;
  if (higher) return 1;
  return same ? 0 : Number.NaN;
}

/**
 * Natural ordering of numbers, bigints, strings and dates.
 * Mixed or unsupported types compare as `NaN`.
 */
export function naturalOrder(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return order(a < b, a > b, a === b);
  if (typeof a === 'bigint' && typeof b === 'bigint') return order(a < b, a > b, a === b);
  if (typeof a === 'string' && typeof b === 'string') return order(a < b, a > b, a === b);
  if (a instanceof Date && b instanceof Date) {
    return order(a.getTime() < b.getTime(), a.getTime() > b.getTime(), a.getTime() === b.getTime());
  }
  return Number.NaN;
}

function describeValue(value: unknown): string {
  if (typeof value === 'bigint') return `${value}n`;
  if (value === undefined) return 'undefined';
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // Circular structures
    return String(value);
  }
}

export function check(condition: boolean, message?: string): Outcome {
  return condition ? passed() : failed(message ?? 'Assertion failed');
}

export function checkNoException(procedure: () => void): Outcome {
  try {
    procedure();
    return passed();
  } catch (error) {
    if (error instanceof OutcomeSignal) {
      return failed(`Unexpected ${error.outcome.status} signal: ${error.message}`);
    }
    return failed(`Unexpected exception: ${describeError(error)}`);
  }
}

export function checkSequenceEquals<T>(
  actual: Iterable<T>,
  expected: Iterable<T>,
  equals: Equality<T> = deepEqual,
): Outcome {
  const a = Array.from(actual);
  const b = Array.from(expected);

  if (a.length !== b.length) {
    return failed(`Sequence lengths differ: ${a.length} !== ${b.length}`);
  }

  for (let i = 0; i < a.length; i++) {
    if (!equals(a[i], b[i])) {
      return failed(`Sequences differ at index ${i}: ${describeValue(a[i])} !== ${describeValue(b[i])}`);
    }
  }

  return passed();
}

export function checkSequenceInRange<T extends Orderable>(sequence: Iterable<T>, min: T, max: T): Outcome;
export function checkSequenceInRange<T>(
  sequence: Iterable<T>,
  min: T,
  max: T,
  compare: Comparator<T>,
): Outcome;
export function checkSequenceInRange<T>(
  sequence: Iterable<T>,
  min: T,
  max: T,
  compare: Comparator<T> = naturalOrder,
): Outcome {
  let index = 0;
  for (const item of sequence) {
    // NaN fails both comparisons, so incomparable values are out of range
    if (!(compare(item, min) >= 0 && compare(item, max) <= 0)) {
      return failed(
        `Element at index ${index} is out of range [${describeValue(min)}, ${describeValue(max)}]: ${describeValue(item)}`,
      );
    }
    index++;
  }
  return passed();
}

/**
 * Fail the running test unless `condition` holds
 */
export function assert(condition: boolean, message?: string): void {
  settle(check(condition, message));
}

/**
 * Fail the running test if `procedure` throws anything, outcome signals included
 */
export function assertNoException(procedure: () => void): void {
  settle(checkNoException(procedure));
}

/**
 * Fail the running test unless both sequences hold equal elements in the same order
 */
export function assertSequenceEquals<T>(
  actual: Iterable<T>,
  expected: Iterable<T>,
  equals: Equality<T> = deepEqual,
): void {
  settle(checkSequenceEquals(actual, expected, equals));
}

/**
 * Fail the running test unless every element lies within `[min, max]`
 */
export function assertSequenceInRange<T extends Orderable>(sequence: Iterable<T>, min: T, max: T): void;
export function assertSequenceInRange<T>(sequence: Iterable<T>, min: T, max: T, compare: Comparator<T>): void;
export function assertSequenceInRange<T>(
  sequence: Iterable<T>,
  min: T,
  max: T,
  compare: Comparator<T> = naturalOrder,
): void {
  settle(checkSequenceInRange(sequence, min, max, compare));
}
