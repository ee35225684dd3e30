import { describe, expect, it } from 'vitest';
import {
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
  OutcomeSignal,
  pass,
} from '../src/index.js';

function signalOf(procedure: () => void): OutcomeSignal | undefined {
  try {
    procedure();
  } catch (error) {
    if (error instanceof OutcomeSignal) return error;
    throw error;
  }
  return undefined;
}

describe('assert', () => {
  it('returns normally when the condition holds', () => {
    expect(signalOf(() => assert(true === !false))).toBeUndefined();
  });

  it('raises the failed signal when the condition is false', () => {
    const signal = signalOf(() => assert(false, 'values differ'));

    expect(signal?.outcome).toEqual({ status: 'failed', reason: 'values differ' });
  });

  it('uses a default reason', () => {
    expect(check(false)).toEqual({ status: 'failed', reason: 'Assertion failed' });
    expect(check(true)).toEqual({ status: 'passed' });
  });
});

describe('assertNoException', () => {
  it('passes when the procedure completes', () => {
    expect(checkNoException(() => {})).toEqual({ status: 'passed' });
  });

  it('fails when the procedure throws', () => {
    expect(
      checkNoException(() => {
        throw new Error('boom');
      }),
    ).toEqual({ status: 'failed', reason: 'Unexpected exception: boom' });
  });

  it('converts outcome signals raised inside into a failure', () => {
    expect(checkNoException(() => pass('early'))).toEqual({
      status: 'failed',
      reason: 'Unexpected passed signal: early',
    });
  });

  it('raises the failed signal', () => {
    const signal = signalOf(() =>
      assertNoException(() => {
        throw new Error('boom');
      }),
    );

    expect(signal?.outcome.status).toBe('failed');
  });
});

describe('assertSequenceEquals', () => {
  it('passes for equal sequences', () => {
    expect(signalOf(() => assertSequenceEquals([1, 2, 3, 4, 5], [1, 2, 3, 4, 5]))).toBeUndefined();
  });

  it('fails at the first differing element', () => {
    expect(checkSequenceEquals([1, 2, 3, 4, 5], [1, 2, 3, 4, 6])).toEqual({
      status: 'failed',
      reason: 'Sequences differ at index 4: 5 !== 6',
    });
    expect(signalOf(() => assertSequenceEquals([1, 2, 3, 4, 5], [1, 2, 3, 4, 6]))?.outcome.status).toBe(
      'failed',
    );
  });

  it('fails when lengths differ', () => {
    expect(checkSequenceEquals([1, 2, 3, 4], [1, 2, 3, 4, 5])).toEqual({
      status: 'failed',
      reason: 'Sequence lengths differ: 4 !== 5',
    });
  });

  it('treats empty sequences as equal', () => {
    expect(checkSequenceEquals([], [])).toEqual({ status: 'passed' });
  });

  it('compares by value, not identity', () => {
    expect(checkSequenceEquals([{ id: 1 }, [2, 3]], [{ id: 1 }, [2, 3]])).toEqual({ status: 'passed' });
  });

  it('accepts any iterable', () => {
    expect(checkSequenceEquals('abc', ['a', 'b', 'c'])).toEqual({ status: 'passed' });
    expect(checkSequenceEquals(new Set([1, 2]), new Uint8Array([1, 2]))).toEqual({ status: 'passed' });
  });

  it('uses a caller-supplied equality', () => {
    const sameLetter = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

    expect(checkSequenceEquals(['A', 'b'], ['a', 'B'], sameLetter)).toEqual({ status: 'passed' });
  });
});

describe('assertSequenceInRange', () => {
  it('passes when every element is in range', () => {
    expect(signalOf(() => assertSequenceInRange('abcdefghijklmnopqrstuvwxyz', 'a', 'z'))).toBeUndefined();
  });

  it('fails on the final out-of-range element', () => {
    expect(checkSequenceInRange('abcdefghijklmnopqrstuvwxy1', 'a', 'z')).toEqual({
      status: 'failed',
      reason: 'Element at index 25 is out of range ["a", "z"]: "1"',
    });
  });

  it('is inclusive at both bounds', () => {
    expect(checkSequenceInRange([0, 5, 10], 0, 10)).toEqual({ status: 'passed' });
    expect(checkSequenceInRange([11], 0, 10).status).toBe('failed');
  });

  it('treats an empty sequence as in range', () => {
    expect(checkSequenceInRange([], 0, 1)).toEqual({ status: 'passed' });
  });

  it('treats NaN as out of range', () => {
    expect(checkSequenceInRange([1, Number.NaN], 0, 10)).toEqual({
      status: 'failed',
      reason: 'Element at index 1 is out of range [0, 10]: null',
    });
  });

  it('uses a caller-supplied comparator', () => {
    const byLength = (a: string, b: string) => a.length - b.length;

    expect(checkSequenceInRange(['ab', 'abc'], 'xx', 'yyy', byLength)).toEqual({ status: 'passed' });
    expect(checkSequenceInRange(['abcd'], 'xx', 'yyy', byLength).status).toBe('failed');
  });

  it('raises the failed signal', () => {
    expect(signalOf(() => assertSequenceInRange([1, 2, 30], 1, 10))?.outcome.reason).toBe(
      'Element at index 2 is out of range [1, 10]: 30',
    );
  });
});

describe('deepEqual', () => {
  it('compares nested structures', () => {
    expect(deepEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true);
    expect(deepEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(deepEqual([1], { 0: 1 })).toBe(false);
    expect(deepEqual(new Date(5), new Date(5))).toBe(true);
    expect(deepEqual(Number.NaN, Number.NaN)).toBe(true);
  });
});

describe('naturalOrder', () => {
  it('orders numbers, bigints, strings and dates', () => {
    expect(naturalOrder(1, 2)).toBe(-1);
    expect(naturalOrder(2n, 1n)).toBe(1);
    expect(naturalOrder('b', 'b')).toBe(0);
    expect(naturalOrder(new Date(1), new Date(2))).toBe(-1);
  });

  it('returns NaN for mixed types', () => {
    expect(naturalOrder(1, '1')).toBeNaN();
  });
});
