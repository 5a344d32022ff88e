import type { NumericArray } from '../types';

/**
 * Decoded outcome samples of a completed job.
 *
 * Remote results are always sample-only, so `isStateful` is false for anything
 * produced by a Connection.
 */
export class Result {
  readonly samples: NumericArray;
  readonly shape: readonly number[];
  readonly isStateful: boolean;

  constructor(samples: NumericArray, shape: readonly number[], isStateful = false) {
    this.samples = deepFreeze(samples);
    this.shape = Object.freeze([...shape]);
    this.isStateful = isStateful;
    Object.freeze(this);
  }

  equals(other: Result): boolean {
    return (
      this.isStateful === other.isStateful &&
      this.shape.length === other.shape.length &&
      this.shape.every((dim, i) => dim === other.shape[i]) &&
      samplesEqual(this.samples, other.samples)
    );
  }

  toString(): string {
    return `<Result: shots=${this.shape[0] ?? 0}, isStateful=${this.isStateful}>`;
  }
}

function samplesEqual(a: NumericArray, b: NumericArray): boolean {
  if (typeof a === 'number' || typeof b === 'number') {
    return Object.is(a, b);
  }
  return a.length === b.length && a.every((item, i) => samplesEqual(item, b[i]));
}

function deepFreeze(value: NumericArray): NumericArray {
  if (Array.isArray(value)) {
    value.forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}
