/**
 * Interval tree types.
 *
 * Intervals are closed: a point equal to `start` or `end` is contained.
 */

/**
 * A closed interval [start, end] carrying an opaque payload.
 */
export interface Interval<T> {
  readonly start: number;
  readonly end: number;
  readonly payload: T;
}

/**
 * Payload identity used when matching entries for removal.
 */
export type PayloadEquals<T> = (a: T, b: T) => boolean;

/**
 * Options for creating an IntervalTree.
 */
export interface IntervalTreeOptions<T> {
  /** Payload identity for remove/contains (default: Object.is) */
  equals?: PayloadEquals<T>;
}

/**
 * Error codes for interval tree failures.
 */
export enum IntervalErrorCode {
  INVALID_INTERVAL = 'INVALID_INTERVAL'
}

/**
 * Error thrown when an interval cannot be indexed.
 */
export class IntervalError extends Error {
  constructor(
    message: string,
    public readonly code: IntervalErrorCode,
    public readonly details?: { start: number; end: number }
  ) {
    super(message);
    this.name = 'IntervalError';
  }
}

/**
 * Build a validated interval. Throws IntervalError when start > end or
 * either bound is NaN.
 */
export function createInterval<T>(start: number, end: number, payload: T): Interval<T> {
  if (!(start <= end)) {
    throw new IntervalError(
      `Invalid interval [${start}, ${end}]: start must be <= end`,
      IntervalErrorCode.INVALID_INTERVAL,
      { start, end }
    );
  }
  return { start, end, payload };
}
