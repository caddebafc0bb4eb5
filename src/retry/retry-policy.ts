import type { BackoffStrategy } from '../timing/backoff.js';

/**
 * Constructor of an error class. Matching is done with `instanceof`.
 */
export type ErrorKind = new (...args: never[]) => Error;

/**
 * Details of one failed attempt.
 */
export interface AttemptRecord {
  /** 1-based */
  attempt: number;
  error: unknown;
  /** True when no further attempt will follow */
  terminal: boolean;
}

export interface RetryPolicy {
  /** Total attempts, not retries. Must be >= 1 */
  maxAttempts: number;
  /** Milliseconds between attempts; never before the first or after the last */
  delayBetweenAttempts: number;
  /** Error classes that trigger another attempt */
  retryableErrorKinds: ReadonlyArray<ErrorKind>;
  /** Extra classification for errors that are not matched by class */
  isRetryable?: (error: unknown) => boolean;
  /** Defaults to 'constant' */
  backoff?: BackoffStrategy;
  maxDelay?: number;
  /** Random extra share of each delay, 0..1. Defaults to 0 */
  jitter?: number;
  onRetry?: (record: AttemptRecord) => void;
}

export function validateRetryPolicy(policy: RetryPolicy): void {
  const { maxAttempts, delayBetweenAttempts, maxDelay, jitter } = policy;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
  }
  if (!Number.isFinite(delayBetweenAttempts) || delayBetweenAttempts < 0) {
    throw new RangeError(`delayBetweenAttempts must be >= 0, got ${delayBetweenAttempts}`);
  }
  if (maxDelay !== undefined && (Number.isNaN(maxDelay) || maxDelay < 0)) {
    throw new RangeError(`maxDelay must be >= 0, got ${maxDelay}`);
  }
  if (jitter !== undefined && (!Number.isFinite(jitter) || jitter < 0 || jitter > 1)) {
    throw new RangeError(`jitter must be between 0 and 1, got ${jitter}`);
  }
}
