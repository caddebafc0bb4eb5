/**
 * Marks a failure as always worth another attempt, whatever the policy lists.
 */
export class RetryableError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'RetryableError';
  }
}

/**
 * Marks a failure that must never be retried.
 */
export class FatalError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'FatalError';
  }
}

/**
 * Thrown once every attempt failed with a retryable error.
 * `lastError` (also set as `cause`) is the failure of the final attempt.
 */
export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(message, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}
