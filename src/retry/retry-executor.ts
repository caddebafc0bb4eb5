/**
 * Retry execution
 * Runs a fallible operation up to a bounded number of attempts
 */

import { type IClock, systemClock } from '../timing/clock.js';
import { computeBackoffDelay } from '../timing/backoff.js';
import { type ILogger, describeError } from '../infra/logger.js';
import { FatalError, RetryableError, RetryExhaustedError } from './errors.js';
import { type AttemptRecord, type RetryPolicy, validateRetryPolicy } from './retry-policy.js';

export type Operation<T> = () => T | Promise<T>;

export class RetryExecutor {
  constructor(
    private logger?: ILogger,
    private clock: IClock = systemClock,
    private random: () => number = Math.random
  ) {}

  /**
   * Executes `operation` under `policy`.
   *
   * Attempts run strictly one after another. A non-retryable failure is rethrown
   * as-is on first occurrence; after the last retryable failure a
   * {@link RetryExhaustedError} wrapping it is thrown. The operation must be safe
   * to repeat, as nothing is rolled back between attempts.
   */
  async execute<T>(operation: Operation<T>, policy: RetryPolicy): Promise<T> {
    validateRetryPolicy(policy);
    const { maxAttempts } = policy;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const terminal = attempt >= maxAttempts;
        const retryable = this.isRetryableError(error, policy);

        if (!retryable) {
          this.logger?.debug('Non-retryable failure, not retrying', {
            attempt,
            error: describeError(error)
          });
          throw error;
        }

        const record: AttemptRecord = { attempt, error, terminal };

        if (terminal) {
          this.logger?.error(`Operation failed after ${maxAttempts} attempts`, error);
          throw new RetryExhaustedError(
            `Operation failed after ${maxAttempts} attempts: ${describeError(error)}`,
            maxAttempts,
            error
          );
        }

        const delay = computeBackoffDelay(
          attempt,
          {
            delay: policy.delayBetweenAttempts,
            backoff: policy.backoff,
            maxDelay: policy.maxDelay,
            jitter: policy.jitter
          },
          this.random
        );

        this.logger?.warn(`Attempt ${attempt}/${maxAttempts} failed, retrying`, {
          error: describeError(error),
          nextRetryIn: delay
        });

        policy.onRetry?.(record);

        await this.clock.sleep(delay);
      }
    }
  }

  /**
   * Marker classes win over the policy; otherwise the error must match a listed
   * kind or satisfy the policy's classifier.
   */
  isRetryableError(error: unknown, policy: RetryPolicy): boolean {
    if (error instanceof FatalError) {
      return false;
    }
    if (error instanceof RetryableError) {
      return true;
    }
    if (policy.retryableErrorKinds.some(ErrorType => error instanceof ErrorType)) {
      return true;
    }
    return policy.isRetryable?.(error) ?? false;
  }
}

export function createDefaultRetryExecutor(logger?: ILogger): RetryExecutor {
  return new RetryExecutor(logger);
}

/**
 * Wraps `fn` so every call runs through the executor with `policy`.
 */
export function withRetry<Args extends unknown[], R>(
  fn: (...args: Args) => R | Promise<R>,
  policy: RetryPolicy,
  executor: RetryExecutor = new RetryExecutor()
): (...args: Args) => Promise<R> {
  return (...args: Args) => executor.execute(() => fn(...args), policy);
}
