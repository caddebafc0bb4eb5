import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RetryExecutor, createDefaultRetryExecutor, withRetry } from '../retry-executor.js';
import { FatalError, RetryableError, RetryExhaustedError } from '../errors.js';
import type { RetryPolicy } from '../retry-policy.js';
import type { IClock } from '../../timing/clock.js';
import type { ILogger } from '../../infra/logger.js';

class ConnectionError extends Error {
  constructor(message = 'connection reset') {
    super(message);
    this.name = 'ConnectionError';
  }
}

class ValidationError extends Error {
  constructor(message = 'invalid payload') {
    super(message);
    this.name = 'ValidationError';
  }
}

function policy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 3,
    delayBetweenAttempts: 100,
    retryableErrorKinds: [ConnectionError],
    ...overrides
  };
}

/** Clock that records requested sleeps without waiting */
function recordingClock(): IClock & { sleeps: number[] } {
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => 0,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    }
  };
}

describe('RetryExecutor', () => {
  let executor: RetryExecutor;

  beforeEach(() => {
    executor = new RetryExecutor();
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('execute', () => {
    it('should succeed on first attempt', async () => {
      const operation = vi.fn().mockResolvedValue('success');

      const result = await executor.execute(operation, policy());

      expect(result).toBe('success');
      expect(operation).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should accept synchronous operations', async () => {
      const result = await executor.execute(() => 42, policy());

      expect(result).toBe(42);
    });

    it('should return the result of the attempt that succeeds', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(new ConnectionError())
        .mockRejectedValueOnce(new ConnectionError())
        .mockResolvedValueOnce('third time');

      const promise = executor.execute(operation, policy({ maxAttempts: 5 }));
      await vi.runAllTimersAsync();

      await expect(promise).resolves.toBe('third time');
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should raise RetryExhaustedError after exactly maxAttempts retryable failures', async () => {
      const lastFailure = new ConnectionError('third failure');
      const operation = vi.fn()
        .mockRejectedValueOnce(new ConnectionError())
        .mockRejectedValueOnce(new ConnectionError())
        .mockRejectedValueOnce(lastFailure);
      const start = Date.now();

      const promise = executor.execute(operation, policy());
      const settled = promise.catch((err: unknown) => err);
      await vi.runAllTimersAsync();
      const error = await settled;

      expect(operation).toHaveBeenCalledTimes(3);
      expect(Date.now() - start).toBe(200);
      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(error).toMatchObject({
        attempts: 3,
        lastError: lastFailure,
        cause: lastFailure,
        message: 'Operation failed after 3 attempts: third failure'
      });
    });

    it('should propagate a non-retryable error unchanged after one call', async () => {
      const failure = new ValidationError();
      const operation = vi.fn().mockRejectedValue(failure);

      const promise = executor.execute(operation, policy());

      await expect(promise).rejects.toBe(failure);
      expect(operation).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should rethrow non-Error values that are not retryable', async () => {
      const operation = vi.fn().mockRejectedValue('plain string');

      await expect(executor.execute(operation, policy())).rejects.toBe('plain string');
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should stop retrying when a later attempt fails with a non-retryable error', async () => {
      const failure = new ValidationError('rejected on retry');
      const operation = vi.fn()
        .mockRejectedValueOnce(new ConnectionError())
        .mockRejectedValueOnce(failure);

      const promise = executor.execute(operation, policy({ maxAttempts: 5 }));
      const settled = promise.catch((err: unknown) => err);
      await vi.runAllTimersAsync();

      expect(await settled).toBe(failure);
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should wrap a single retryable failure when maxAttempts is 1', async () => {
      const operation = vi.fn().mockRejectedValue(new ConnectionError());

      const error = await executor.execute(operation, policy({ maxAttempts: 1 })).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(operation).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should never run attempts concurrently', async () => {
      let active = 0;
      let maxActive = 0;
      const operation = vi.fn(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise(resolve => setTimeout(resolve, 50));
        active--;
        throw new ConnectionError();
      });

      const promise = executor.execute(operation, policy({ delayBetweenAttempts: 0 }));
      const settled = promise.catch((err: unknown) => err);
      await vi.runAllTimersAsync();

      expect(await settled).toBeInstanceOf(RetryExhaustedError);
      expect(operation).toHaveBeenCalledTimes(3);
      expect(maxActive).toBe(1);
    });

    it('should reject an invalid policy before calling the operation', async () => {
      const operation = vi.fn().mockResolvedValue('never');

      await expect(executor.execute(operation, policy({ maxAttempts: 0 }))).rejects.toThrow(RangeError);
      await expect(executor.execute(operation, policy({ delayBetweenAttempts: -1 }))).rejects.toThrow(RangeError);
      await expect(executor.execute(operation, policy({ jitter: 2 }))).rejects.toThrow(RangeError);
      expect(operation).not.toHaveBeenCalled();
    });
  });

  describe('delays', () => {
    it('should sleep only between attempts', async () => {
      const clock = recordingClock();
      const timed = new RetryExecutor(undefined, clock);
      const operation = vi.fn().mockRejectedValue(new ConnectionError());

      await expect(timed.execute(operation, policy())).rejects.toBeInstanceOf(RetryExhaustedError);

      expect(clock.sleeps).toEqual([100, 100]);
    });

    it('should use exponential backoff capped at maxDelay', async () => {
      const clock = recordingClock();
      const timed = new RetryExecutor(undefined, clock);
      const operation = vi.fn().mockRejectedValue(new ConnectionError());

      await expect(
        timed.execute(operation, policy({ maxAttempts: 5, backoff: 'exponential', maxDelay: 500 }))
      ).rejects.toBeInstanceOf(RetryExhaustedError);

      expect(clock.sleeps).toEqual([100, 200, 400, 500]);
    });

    it('should apply jitter from the injected random source', async () => {
      const clock = recordingClock();
      const timed = new RetryExecutor(undefined, clock, () => 0.5);
      const operation = vi.fn()
        .mockRejectedValueOnce(new ConnectionError())
        .mockResolvedValueOnce('ok');

      await timed.execute(operation, policy({ jitter: 0.2 }));

      expect(clock.sleeps).toEqual([110]);
    });
  });

  describe('error classification', () => {
    it('should always retry RetryableError', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(new RetryableError('temp error'))
        .mockResolvedValueOnce('success');

      const promise = executor.execute(operation, policy({ retryableErrorKinds: [] }));
      await vi.runAllTimersAsync();

      await expect(promise).resolves.toBe('success');
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should never retry FatalError even when Error is listed', async () => {
      const operation = vi.fn().mockRejectedValue(new FatalError('fatal'));

      await expect(
        executor.execute(operation, policy({ retryableErrorKinds: [Error] }))
      ).rejects.toThrow('fatal');
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should match subclasses of a listed kind', () => {
      class SocketTimeoutError extends ConnectionError {}

      expect(executor.isRetryableError(new SocketTimeoutError(), policy())).toBe(true);
      expect(executor.isRetryableError(new ValidationError(), policy())).toBe(false);
    });

    it('should consult the isRetryable classifier', async () => {
      const isRetryable = vi.fn((error: unknown) => error instanceof Error && /503/.test(error.message));
      const operation = vi.fn()
        .mockRejectedValueOnce(new Error('upstream returned 503'))
        .mockResolvedValueOnce('recovered');

      const promise = executor.execute(operation, policy({ retryableErrorKinds: [], isRetryable }));
      await vi.runAllTimersAsync();

      await expect(promise).resolves.toBe('recovered');
      expect(isRetryable).toHaveBeenCalledTimes(1);
    });
  });

  describe('hooks and logging', () => {
    it('should call onRetry before each retry with the attempt record', async () => {
      const onRetry = vi.fn();
      const first = new ConnectionError('first');
      const second = new ConnectionError('second');
      const operation = vi.fn()
        .mockRejectedValueOnce(first)
        .mockRejectedValueOnce(second)
        .mockResolvedValueOnce('done');

      const promise = executor.execute(operation, policy({ onRetry }));
      await vi.runAllTimersAsync();
      await promise;

      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenNthCalledWith(1, { attempt: 1, error: first, terminal: false });
      expect(onRetry).toHaveBeenNthCalledWith(2, { attempt: 2, error: second, terminal: false });
    });

    it('should log each retry and the final failure', async () => {
      const logger = {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
      } satisfies ILogger;
      const logged = new RetryExecutor(logger);
      const failure = new ConnectionError('down');
      const operation = vi.fn().mockRejectedValue(failure);

      const settled = logged.execute(operation, policy({ maxAttempts: 2 })).catch((err: unknown) => err);
      await vi.runAllTimersAsync();
      await settled;

      expect(logger.warn).toHaveBeenCalledWith('Attempt 1/2 failed, retrying', {
        error: 'down',
        nextRetryIn: 100
      });
      expect(logger.error).toHaveBeenCalledWith('Operation failed after 2 attempts', failure);
    });
  });
});

describe('withRetry', () => {
  it('should forward arguments and retry the wrapped function', async () => {
    const fetchBalance = vi.fn()
      .mockRejectedValueOnce(new ConnectionError())
      .mockResolvedValueOnce(1500);
    const clock = recordingClock();

    const resilient = withRetry(
      (accountId: string) => fetchBalance(accountId),
      policy(),
      new RetryExecutor(undefined, clock)
    );

    await expect(resilient('13344')).resolves.toBe(1500);
    expect(fetchBalance).toHaveBeenCalledTimes(2);
    expect(fetchBalance).toHaveBeenCalledWith('13344');
    expect(clock.sleeps).toEqual([100]);
  });
});

describe('factory functions', () => {
  it('should create default retry executor', () => {
    expect(createDefaultRetryExecutor()).toBeInstanceOf(RetryExecutor);
  });
});
