/**
 * Condition polling
 * Repeatedly evaluates a predicate until it holds or a deadline passes
 */

import { type IClock, systemClock } from '../timing/clock.js';
import { Deadline } from '../timing/deadline.js';
import { type ILogger, describeError } from '../infra/logger.js';
import { type PollOutcome, type Predicate, type WaitOptions, WaitTimeoutError } from './types.js';

export class ConditionWaiter {
  constructor(
    private logger?: ILogger,
    private clock: IClock = systemClock
  ) {}

  /**
   * Polls `predicate` every `pollInterval` ms until it returns true or `timeout` ms pass.
   *
   * A predicate that throws counts as "not satisfied yet". Timing out is a normal
   * outcome and is returned, not thrown.
   */
  async waitUntil(predicate: Predicate, options: WaitOptions): Promise<PollOutcome> {
    if (typeof predicate !== 'function') {
      throw new TypeError('waitUntil requires a predicate function');
    }
    const { timeout, pollInterval, description = 'condition' } = options;
    if (!Number.isFinite(pollInterval) || pollInterval <= 0) {
      throw new RangeError(`Poll interval must be a positive number of milliseconds, got ${pollInterval}`);
    }

    const deadline = Deadline.after(timeout, this.clock);
    let evaluations = 0;

    for (;;) {
      evaluations++;
      try {
        if (await predicate()) {
          this.logger?.debug(`Condition met: ${description}`, {
            evaluations,
            elapsedMs: deadline.elapsed()
          });
          return { status: 'satisfied', evaluations, elapsedMs: deadline.elapsed() };
        }
      } catch (error) {
        this.logger?.debug(`Condition check failed: ${description}`, {
          evaluation: evaluations,
          error: describeError(error)
        });
      }

      const remaining = deadline.remaining();
      if (remaining > pollInterval) {
        await this.clock.sleep(pollInterval);
        continue;
      }

      // No room for another poll before the deadline: run out the clock without evaluating again
      while (!deadline.isExpired()) {
        await this.clock.sleep(deadline.remaining());
      }

      const elapsedMs = deadline.elapsed();
      this.logger?.warn(`Condition not met within ${timeout}ms: ${description}`, {
        evaluations,
        elapsedMs
      });
      return { status: 'timed_out', evaluations, elapsedMs };
    }
  }

  /**
   * Like {@link waitUntil}, but throws {@link WaitTimeoutError} when the deadline passes.
   */
  async waitFor(predicate: Predicate, options: WaitOptions): Promise<PollOutcome> {
    const outcome = await this.waitUntil(predicate, options);
    if (outcome.status === 'timed_out') {
      throw new WaitTimeoutError(
        `Timed out after ${outcome.elapsedMs}ms waiting for ${options.description ?? 'condition'}`,
        outcome
      );
    }
    return outcome;
  }
}

export function createDefaultConditionWaiter(logger?: ILogger): ConditionWaiter {
  return new ConditionWaiter(logger);
}
