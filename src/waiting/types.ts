/**
 * Zero-argument check polled by the ConditionWaiter.
 * Should be side-effect free or idempotent.
 */
export type Predicate = () => boolean | Promise<boolean>;

export interface WaitOptions {
  /** Total time budget in milliseconds, > 0 */
  timeout: number;
  /** Delay between evaluations in milliseconds, > 0 */
  pollInterval: number;
  /** Label used in log lines */
  description?: string;
}

export type PollStatus = 'satisfied' | 'timed_out';

export interface PollOutcome {
  status: PollStatus;
  /** Number of predicate calls made */
  evaluations: number;
  elapsedMs: number;
}

export class WaitTimeoutError extends Error {
  constructor(message: string, public outcome: PollOutcome) {
    super(message);
    this.name = 'WaitTimeoutError';
  }
}
