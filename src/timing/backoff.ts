export type BackoffStrategy = 'exponential' | 'linear' | 'constant';

export interface BackoffOptions {
  /** Base delay in milliseconds */
  delay: number;
  backoff?: BackoffStrategy;
  /** Upper bound for any single delay */
  maxDelay?: number;
  /** Random extra share of the delay, 0..1 */
  jitter?: number;
}

/**
 * Delay to wait after the given failed attempt (1-based) before the next one.
 */
export function computeBackoffDelay(
  attempt: number,
  { delay, backoff = 'constant', maxDelay = Infinity, jitter = 0 }: BackoffOptions,
  random: () => number = Math.random
): number {
  let next: number;

  switch (backoff) {
    case 'exponential':
      next = delay * Math.pow(2, attempt - 1);
      break;
    case 'linear':
      next = delay * attempt;
      break;
    case 'constant':
    default:
      next = delay;
  }

  if (jitter > 0) {
    next = next + next * jitter * random();
  }

  return Math.min(next, maxDelay);
}
