/**
 * Time source shared by the wait and retry loops.
 * Inject a custom clock to drive them from tests or a virtual timeline.
 */
export interface IClock {
  /** Current time in milliseconds */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));
}

export class SystemClock implements IClock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number): Promise<void> {
    return sleep(ms);
  }
}

export const systemClock: IClock = new SystemClock();
