import { type IClock, systemClock } from './clock.js';

/**
 * Absolute expiry time derived from a timeout. Immutable once created.
 */
export class Deadline {
  private constructor(
    readonly startedAt: number,
    readonly expiresAt: number,
    private readonly clock: IClock
  ) {}

  static after(timeoutMs: number, clock: IClock = systemClock): Deadline {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`Timeout must be a positive number of milliseconds, got ${timeoutMs}`);
    }
    const now = clock.now();
    return new Deadline(now, now + timeoutMs, clock);
  }

  /** Milliseconds left, never negative */
  remaining(): number {
    return Math.max(0, this.expiresAt - this.clock.now());
  }

  isExpired(): boolean {
    return this.clock.now() >= this.expiresAt;
  }

  elapsed(): number {
    return this.clock.now() - this.startedAt;
  }
}
