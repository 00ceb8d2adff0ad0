/**
 * Sliding-window request limiter.
 * The active window is recomputed on every acquire from the recorded request
 * timestamps; there is no token refill schedule.
 */

import { systemClock, type Clock } from './clock.js';
import type { RateLimit } from './types.js';

// ---- Defaults ----

export const DEFAULT_RATE_LIMIT: RateLimit = {
  windowMs: 900_000,  // 15 minutes
  maxRequests: 15,
};

// ---- Limiter ----

export class SlidingWindowRateLimiter {
  readonly config: RateLimit;
  private readonly clock: Clock;
  private timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(config: RateLimit = DEFAULT_RATE_LIMIT, clock: Clock = systemClock) {
    if (config.maxRequests < 1 || config.windowMs <= 0) {
      throw new RangeError(`Invalid rate limit: ${config.maxRequests} per ${config.windowMs}ms`);
    }
    this.config = config;
    this.clock = clock;
  }

  /**
   * Resolves once a request may be issued, and records it.
   * Callers are queued so that check-and-record never interleaves.
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.reserve());
    this.tail = turn;
    return turn;
  }

  /** Requests recorded in the trailing window as of now. */
  inWindow(): number {
    this.prune(this.clock.now());
    return this.timestamps.length;
  }

  private async reserve(): Promise<void> {
    while (true) {
      const now = this.clock.now();
      this.prune(now);

      if (this.timestamps.length < this.config.maxRequests) {
        this.timestamps.push(now);
        return;
      }

      // Wait for the oldest request in the window to fall out of it
      const oldest = this.timestamps[0];
      await this.clock.sleep(oldest + this.config.windowMs - now);
    }
  }

  private prune(now: number): void {
    this.timestamps = this.timestamps.filter(t => now - t < this.config.windowMs);
  }
}
