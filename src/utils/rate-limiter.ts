import { logger } from './logger.js';
import { sleep, Sleep } from './retry.js';

export interface RateLimiterOptions {
  minDelayMs: number;
  maxDelayMs: number;
  /** Returns a value in [0, 1) */
  random?: () => number;
  now?: () => number;
  sleep?: Sleep;
}

/**
 * Paces outgoing requests
 *
 * Before each request a delay is drawn uniformly from [minDelayMs, maxDelayMs];
 * the limiter sleeps until at least that long has passed since the previous request.
 * One instance is shared by every request of a run.
 */
export class RateLimiter {
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private lastRequestAt: number | null = null;

  constructor(options: RateLimiterOptions) {
    this.minDelayMs = options.minDelayMs;
    this.maxDelayMs = Math.max(options.maxDelayMs, options.minDelayMs);
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Wait for this request's slot; returns the time slept in ms
   */
  async wait(): Promise<number> {
    let slept = 0;

    if (this.lastRequestAt !== null) {
      const delay = this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs);
      const elapsed = this.now() - this.lastRequestAt;

      if (elapsed < delay) {
        slept = delay - elapsed;
        logger.debug('Rate limiting request', { sleepMs: Math.round(slept) });
        await this.sleep(slept);
      }
    }

    this.lastRequestAt = this.now();
    return slept;
  }

  reset(): void {
    this.lastRequestAt = null;
  }
}
