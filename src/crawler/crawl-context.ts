import { PageFetcher, ScraperConfig } from '../types/index.js';
import { CircuitBreaker } from '../utils/circuit-breaker.js';
import { ErrorTally } from '../utils/errors.js';
import { RetryOptions, Sleep } from '../utils/retry.js';

/**
 * Cooperative cancellation flag, checked between categories
 */
export class CancellationToken {
  private cancelled = false;
  private reason: string | null = null;

  cancel(reason = 'cancelled'): void {
    if (!this.cancelled) {
      this.cancelled = true;
      this.reason = reason;
    }
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  getReason(): string | null {
    return this.reason;
  }
}

/**
 * State shared by every stage of one run
 */
export interface CrawlContext {
  config: ScraperConfig;
  fetcher: PageFetcher;
  errors: ErrorTally;
  breaker: CircuitBreaker;
  cancellation: CancellationToken;
  /** Overrides the retry sleep, mainly for tests */
  sleep?: Sleep;
}

export function createCrawlContext(
  config: ScraperConfig,
  fetcher: PageFetcher,
  overrides: Partial<Omit<CrawlContext, 'config' | 'fetcher'>> = {}
): CrawlContext {
  return {
    config,
    fetcher,
    errors: overrides.errors ?? new ErrorTally(),
    breaker:
      overrides.breaker ??
      new CircuitBreaker({
        name: 'crawl',
        maxConsecutiveFailures: config.maxConsecutiveFailures,
        maxTotalFailures: config.maxTotalFailures,
      }),
    cancellation: overrides.cancellation ?? new CancellationToken(),
    sleep: overrides.sleep,
  };
}

export function retryOptionsFor(context: CrawlContext, name: string): RetryOptions {
  const { config } = context;
  return {
    name,
    maxAttempts: config.maxRetries,
    baseDelayMs: config.retryDelayMs,
    rateLimitMaxAttempts: config.rateLimitMaxRetries,
    rateLimitBaseDelayMs: config.rateLimitBaseDelayMs,
    maxRateLimitDelayMs: config.maxRateLimitDelayMs,
    sleep: context.sleep,
  };
}
