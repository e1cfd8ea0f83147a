import { logger } from './logger.js';
import { RateLimitError, ScraperError, toError } from './errors.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Total attempts for ordinary failures, including the first */
  maxAttempts: number;
  /** Linear backoff unit: the n-th retry waits baseDelayMs * n */
  baseDelayMs: number;
  /** Separate attempt budget for RateLimitError failures */
  rateLimitMaxAttempts?: number;
  /** First rate-limit wait when the server gave no Retry-After; doubles per retry */
  rateLimitBaseDelayMs?: number;
  maxRateLimitDelayMs?: number;
  /** Label used in log lines */
  name?: string;
  sleep?: Sleep;
  onRetry?: (info: RetryAttemptInfo) => void;
}

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  rateLimited: boolean;
  error: Error;
}

const DEFAULT_RATE_LIMIT_ATTEMPTS = 3;
const DEFAULT_RATE_LIMIT_BASE_DELAY_MS = 30000;
const DEFAULT_MAX_RATE_LIMIT_DELAY_MS = 300000;

/**
 * Delay before the next rate-limited attempt
 * Honors Retry-After, otherwise escalates 30s, 60s, 120s... up to the cap
 */
export function rateLimitDelay(
  error: RateLimitError,
  rateLimitAttempt: number,
  baseDelayMs = DEFAULT_RATE_LIMIT_BASE_DELAY_MS,
  maxDelayMs = DEFAULT_MAX_RATE_LIMIT_DELAY_MS
): number {
  if (error.retryAfterMs !== null) {
    return Math.min(error.retryAfterMs, maxDelayMs);
  }
  return Math.min(baseDelayMs * Math.pow(2, rateLimitAttempt - 1), maxDelayMs);
}

function isRetryable(error: unknown): boolean {
  return !(error instanceof ScraperError) || error.retryable;
}

/**
 * Run an operation, retrying failures with linear backoff
 *
 * Rate-limited failures draw on their own budget with a steeper delay.
 * Errors flagged non-retryable propagate immediately; after exhausting
 * attempts the last error propagates.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const name = options.name ?? 'operation';
  const rateLimitMaxAttempts = options.rateLimitMaxAttempts ?? DEFAULT_RATE_LIMIT_ATTEMPTS;

  let attempt = 0;
  let rateLimitAttempt = 0;

  for (;;) {
    try {
      return await operation();
    } catch (error) {
      const lastError = toError(error);

      if (!isRetryable(error)) {
        throw lastError;
      }

      let delayMs: number;
      let rateLimited = false;

      if (error instanceof RateLimitError) {
        rateLimitAttempt++;
        if (rateLimitAttempt >= rateLimitMaxAttempts) {
          logger.error(`${name} still rate limited after ${rateLimitAttempt} attempts`, {
            error: lastError.message,
          });
          throw lastError;
        }
        rateLimited = true;
        delayMs = rateLimitDelay(
          error,
          rateLimitAttempt,
          options.rateLimitBaseDelayMs,
          options.maxRateLimitDelayMs
        );
      } else {
        attempt++;
        if (attempt >= options.maxAttempts) {
          logger.error(`${name} failed after ${attempt} attempts`, { error: lastError.message });
          throw lastError;
        }
        delayMs = options.baseDelayMs * attempt;
      }

      logger.warn(`${name} failed, retrying`, {
        attempt: rateLimited ? rateLimitAttempt : attempt,
        rateLimited,
        delayMs,
        error: lastError.message,
      });
      options.onRetry?.({
        attempt: rateLimited ? rateLimitAttempt : attempt,
        delayMs,
        rateLimited,
        error: lastError,
      });

      await wait(delayMs);
    }
  }
}
