import { logger } from './logger.js';

/**
 * Circuit Breaker for crawl failures
 * Stops spending requests on systematic failures instead of crashing the run
 *
 * States:
 * - CLOSED: normal operation
 * - CATEGORY_OPEN: too many consecutive unit failures, abandon the current category
 * - RUN_OPEN: the run-wide failure cap was hit, abandon the whole run
 *
 * A unit is one listing page or one company. Category state is reset
 * with startCategory(); run state lasts for the breaker's lifetime.
 */
export class CircuitBreaker {
  private consecutiveFailures = 0;
  private totalFailures = 0;
  private state: 'CLOSED' | 'CATEGORY_OPEN' | 'RUN_OPEN' = 'CLOSED';

  private readonly maxConsecutiveFailures: number;
  private readonly maxTotalFailures: number;
  private readonly name: string;

  constructor(options: { name: string; maxConsecutiveFailures?: number; maxTotalFailures?: number }) {
    this.name = options.name;
    this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? 5;
    this.maxTotalFailures = options.maxTotalFailures ?? 20;
  }

  /**
   * Reset category-level state at the start of a new category
   */
  startCategory(): void {
    this.consecutiveFailures = 0;
    if (this.state === 'CATEGORY_OPEN') {
      this.state = 'CLOSED';
    }
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
  }

  recordFailure(): void {
    this.consecutiveFailures++;
    this.totalFailures++;

    logger.warn(`Circuit breaker ${this.name} failure`, {
      consecutiveFailures: this.consecutiveFailures,
      totalFailures: this.totalFailures,
      state: this.state,
    });

    if (this.state === 'RUN_OPEN') {
      return;
    }

    if (this.totalFailures >= this.maxTotalFailures) {
      logger.error(`Circuit breaker ${this.name} abandoning run`, {
        totalFailures: this.totalFailures,
        threshold: this.maxTotalFailures,
      });
      this.state = 'RUN_OPEN';
    } else if (this.consecutiveFailures >= this.maxConsecutiveFailures) {
      logger.error(`Circuit breaker ${this.name} abandoning category`, {
        consecutiveFailures: this.consecutiveFailures,
        threshold: this.maxConsecutiveFailures,
      });
      this.state = 'CATEGORY_OPEN';
    }
  }

  /**
   * Whether the current category (or the whole run) should stop
   */
  isCategoryOpen(): boolean {
    return this.state !== 'CLOSED';
  }

  isRunOpen(): boolean {
    return this.state === 'RUN_OPEN';
  }

  getState(): 'CLOSED' | 'CATEGORY_OPEN' | 'RUN_OPEN' {
    return this.state;
  }

  getTotalFailures(): number {
    return this.totalFailures;
  }

  getConsecutiveFailures(): number {
    return this.consecutiveFailures;
  }

  /**
   * Manually reset the circuit breaker
   */
  reset(): void {
    logger.info(`Circuit breaker ${this.name} manually reset`);
    this.state = 'CLOSED';
    this.consecutiveFailures = 0;
    this.totalFailures = 0;
  }
}
