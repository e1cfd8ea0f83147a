import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CircuitBreaker } from './circuit-breaker.js';

vi.mock('./logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('CircuitBreaker', () => {
  let breaker: CircuitBreaker;

  beforeEach(() => {
    breaker = new CircuitBreaker({ name: 'test', maxConsecutiveFailures: 3, maxTotalFailures: 5 });
  });

  it('should start closed', () => {
    expect(breaker.getState()).toBe('CLOSED');
    expect(breaker.isCategoryOpen()).toBe(false);
  });

  it('should open for the category after consecutive failures', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    expect(breaker.isCategoryOpen()).toBe(false);

    breaker.recordFailure();
    expect(breaker.getState()).toBe('CATEGORY_OPEN');
    expect(breaker.isRunOpen()).toBe(false);
  });

  it('should reset the consecutive count on success', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();

    expect(breaker.getConsecutiveFailures()).toBe(1);
    expect(breaker.isCategoryOpen()).toBe(false);
  });

  it('should close again when the next category starts', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();

    breaker.startCategory();

    expect(breaker.getState()).toBe('CLOSED');
    expect(breaker.getTotalFailures()).toBe(3);
  });

  it('should open for the run at the total failure cap', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();

    expect(breaker.getState()).toBe('RUN_OPEN');

    breaker.startCategory();
    expect(breaker.isRunOpen()).toBe(true);
    expect(breaker.isCategoryOpen()).toBe(true);
  });

  it('should clear everything on reset', () => {
    for (let i = 0; i < 5; i++) breaker.recordFailure();

    breaker.reset();

    expect(breaker.getState()).toBe('CLOSED');
    expect(breaker.getTotalFailures()).toBe(0);
  });
});
