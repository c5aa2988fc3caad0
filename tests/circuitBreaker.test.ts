/**
 * Circuit breaker tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CircuitBreaker } from '../src/circuitBreaker.js';
import { CircuitOpenError } from '../src/errors.js';

describe('CircuitBreaker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-10-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function tripped() {
    const breaker = new CircuitBreaker('Test', { failureThreshold: 2, cooldownMs: 1000, maxCooldownMs: 3000 });
    breaker.recordResponse(503);
    breaker.recordResponse(429);
    return breaker;
  }

  it('opens after consecutive outages and fails fast', () => {
    const breaker = tripped();

    expect(breaker.state).toBe('OPEN');
    expect(() => breaker.guard()).toThrow(CircuitOpenError);
    expect(breaker.snapshot()).toEqual({
      name: 'Test',
      state: 'OPEN',
      consecutiveFailures: 2,
      cooldownRemainingMs: 1000,
      trips: 1,
    });
  });

  it('does not count a 404 as an outage', () => {
    const breaker = new CircuitBreaker('Test', { failureThreshold: 2 });
    breaker.recordResponse(503);
    breaker.recordResponse(404);
    breaker.recordResponse(503);

    expect(breaker.state).toBe('CLOSED');
  });

  it('closes when the trial request succeeds', () => {
    const breaker = tripped();
    vi.advanceTimersByTime(1000);

    expect(breaker.state).toBe('HALF_OPEN');
    breaker.recordResponse(200);
    expect(breaker.state).toBe('CLOSED');
  });

  it('backs off when the trial request fails', () => {
    const breaker = tripped();
    vi.advanceTimersByTime(1000);
    breaker.recordResponse(500);

    expect(breaker.snapshot().cooldownRemainingMs).toBe(2000);
    vi.advanceTimersByTime(2000);
    breaker.recordResponse(500);
    expect(breaker.snapshot().cooldownRemainingMs).toBe(3000);
  });

  it('classifies connection errors and timeouts as outages', () => {
    const refused = new TypeError('fetch failed', { cause: Object.assign(new Error('connect'), { code: 'ECONNREFUSED' }) });
    const timeout = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });

    expect(CircuitBreaker.isOutageError(refused)).toBe(true);
    expect(CircuitBreaker.isOutageError(timeout)).toBe(true);
    expect(CircuitBreaker.isOutageError(new Error('Invalid JSON'))).toBe(false);
    expect(CircuitBreaker.isOutageError('ECONNREFUSED')).toBe(false);
  });
});
