/**
 * Retry, rate limit and sleep helpers
 */

import { describe, it, expect, vi } from 'vitest';
import { CancellationError, HttpError } from '../src/errors.js';
import {
  abortOnInterrupt,
  createRateLimiter,
  isRetryableError,
  registerCleanup,
  sleep,
  withRetry,
} from '../src/utils/resilience.js';

describe('withRetry', () => {
  it('retries a transient failure', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new HttpError('Test', 503, 'Service Unavailable'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { baseDelay: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry a client error', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new HttpError('Test', 400, 'Bad Request'));

    await expect(withRetry(fn, { baseDelay: 0 })).rejects.toThrow('Test HTTP 400: Bad Request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxRetries', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new HttpError('Test', 429, 'Too Many Requests'));

    await expect(withRetry(fn, { baseDelay: 0, maxRetries: 2 })).rejects.toBeInstanceOf(HttpError);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops once the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new HttpError('Test', 503, 'Service Unavailable'));

    await expect(withRetry(fn, { baseDelay: 0, signal: controller.signal })).rejects.toBeInstanceOf(HttpError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('isRetryableError', () => {
  it('retries gateway errors and rate limits only', () => {
    expect(isRetryableError(new HttpError('Test', 502, 'Bad Gateway'))).toBe(true);
    expect(isRetryableError(new HttpError('Test', 500, 'Internal Server Error'))).toBe(false);
    expect(isRetryableError(new Error('unexpected response'))).toBe(false);
  });
});

describe('sleep', () => {
  it('wakes early when the signal fires', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const waiting = sleep(60_000, controller.signal);
    controller.abort();

    await waiting;
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe('createRateLimiter', () => {
  it('cancels a queued caller whose signal has fired', async () => {
    const limit = createRateLimiter(20);
    await limit();

    const controller = new AbortController();
    const waiting = limit(controller.signal);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(CancellationError);
    await expect(limit()).resolves.toBeUndefined();
  });

  it('cancels during the interval wait', async () => {
    const limit = createRateLimiter(0.01);
    await limit();

    const controller = new AbortController();
    const started = Date.now();
    const waiting = limit(controller.signal);
    setTimeout(() => controller.abort(), 10);

    await expect(waiting).rejects.toThrow('context cancelled waiting for rate limit');
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe('process handlers', () => {
  it('are not installed by registering cleanup or an interrupt controller', () => {
    const crashListeners = process.listenerCount('uncaughtException');
    const rejectionListeners = process.listenerCount('unhandledRejection');
    const interruptListeners = process.listenerCount('SIGINT');

    registerCleanup(() => undefined);
    abortOnInterrupt(new AbortController());

    expect(process.listenerCount('uncaughtException')).toBe(crashListeners);
    expect(process.listenerCount('unhandledRejection')).toBe(rejectionListeners);
    expect(process.listenerCount('SIGINT')).toBe(interruptListeners);
  });
});
