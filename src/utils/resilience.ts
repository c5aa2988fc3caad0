/**
 * listsync Resilience Utilities
 * Fetch timeouts, retry logic, rate limiting, and crash handlers.
 */

import { CircuitBreaker } from '../circuitBreaker.js';
import { CancellationError, errorMessage, HttpError } from '../errors.js';

// =============================================================================
// Fetch with Timeout
// =============================================================================

/**
 * Wrapper around fetch() with an AbortController timeout.
 * An optional caller signal (the run's cancellation signal) aborts it too.
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit & { timeout?: number; signal?: AbortSignal } = {}
): Promise<Response> {
  const { timeout = 15000, signal, ...fetchOptions } = options;

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);
  const onAbort = () => controller.abort();
  if (signal) {
    if (signal.aborted) controller.abort();
    else signal.addEventListener('abort', onAbort, { once: true });
  }

  try {
    const response = await fetch(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
    return response;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

// =============================================================================
// Retry with Exponential Backoff
// =============================================================================

export interface RetryOptions {
  maxRetries?: number;
  /** First backoff delay, ms; doubles per attempt up to maxDelay */
  baseDelay?: number;
  maxDelay?: number;
  /** Cancels the backoff wait and stops further attempts */
  signal?: AbortSignal;
  /** Log prefix */
  label?: string;
}

/**
 * Retry an async function while it fails with a transient error.
 * Throws the last error once retries run out or the signal fires.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, baseDelay = 1000, maxDelay = 30000, signal, label = 'Retry' } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (signal?.aborted || attempt >= maxRetries || !isRetryableError(error)) {
        throw error;
      }

      const delay = Math.min(baseDelay * 2 ** attempt, maxDelay);
      const waitMs = Math.round(delay + delay * 0.1 * Math.random());
      console.log(`[${label}] Attempt ${attempt + 1}/${maxRetries + 1} failed (${errorMessage(error)}), retrying in ${waitMs}ms`);
      await sleep(waitMs, signal);
      if (signal?.aborted) throw error;
    }
  }
}

/** Rate limits, gateway errors and connection-level failures */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.status === 429 || error.status === 502 || error.status === 503 || error.status === 504;
  }
  return CircuitBreaker.isOutageError(error);
}

// =============================================================================
// Rate Limiting
// =============================================================================

export type RateLimiter = (signal?: AbortSignal) => Promise<void>;

/**
 * Minimum-interval limiter: each call waits until 1/requestsPerSecond has
 * passed since the previous one. Calls are serialised. A caller whose signal
 * fires while queued or waiting gets a CancellationError and gives up its turn.
 */
export function createRateLimiter(requestsPerSecond: number): RateLimiter {
  const minInterval = requestsPerSecond > 0 ? 1000 / requestsPerSecond : 0;
  let lastRequest = 0;
  let queue: Promise<void> = Promise.resolve();

  const takeTurn = async (signal?: AbortSignal) => {
    if (signal?.aborted) throw new CancellationError('waiting for rate limit');
    const elapsed = Date.now() - lastRequest;
    if (elapsed < minInterval) {
      await sleep(minInterval - elapsed, signal);
      if (signal?.aborted) throw new CancellationError('waiting for rate limit');
    }
    lastRequest = Date.now();
  };

  return (signal) => {
    const turn = queue.then(() => takeTurn(signal));
    // The rejection belongs to this caller; later callers still get their turn
    queue = turn.then(() => undefined, () => undefined);
    return turn;
  };
}

// =============================================================================
// Process Crash Handlers
// =============================================================================

type CleanupFn = () => void;
const cleanupHandlers: CleanupFn[] = [];
let handlersInstalled = false;
let interruptController: AbortController | null = null;

/**
 * Register a cleanup function to run on process exit/crash.
 * Handlers only run once installProcessHandlers() has been called.
 */
export function registerCleanup(fn: CleanupFn): void {
  cleanupHandlers.push(fn);
}

/**
 * First SIGINT/SIGTERM aborts the controller so the running pass can stop
 * at its next checkpoint; a second one exits immediately.
 */
export function abortOnInterrupt(controller: AbortController): void {
  interruptController = controller;
}

function runCleanup(reason: string): void {
  console.log(`\n[listsync] Shutting down (${reason})...`);
  for (const handler of cleanupHandlers) {
    try {
      handler();
    } catch (error) {
      console.error('[listsync] Cleanup handler failed:', error);
    }
  }
}

/**
 * Signal and crash handlers for the CLI process. Library code and tests never
 * call this; they only register cleanup.
 */
export function installProcessHandlers(): void {
  if (handlersInstalled) return;
  handlersInstalled = true;

  const onSignal = (signal: string) => {
    if (interruptController && !interruptController.signal.aborted) {
      console.log(`\n[listsync] ${signal} received, stopping after the current entry (repeat to force)`);
      interruptController.abort();
      return;
    }
    runCleanup(signal);
    process.exit(130);
  };

  // Graceful signals (Docker sends SIGTERM)
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Crash handlers (log before dying)
  process.on('uncaughtException', (error) => {
    console.error(`\n[listsync] UNCAUGHT EXCEPTION:`, error);
    runCleanup('uncaughtException');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error(`\n[listsync] UNHANDLED REJECTION:`, reason);
    runCleanup('unhandledRejection');
    process.exit(1);
  });
}

// =============================================================================
// Helpers
// =============================================================================

/** Resolves after ms, or as soon as the signal fires */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
