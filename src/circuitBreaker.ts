/**
 * Circuit breakers, one per external service (AniList, MAL, ARM, Hato).
 *
 * An outage (5xx, 429, timeout, refused connection) counts against the
 * breaker; a 404 or an empty search is an answer. After enough outages in a
 * row the breaker opens and requests fail fast with CircuitOpenError until
 * the cooldown passes. The first request after that is a trial: success
 * closes the breaker, failure reopens it with a longer cooldown.
 */

import { CircuitOpenError } from './errors.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitSettings {
  /** Consecutive outages before opening */
  failureThreshold: number;
  cooldownMs: number;
  maxCooldownMs: number;
  /** Cooldown growth after each failed trial request */
  backoff: number;
}

export interface CircuitSnapshot {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  cooldownRemainingMs: number;
  trips: number;
}

const DEFAULT_SETTINGS: CircuitSettings = {
  failureThreshold: 5,
  cooldownMs: 30_000,
  maxCooldownMs: 300_000,
  backoff: 2,
};

/** Connection-level error codes undici reports as `cause.code` */
const OUTAGE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENETUNREACH',
  'ENOTFOUND',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

export class CircuitBreaker {
  readonly name: string;
  private readonly settings: CircuitSettings;
  private current: CircuitState = 'CLOSED';
  private failures = 0;
  private openedAt = 0;
  private cooldown: number;
  private trips = 0;

  constructor(name: string, settings: Partial<CircuitSettings> = {}) {
    this.name = name;
    this.settings = { ...DEFAULT_SETTINGS, ...settings };
    this.cooldown = this.settings.cooldownMs;
  }

  get state(): CircuitState {
    if (this.current === 'OPEN' && Date.now() - this.openedAt >= this.cooldown) {
      this.current = 'HALF_OPEN';
      console.log(`[Circuit:${this.name}] HALF_OPEN, retrying after ${Math.round(this.cooldown / 1000)}s`);
    }
    return this.current;
  }

  allowRequest(): boolean {
    return this.state !== 'OPEN';
  }

  /** Throws CircuitOpenError while the breaker is open */
  guard(): void {
    if (!this.allowRequest()) {
      throw new CircuitOpenError(this.name);
    }
  }

  recordResponse(status: number): void {
    if (CircuitBreaker.isOutageStatus(status)) {
      this.recordFailure();
    } else {
      this.recordSuccess();
    }
  }

  recordSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      console.log(`[Circuit:${this.name}] CLOSED, service recovered`);
      this.cooldown = this.settings.cooldownMs;
    }
    this.current = 'CLOSED';
    this.failures = 0;
  }

  recordFailure(): void {
    this.failures++;
    const state = this.state;

    if (state === 'HALF_OPEN') {
      this.cooldown = Math.min(this.cooldown * this.settings.backoff, this.settings.maxCooldownMs);
      this.open(`trial request failed, cooldown ${Math.round(this.cooldown / 1000)}s`);
      return;
    }

    if (state === 'CLOSED' && this.failures >= this.settings.failureThreshold) {
      this.trips++;
      this.open(`${this.failures} consecutive failures, trip #${this.trips}`);
    }
  }

  snapshot(): CircuitSnapshot {
    const state = this.state;
    return {
      name: this.name,
      state,
      consecutiveFailures: this.failures,
      cooldownRemainingMs: state === 'OPEN' ? Math.max(0, this.cooldown - (Date.now() - this.openedAt)) : 0,
      trips: this.trips,
    };
  }

  private open(reason: string): void {
    this.current = 'OPEN';
    this.openedAt = Date.now();
    console.warn(`[Circuit:${this.name}] OPEN (${reason})`);
  }

  static isOutageStatus(status: number): boolean {
    return status >= 500 || status === 429;
  }

  /** Timeouts and connection failures; anything else is not the service's fault */
  static isOutageError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    if (error.name === 'AbortError' || error.name === 'TimeoutError') return true;

    const cause: unknown = error.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
      return OUTAGE_CODES.has(cause.code);
    }
    return error.message === 'fetch failed';
  }
}

// =============================================================================
// Registry
// =============================================================================

const breakers = new Map<string, CircuitBreaker>();

/** Shared by every client of the same service for the life of the process */
export function getCircuitBreaker(name: string, settings: Partial<CircuitSettings> = {}): CircuitBreaker {
  let breaker = breakers.get(name);
  if (!breaker) {
    breaker = new CircuitBreaker(name, settings);
    breakers.set(name, breaker);
  }
  return breaker;
}

export function listCircuits(): CircuitSnapshot[] {
  return [...breakers.values()].map(breaker => breaker.snapshot());
}
