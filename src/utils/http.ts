/**
 * Guarded HTTP for external services.
 *
 * Every outgoing request goes through the service's rate limiter and
 * circuit breaker; 5xx/429/timeouts trip the breaker, 404s and empty
 * results do not.
 */

import type { z } from 'zod';
import { CircuitBreaker, getCircuitBreaker } from '../circuitBreaker.js';
import { HttpError } from '../errors.js';
import { createRateLimiter, fetchWithTimeout, withRetry, type RateLimiter } from './resilience.js';

const USER_AGENT = 'listsync/0.1.0 (AniList/MAL list sync)';

export interface ServiceHttpOptions {
  /** Service name, used for logs and the breaker registry */
  name: string;
  requestsPerSecond: number;
  timeout?: number;
  maxRetries?: number;
  /** Retry base delay, ms */
  retryDelay?: number;
  headers?: Record<string, string>;
}

export interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
  /** Statuses returned to the caller instead of thrown as HttpError */
  allowStatus?: number[];
}

export class ServiceHttp {
  readonly name: string;
  private readonly breaker: CircuitBreaker;
  private readonly rateLimit: RateLimiter;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly headers: Record<string, string>;

  constructor(options: ServiceHttpOptions) {
    this.name = options.name;
    this.breaker = getCircuitBreaker(options.name);
    this.rateLimit = createRateLimiter(options.requestsPerSecond);
    this.timeout = options.timeout ?? 15000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelay = options.retryDelay ?? 1000;
    this.headers = options.headers ?? {};
  }

  /**
   * Fetch with rate limit, breaker and retry. Non-2xx responses throw
   * HttpError unless listed in allowStatus.
   */
  async request(url: string, options: RequestOptions = {}): Promise<Response> {
    return withRetry(() => this.requestOnce(url, options), {
      maxRetries: this.maxRetries,
      baseDelay: this.retryDelay,
      signal: options.signal,
      label: this.name,
    });
  }

  /** request() + JSON body validated against the schema */
  async requestJson<T extends z.ZodTypeAny>(url: string, schema: T, options: RequestOptions = {}): Promise<z.infer<T>> {
    const response = await this.request(url, options);
    const body: unknown = await response.json();
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new Error(`${this.name} returned an unexpected response: ${issues}`);
    }
    return parsed.data;
  }

  private async requestOnce(url: string, options: RequestOptions): Promise<Response> {
    await this.rateLimit(options.signal);

    this.breaker.guard();

    let response: Response;
    try {
      response = await fetchWithTimeout(url, {
        method: options.method ?? 'GET',
        headers: { 'User-Agent': USER_AGENT, ...this.headers, ...options.headers },
        body: options.body,
        timeout: this.timeout,
        signal: options.signal,
      });
    } catch (error) {
      // A cancelled run is not the service's fault
      if (!options.signal?.aborted && CircuitBreaker.isOutageError(error)) {
        this.breaker.recordFailure();
      }
      throw error;
    }

    this.breaker.recordResponse(response.status);

    if (!response.ok && !(options.allowStatus ?? []).includes(response.status)) {
      throw new HttpError(this.name, response.status, response.statusText);
    }

    return response;
  }
}
