/**
 * listsync Errors
 *
 * Only CancellationError is allowed to escape a resolution pass; the others
 * are absorbed per source into statistics and the sync report.
 */

/** A strategy's underlying lookup failed (network, parse). */
export class StrategyFailureError extends Error {
  readonly strategyName: string;

  constructor(strategyName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`strategy ${strategyName} failed: ${detail}`, { cause });
    this.name = 'StrategyFailureError';
    this.strategyName = strategyName;
  }
}

/** Every strategy in the chain declined. */
export class NoTargetFoundError extends Error {
  readonly title: string;

  constructor(title: string) {
    super(`no target found for source: ${title}`);
    this.name = 'NoTargetFoundError';
    this.title = title;
  }
}

/** The run's AbortSignal fired at a checkpoint. */
export class CancellationError extends Error {
  constructor(checkpoint: string) {
    super(`context cancelled ${checkpoint}`);
    this.name = 'CancellationError';
  }
}

/** Non-2xx response from an external service */
export class HttpError extends Error {
  readonly status: number;

  constructor(service: string, status: number, statusText: string) {
    super(`${service} HTTP ${status}: ${statusText}`);
    this.name = 'HttpError';
    this.status = status;
  }
}

/** Thrown when a service's circuit breaker is open. Not an infra failure, just "skip me" */
export class CircuitOpenError extends Error {
  constructor(service: string) {
    super(`${service} circuit breaker is open`);
    this.name = 'CircuitOpenError';
  }
}

/** Throws CancellationError if the signal has fired. */
export function throwIfCancelled(signal: AbortSignal | undefined, checkpoint: string): void {
  if (signal?.aborted) {
    throw new CancellationError(checkpoint);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
