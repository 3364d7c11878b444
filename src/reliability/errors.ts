import type { StrategyFailure } from './types';

export class CircuitOpenError extends Error {
  constructor(
    public readonly retryAfterMs: number = 0,
    message: string = 'Circuit breaker is open'
  ) {
    super(message);
    this.name = 'CircuitOpenError';
  }
}

export class RateLimitWaitTimeoutError extends Error {
  constructor(public readonly waitMs: number) {
    super(`Rate limit slot not available before deadline (needed ${Math.ceil(waitMs)}ms)`);
    this.name = 'RateLimitWaitTimeoutError';
  }
}

export class CancelledError extends Error {
  constructor(message: string = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class TransportTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
    this.name = 'TransportTimeoutError';
  }
}

/**
 * A failure signalled by the upstream itself, carrying its status code.
 * Transports throw this so the retry classification can see the status.
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    cause: Error
  ) {
    super(`${cause.message} (after ${attempts} attempts)`, { cause });
    this.name = 'RetryExhaustedError';
  }
}

export class StrategyExhaustedError extends Error {
  constructor(
    public readonly failures: StrategyFailure[],
    public readonly cooldownMs: number = 0
  ) {
    const summary = failures.map((f) => `${f.strategy}: ${f.message}`).join('; ');
    super(`All ${failures.length} strategies failed: ${summary}`);
    this.name = 'StrategyExhaustedError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
