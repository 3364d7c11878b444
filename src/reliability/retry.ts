import { CancelledError, RetryExhaustedError, TransportTimeoutError, UpstreamError, toError } from './errors';
import { uniform } from './random';
import { cancellationFrom, sleep as defaultSleep } from './timing';
import type { RetryOptions } from './types';

const RETRYABLE_STATUS = new Set([403, 408, 425, 429]);

const RETRYABLE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_NETWORK',
]);

const RETRYABLE_PATTERNS = [
  'network',
  'timeout',
  'timed out',
  'socket hang up',
  'too many requests',
  'forbidden',
  'server error',
];

function readStatus(error: Error): number | undefined {
  if (error instanceof UpstreamError) {
    return error.statusCode;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function readCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isRetryableError(error: Error): boolean {
  if (error instanceof CancelledError) {
    return false;
  }
  if (error instanceof TransportTimeoutError) {
    return true;
  }

  // Malformed input never succeeds on retry
  if (error.name === 'ValidationError' || error.name === 'ConfigError') {
    return false;
  }

  const statusCode = readStatus(error);
  if (statusCode !== undefined) {
    if (statusCode >= 500 && statusCode < 600) {
      return true;
    }
    if (statusCode >= 400 && statusCode < 500) {
      return RETRYABLE_STATUS.has(statusCode);
    }
  }

  const code = readCode(error);
  if (code !== undefined && RETRYABLE_CODES.has(code)) {
    return true;
  }

  const message = error.message.toLowerCase();
  if (RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern))) {
    return true;
  }

  // Default: assume retryable for unknown errors
  return true;
}

/**
 * Inclusive range the delay after failed attempt `attempt` (1-based) is drawn from.
 */
export function backoffBounds(attempt: number, baseDelayMs: number, maxDelayMs: number): { min: number; max: number } {
  const upper = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  const lower = Math.min(upper, baseDelayMs * Math.pow(2, attempt - 1));
  return { min: lower, max: upper };
}

export async function runWithRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const isRetryable = options.isRetryable ?? isRetryableError;
  const random = options.random ?? Math.random;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw cancellationFrom(options.signal);
    }

    try {
      return await operation(attempt);
    } catch (error) {
      lastError = toError(error);

      if (lastError instanceof CancelledError || !isRetryable(lastError)) {
        throw lastError;
      }

      if (attempt === maxAttempts) {
        break;
      }

      const bounds = backoffBounds(attempt, options.baseDelayMs, options.maxDelayMs);
      const delayMs = uniform(random, bounds.min, bounds.max);
      options.onRetry?.({ attempt, delayMs, error: lastError });

      await sleep(delayMs, options.signal);
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError ?? new Error('Unknown error'));
}
