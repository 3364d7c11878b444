import { RateLimitWaitTimeoutError } from './errors';
import { createLogger } from './logger';
import { uniform } from './random';
import { cancellationFrom, sleep as defaultSleep } from './timing';
import type {
  AdmissionResult,
  Logger,
  Permit,
  RandomSource,
  RateLimiter,
  RateLimiterConfig,
  RateLimiterStats,
  Sleep,
  WaitOptions,
} from './types';

const MINUTE_MS = 60_000;
const HOUR_MS = 3_600_000;

export interface RateLimiterDeps {
  random?: RandomSource;
  sleep?: Sleep;
  logger?: Logger;
}

interface RateWindow {
  durationMs: number;
  limit: number;
  timestamps: number[];
}

function prune(window: RateWindow, now: number): void {
  const cutoff = now - window.durationMs;
  while (window.timestamps.length > 0 && window.timestamps[0] <= cutoff) {
    window.timestamps.shift();
  }
}

// Time until enough entries leave the window for one more admission.
function waitFor(window: RateWindow, now: number): number {
  if (window.timestamps.length < window.limit) {
    return 0;
  }
  const blocking = window.timestamps[window.timestamps.length - window.limit];
  return Math.max(0, blocking + window.durationMs - now);
}

export function createRateLimiter(config: RateLimiterConfig, deps: RateLimiterDeps = {}): RateLimiter {
  const random = deps.random ?? Math.random;
  const sleep = deps.sleep ?? defaultSleep;
  const logger = deps.logger ?? createLogger('RateLimiter', 'info');

  const minuteWindow: RateWindow = { durationMs: MINUTE_MS, limit: config.requestsPerMinute, timestamps: [] };
  const hourWindow: RateWindow = { durationMs: HOUR_MS, limit: config.requestsPerHour, timestamps: [] };

  let totalAdmitted = 0;
  let totalWaitMs = 0;
  let totalJitterMs = 0;

  function requiredWait(now: number): number {
    prune(minuteWindow, now);
    prune(hourWindow, now);
    return Math.max(waitFor(minuteWindow, now), waitFor(hourWindow, now));
  }

  function admit(now: number): void {
    minuteWindow.timestamps.push(now);
    hourWindow.timestamps.push(now);
    totalAdmitted++;
  }

  /**
   * Non-blocking admission. Records the request when there is capacity,
   * otherwise reports how long the caller should wait before polling again.
   * No jitter is applied on this path.
   */
  function tryAcquire(): AdmissionResult {
    const now = Date.now();
    const waitMs = requiredWait(now);
    if (waitMs > 0) {
      return { admitted: false, waitMs };
    }
    admit(now);
    return { admitted: true, permit: { admittedAt: now, waitedMs: 0, jitterMs: 0 } };
  }

  async function acquire(options: WaitOptions = {}): Promise<Permit> {
    const { signal, deadlineMs } = options;
    const startedAt = Date.now();

    // Check and record happen in the same synchronous turn, so concurrent
    // callers cannot both take the last slot.
    for (;;) {
      if (signal?.aborted) {
        throw cancellationFrom(signal);
      }

      const now = Date.now();
      const waitMs = requiredWait(now);
      if (waitMs <= 0) {
        admit(now);
        break;
      }

      if (deadlineMs !== undefined && now + waitMs > deadlineMs) {
        throw new RateLimitWaitTimeoutError(waitMs);
      }

      logger.info('Rate limit reached, waiting for a slot', {
        waitMs: Math.round(waitMs),
        minute: `${minuteWindow.timestamps.length}/${minuteWindow.limit}`,
        hour: `${hourWindow.timestamps.length}/${hourWindow.limit}`,
      });
      await sleep(waitMs, signal);
      totalWaitMs += waitMs;
    }

    const admittedAt = Date.now();
    const jitterMs = uniform(random, config.jitterMinMs, config.jitterMaxMs);
    if (jitterMs > 0) {
      logger.debug('Adding jitter', { jitterMs: Math.round(jitterMs) });
      await sleep(jitterMs, signal);
      totalJitterMs += jitterMs;
    }

    return {
      admittedAt,
      waitedMs: admittedAt - startedAt,
      jitterMs,
    };
  }

  function getStats(): RateLimiterStats {
    requiredWait(Date.now());

    return {
      minute: { used: minuteWindow.timestamps.length, limit: minuteWindow.limit },
      hour: { used: hourWindow.timestamps.length, limit: hourWindow.limit },
      totalAdmitted,
      totalWaitMs,
      totalJitterMs,
    };
  }

  return {
    acquire,
    tryAcquire,
    getStats,
  };
}
