import { createLogger } from './logger';
import {
  CircuitState,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  type CircuitCheck,
  type Logger,
} from './types';

export function createCircuitBreaker(config: CircuitBreakerConfig, logger: Logger = createLogger('CircuitBreaker', 'info')): CircuitBreaker {
  let state: CircuitState = CircuitState.CLOSED;
  let consecutiveFailures = 0;
  let openedAt: number | undefined;
  let probeInFlight = false;

  function open(now: number): void {
    state = CircuitState.OPEN;
    openedAt = now;
    probeInFlight = false;
    logger.warn('Circuit opened', { consecutiveFailures, cooldownMs: config.cooldownMs });
  }

  function refresh(now: number): void {
    if (state === CircuitState.OPEN && openedAt !== undefined && now - openedAt >= config.cooldownMs) {
      state = CircuitState.HALF_OPEN;
      openedAt = undefined;
      probeInFlight = false;
      logger.info('Circuit half-open, next call is a probe');
    }
  }

  function remainingCooldown(now: number): number {
    if (state !== CircuitState.OPEN) {
      return 0;
    }
    return openedAt === undefined ? config.cooldownMs : Math.max(0, openedAt + config.cooldownMs - now);
  }

  function checkOpen(): CircuitCheck {
    const now = Date.now();
    refresh(now);

    if (state === CircuitState.OPEN) {
      return { allowed: false, retryAfterMs: remainingCooldown(now) };
    }

    if (state === CircuitState.HALF_OPEN) {
      // Only one probe at a time; others see the circuit as still open.
      if (probeInFlight) {
        return { allowed: false, retryAfterMs: 0 };
      }
      probeInFlight = true;
      return { allowed: true, probe: true };
    }

    return { allowed: true, probe: false };
  }

  function reportSuccess(): void {
    refresh(Date.now());

    // A late success from a call admitted before the circuit opened does not
    // cut the cooldown short.
    if (state === CircuitState.OPEN) {
      return;
    }
    if (state === CircuitState.HALF_OPEN) {
      logger.info('Probe succeeded, circuit closed');
    }
    state = CircuitState.CLOSED;
    consecutiveFailures = 0;
    openedAt = undefined;
    probeInFlight = false;
  }

  function reportFailure(): void {
    const now = Date.now();
    refresh(now);
    consecutiveFailures++;

    if (state === CircuitState.HALF_OPEN) {
      logger.warn('Probe failed, circuit reopened');
      open(now);
      return;
    }

    if (state === CircuitState.CLOSED && consecutiveFailures >= config.failureThreshold) {
      open(now);
    }
  }

  function releaseProbe(): void {
    probeInFlight = false;
  }

  function isOpen(): boolean {
    refresh(Date.now());
    return state === CircuitState.OPEN;
  }

  function getStats(): CircuitBreakerStats {
    const now = Date.now();
    refresh(now);

    return {
      state,
      consecutiveFailures,
      openedAt,
      retryAfterMs: remainingCooldown(now),
      probeInFlight,
    };
  }

  return {
    checkOpen,
    reportSuccess,
    reportFailure,
    releaseProbe,
    isOpen,
    getStats,
  };
}
