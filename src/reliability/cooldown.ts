import { createLogger } from './logger';
import type { CooldownConfig, CooldownEscalator, CooldownState, Logger } from './types';

export function cooldownSeconds(config: CooldownConfig, consecutiveFailures: number): number {
  return config.baseSeconds * Math.pow(2, Math.min(consecutiveFailures, config.capExponent));
}

/**
 * Operation-level backoff: grows after each fetch that exhausted every
 * strategy and drops back to the base after the next success.
 */
export function createCooldownEscalator(config: CooldownConfig, logger: Logger = createLogger('Cooldown', 'info')): CooldownEscalator {
  let consecutiveOperationFailures = 0;

  function getState(): CooldownState {
    return {
      consecutiveOperationFailures,
      currentCooldownSeconds: cooldownSeconds(config, consecutiveOperationFailures),
    };
  }

  function recordFailure(): CooldownState {
    consecutiveOperationFailures++;
    const state = getState();
    logger.warn('Operation failed, cooldown escalated', { ...state });
    return state;
  }

  function recordSuccess(): CooldownState {
    if (consecutiveOperationFailures > 0) {
      logger.info('Success after consecutive failures, cooldown reset', {
        consecutiveOperationFailures,
      });
    }
    consecutiveOperationFailures = 0;
    return getState();
  }

  return {
    recordFailure,
    recordSuccess,
    getState,
  };
}
