import { createLoggerFactory } from './logger';
import { createRateLimiter } from './rate-limiter';
import { isRetryableError, runWithRetry } from './retry';
import { createCircuitBreaker } from './circuit-breaker';
import { createCooldownEscalator } from './cooldown';
import { createStrategyChain } from './strategy-chain';
import { createIdentityProvider } from './identity';
import { DEFAULT_STRATEGIES } from './strategies';
import { sleep as defaultSleep, runWithTimeout, withDeadline } from './timing';
import { CancelledError, CircuitOpenError, StrategyExhaustedError, toError } from './errors';
import type {
  ClientTotals,
  FetchOptions,
  ResilientClient,
  ResilientClientConfig,
  ResilientClientOptions,
  ResilientClientStats,
} from './types';

export const DEFAULT_CONFIG: ResilientClientConfig = {
  rateLimiter: {
    requestsPerMinute: 10,
    requestsPerHour: 200,
    jitterMinMs: 1000,
    jitterMaxMs: 5000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 2000,
    maxDelayMs: 10000,
  },
  circuitBreaker: {
    failureThreshold: 5,
    cooldownMs: 60000,
  },
  cooldown: {
    baseSeconds: 60,
    capExponent: 3,
  },
  identity: {
    dynamicRatio: 0.7,
    rotationEnabled: true,
    relayEnabled: false,
    relayEndpoints: [],
    includeDirect: false,
    rotationPeriodMs: 45000,
  },
  strategies: DEFAULT_STRATEGIES,
  enableMultiStrategy: true,
  attemptTimeoutMs: 120000,
  cooldownMode: 'block',
};

export function resolveConfig(config: Partial<ResilientClientConfig> = {}): ResilientClientConfig {
  return {
    rateLimiter: { ...DEFAULT_CONFIG.rateLimiter, ...config.rateLimiter },
    retry: { ...DEFAULT_CONFIG.retry, ...config.retry },
    circuitBreaker: { ...DEFAULT_CONFIG.circuitBreaker, ...config.circuitBreaker },
    cooldown: { ...DEFAULT_CONFIG.cooldown, ...config.cooldown },
    identity: { ...DEFAULT_CONFIG.identity, ...config.identity },
    strategies: config.strategies ?? DEFAULT_CONFIG.strategies,
    enableMultiStrategy: config.enableMultiStrategy ?? DEFAULT_CONFIG.enableMultiStrategy,
    attemptTimeoutMs: config.attemptTimeoutMs ?? DEFAULT_CONFIG.attemptTimeoutMs,
    cooldownMode: config.cooldownMode ?? DEFAULT_CONFIG.cooldownMode,
  };
}

/**
 * Builds one client per upstream target. Every `fetch` goes through
 * admission control, the circuit breaker, and the strategy chain, with each
 * strategy retried under its own backoff and each attempt using a fresh
 * identity. Callers get exactly one response or one terminal error.
 */
export function createResilientClient<TRequest, TResponse>(
  options: ResilientClientOptions<TRequest, TResponse>
): ResilientClient<TRequest, TResponse> {
  const fullConfig = resolveConfig(options.config);
  const loggerFor = options.createLogger ?? createLoggerFactory('info', 'text');
  const random = options.random ?? Math.random;
  const sleep = options.sleep ?? defaultSleep;
  const isRetryable = options.isRetryable ?? isRetryableError;
  const { transport } = options;

  const logger = loggerFor('ResilientClient');
  const rateLimiter = createRateLimiter(fullConfig.rateLimiter, { random, sleep, logger: loggerFor('RateLimiter') });
  // One fetch that fails every strategy must reach the end of the chain
  // before the breaker can open, so the threshold never sits below the
  // number of strategies a fetch walks through.
  const activeStrategies = fullConfig.enableMultiStrategy ? fullConfig.strategies.length : 1;
  const failureThreshold = Math.max(fullConfig.circuitBreaker.failureThreshold, activeStrategies);
  if (failureThreshold !== fullConfig.circuitBreaker.failureThreshold) {
    logger.info('Raising circuit failure threshold to the strategy count', {
      configured: fullConfig.circuitBreaker.failureThreshold,
      failureThreshold,
    });
  }
  const circuitBreaker = createCircuitBreaker(
    { ...fullConfig.circuitBreaker, failureThreshold },
    loggerFor('CircuitBreaker')
  );
  const cooldown = createCooldownEscalator(fullConfig.cooldown, loggerFor('Cooldown'));
  const identities =
    options.identityProvider ??
    createIdentityProvider(fullConfig.identity, { random, logger: loggerFor('IdentityProvider') });
  const chain = createStrategyChain({
    strategies: fullConfig.strategies,
    circuitBreaker,
    enableMultiStrategy: fullConfig.enableMultiStrategy,
    logger: loggerFor('StrategyChain'),
  });

  const totals: ClientTotals = {
    fetches: 0,
    successes: 0,
    failures: 0,
    circuitRejections: 0,
  };

  async function runChain(request: TRequest, signal: AbortSignal | undefined): Promise<{ value: TResponse; strategy: string }> {
    return chain.tryAll(
      (strategy) =>
        runWithRetry(
          (attempt) => {
            const identity = identities.next();
            logger.debug('Attempt', {
              strategy: strategy.name,
              attempt,
              identity: identity.id,
              route: identity.route.kind,
            });
            return runWithTimeout(
              (attemptSignal) => transport(request, identity, strategy.profile, attemptSignal),
              fullConfig.attemptTimeoutMs,
              signal
            );
          },
          {
            ...fullConfig.retry,
            isRetryable,
            random,
            sleep,
            signal,
            onRetry: ({ attempt, delayMs, error }) => {
              logger.warn('Attempt failed, retrying', {
                strategy: strategy.name,
                attempt,
                delayMs: Math.round(delayMs),
                error: error.message,
              });
            },
          }
        ),
      { signal }
    );
  }

  async function settleFailure(error: Error, signal: AbortSignal | undefined): Promise<Error> {
    if (error instanceof CancelledError) {
      return error;
    }

    if (error instanceof CircuitOpenError) {
      cooldown.recordFailure();
      return error;
    }

    if (error instanceof StrategyExhaustedError) {
      const state = cooldown.recordFailure();
      const cooldownMs = state.currentCooldownSeconds * 1000;
      if (fullConfig.cooldownMode === 'block') {
        logger.warn('Cooling down after exhausting all strategies', { cooldownMs });
        await sleep(cooldownMs, signal);
      }
      return new StrategyExhaustedError(error.failures, cooldownMs);
    }

    return error;
  }

  async function fetch(request: TRequest, fetchOptions: FetchOptions = {}): Promise<TResponse> {
    const scope = withDeadline(fetchOptions.signal, fetchOptions.deadlineMs);
    const { signal } = scope;
    const timer = logger.startTimer();
    totals.fetches++;

    try {
      await rateLimiter.acquire({ signal, deadlineMs: fetchOptions.deadlineMs });

      const check = circuitBreaker.checkOpen();
      if (!check.allowed) {
        totals.circuitRejections++;
        cooldown.recordFailure();
        logger.warn('Circuit open, failing fast', { retryAfterMs: check.retryAfterMs });
        throw new CircuitOpenError(check.retryAfterMs);
      }

      const settled = await runChain(request, signal).then(
        (value) => ({ ok: true as const, value }),
        (error: unknown) => ({ ok: false as const, error: toError(error) })
      );

      // The probe slot is freed before any cooldown sleep.
      if (check.probe) {
        circuitBreaker.releaseProbe();
      }
      if (!settled.ok) {
        throw await settleFailure(settled.error, signal);
      }

      const outcome = settled.value;
      cooldown.recordSuccess();
      totals.successes++;
      logger.info('Fetch succeeded', {
        strategy: outcome.strategy,
        durationMs: timer.end(),
        circuitState: circuitBreaker.getStats().state,
      });
      return outcome.value;
    } catch (error) {
      const err = toError(error);
      totals.failures++;
      logger.error('Fetch failed', {
        error: err.name,
        message: err.message,
        durationMs: timer.end(),
        circuitState: circuitBreaker.getStats().state,
      });
      throw err;
    } finally {
      scope.dispose();
    }
  }

  function getStats(): ResilientClientStats {
    const breakerStats = circuitBreaker.getStats();
    const limiterStats = rateLimiter.getStats();
    const cooldownState = cooldown.getState();

    return {
      circuitState: breakerStats.state,
      consecutiveFailures: breakerStats.consecutiveFailures,
      strategyRecords: chain.getRecords(),
      currentCooldownSeconds: cooldownState.currentCooldownSeconds,
      consecutiveOperationFailures: cooldownState.consecutiveOperationFailures,
      rateWindowOccupancy: { minute: limiterStats.minute, hour: limiterStats.hour },
      totals: { ...totals },
      identity: identities.getStats(),
    };
  }

  return {
    fetch,
    getStats,
  };
}

// Re-export types and utilities
export type {
  ResilientClient,
  ResilientClientConfig,
  ResilientClientOptions,
  ResilientClientStats,
  FetchOptions,
  Transport,
  Identity,
  IdentityProvider,
  Route,
  StrategyDefinition,
  StrategyProfile,
  StrategyRecord,
  StrategyFailure,
  RandomSource,
  Logger,
  LogLevel,
  LogFormat,
} from './types';
export { CircuitState } from './types';
export {
  CircuitOpenError,
  RateLimitWaitTimeoutError,
  CancelledError,
  TransportTimeoutError,
  UpstreamError,
  RetryExhaustedError,
  StrategyExhaustedError,
  ConfigError,
} from './errors';
export { createLogger, createLoggerFactory } from './logger';
export { createSeededRandom } from './random';
export { createRateLimiter } from './rate-limiter';
export { createCircuitBreaker } from './circuit-breaker';
export { runWithRetry, isRetryableError, backoffBounds } from './retry';
export { createCooldownEscalator } from './cooldown';
export { createStrategyChain } from './strategy-chain';
export { createIdentityProvider } from './identity';
export { DEFAULT_STRATEGIES } from './strategies';
