import { CancelledError, CircuitOpenError, StrategyExhaustedError, toError } from './errors';
import { createLogger } from './logger';
import { cancellationFrom } from './timing';
import { CircuitState } from './types';
import type {
  ChainSuccess,
  CircuitBreaker,
  Logger,
  StrategyChain,
  StrategyDefinition,
  StrategyFailure,
  StrategyRecord,
} from './types';

export interface StrategyChainOptions {
  strategies: StrategyDefinition[];
  circuitBreaker: CircuitBreaker;
  enableMultiStrategy?: boolean;
  logger?: Logger;
}

/**
 * Orders strategies by priority, keeping declaration order for ties.
 */
export function orderStrategies(strategies: StrategyDefinition[]): StrategyDefinition[] {
  return strategies
    .map((strategy, index) => ({ strategy, index }))
    .sort((a, b) => a.strategy.priority - b.strategy.priority || a.index - b.index)
    .map(({ strategy }) => strategy);
}

export function createStrategyChain(options: StrategyChainOptions): StrategyChain {
  const { circuitBreaker } = options;
  const logger = options.logger ?? createLogger('StrategyChain', 'info');

  if (options.strategies.length === 0) {
    throw new Error('Strategy chain needs at least one strategy');
  }

  const ordered = orderStrategies(options.strategies);
  const active = options.enableMultiStrategy === false ? ordered.slice(0, 1) : ordered;

  const records: StrategyRecord[] = active.map((strategy) => ({
    name: strategy.name,
    priority: strategy.priority,
    profile: strategy.profile,
    successCount: 0,
    failureCount: 0,
  }));

  logger.debug('Strategy chain ready', {
    strategies: records.map((r) => r.name),
    multiStrategy: options.enableMultiStrategy !== false,
  });

  async function tryAll<T>(
    execute: (strategy: StrategyRecord) => Promise<T>,
    tryOptions: { signal?: AbortSignal } = {}
  ): Promise<ChainSuccess<T>> {
    const failures: StrategyFailure[] = [];

    for (const [index, record] of records.entries()) {
      if (tryOptions.signal?.aborted) {
        throw cancellationFrom(tryOptions.signal);
      }

      logger.info(`Strategy [${index + 1}/${records.length}]: ${record.name}`, {
        clients: record.profile.clients,
      });

      try {
        const value = await execute(record);
        record.successCount++;
        record.lastOutcomeAt = Date.now();
        circuitBreaker.reportSuccess();
        logger.info('Strategy succeeded', { strategy: record.name });
        return { value, strategy: record.name };
      } catch (error) {
        const err = toError(error);
        if (err instanceof CancelledError) {
          throw err;
        }

        record.failureCount++;
        record.lastOutcomeAt = Date.now();
        circuitBreaker.reportFailure();
        failures.push({ strategy: record.name, message: err.message, cause: err });
        logger.warn('Strategy failed', { strategy: record.name, error: err.message });

        // Reading stats never claims the half-open trial slot.
        const breaker = circuitBreaker.getStats();
        if (breaker.state === CircuitState.OPEN && index < records.length - 1) {
          logger.error('Circuit opened mid-chain, aborting remaining strategies', {
            failedStrategies: failures.map((f) => f.strategy),
          });
          throw new CircuitOpenError(breaker.retryAfterMs);
        }
      }
    }

    logger.error(`All ${records.length} strategies failed`, {
      failures: failures.map((f) => `${f.strategy}: ${f.message}`),
    });
    throw new StrategyExhaustedError(failures);
  }

  function getStrategy(name: string): StrategyRecord | undefined {
    const record = records.find((r) => r.name === name);
    return record === undefined ? undefined : { ...record };
  }

  function getRecords(): StrategyRecord[] {
    return records.map((record) => ({ ...record }));
  }

  return {
    tryAll,
    getStrategy,
    getRecords,
  };
}
