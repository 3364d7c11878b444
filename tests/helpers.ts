import type { Logger, LoggerFactory, StrategyDefinition } from '../src/reliability/types';

export function createSilentLogger(): Logger {
  return {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    startTimer: () => ({ end: () => 0 }),
  };
}

export const silentLoggers: LoggerFactory = () => createSilentLogger();

export function strategy(name: string, priority: number): StrategyDefinition {
  return { name, priority, profile: { clients: [name] } };
}
