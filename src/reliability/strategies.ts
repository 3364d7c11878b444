import { z } from 'zod';
import strategyData from '../data/strategies.json';
import type { StrategyDefinition } from './types';

export const StrategyProfileSchema = z.object({
  clients: z.array(z.string()),
  userAgent: z.string().min(1).optional(),
  headers: z.record(z.string()).optional(),
  options: z.record(z.unknown()).optional(),
});

export const StrategyDefinitionSchema = z.object({
  name: z.string().min(1, 'name is required'),
  priority: z.number().int(),
  profile: StrategyProfileSchema,
});

export const StrategyListSchema = z
  .array(StrategyDefinitionSchema)
  .min(1, 'at least one strategy is required')
  .refine((list) => new Set(list.map((s) => s.name)).size === list.length, {
    message: 'strategy names must be unique',
  });

/** Client profiles tried in order when the caller configures none. */
export const DEFAULT_STRATEGIES: StrategyDefinition[] = StrategyListSchema.parse(strategyData);
