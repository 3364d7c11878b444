import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { ConfigError } from './reliability/errors';
import { DEFAULT_STRATEGIES, StrategyListSchema } from './reliability/strategies';
import { isSupportedRelayEndpoint } from './transport/http';
import type { LogFormat, LogLevel, ResilientClientConfig } from './reliability/types';

const RelayEndpointSchema = z
  .string()
  .min(1)
  .refine(isSupportedRelayEndpoint, { message: 'relay must be an http(s) or socks URL' });

export const ClientConfigSchema = z
  .object({
    rateLimitPerMinute: z.number().int().positive().default(10),
    rateLimitPerHour: z.number().int().positive().default(200),
    jitterMinSeconds: z.number().nonnegative().default(1),
    jitterMaxSeconds: z.number().nonnegative().default(5),
    maxRetries: z.number().int().positive().default(3),
    retryDelayMin: z.number().positive().default(2),
    retryDelayMax: z.number().positive().default(10),
    attemptTimeoutSeconds: z.number().positive().default(120),
    circuitFailureThreshold: z.number().int().positive().default(5),
    circuitCooldownSeconds: z.number().int().positive().default(60),
    cooldownBaseSeconds: z.number().int().nonnegative().default(60),
    cooldownCapExponent: z.number().int().nonnegative().default(3),
    cooldownMode: z.enum(['block', 'hint']).default('block'),
    strategies: StrategyListSchema.default(DEFAULT_STRATEGIES),
    enableMultiStrategy: z.boolean().default(true),
    relayEnabled: z.boolean().default(false),
    relayEndpoint: RelayEndpointSchema.default('socks5://127.0.0.1:9050'),
    relayEndpoints: z.array(RelayEndpointSchema).default([]),
    relayIncludeDirect: z.boolean().default(false),
    identityRotationPeriodSeconds: z.number().int().positive().default(45),
    identityRotationEnabled: z.boolean().default(true),
    dynamicFingerprintRatio: z.number().min(0).max(1).default(0.7),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    logFormat: z.enum(['json', 'text']).default('text'),
  })
  .refine((config) => config.retryDelayMin <= config.retryDelayMax, {
    message: 'retryDelayMin must not exceed retryDelayMax',
    path: ['retryDelayMin'],
  })
  .refine((config) => config.jitterMinSeconds <= config.jitterMaxSeconds, {
    message: 'jitterMinSeconds must not exceed jitterMaxSeconds',
    path: ['jitterMinSeconds'],
  });

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export function parseConfig(raw: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(raw);

  if (!result.success) {
    const firstIssue = result.error.issues[0];
    const field = firstIssue.path.join('.') || 'root';
    throw new ConfigError(`Invalid config: ${field} - ${firstIssue.message}`, field);
  }

  return result.data;
}

export function loadConfig(path: string): ClientConfig {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`, 'root');
  }

  const content = readFileSync(path, 'utf-8');
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${path}`, 'root');
  }

  return parseConfig(parsed);
}

export function toClientConfig(config: ClientConfig): ResilientClientConfig {
  const relayEndpoints = [config.relayEndpoint, ...config.relayEndpoints.filter((e) => e !== config.relayEndpoint)];

  return {
    rateLimiter: {
      requestsPerMinute: config.rateLimitPerMinute,
      requestsPerHour: config.rateLimitPerHour,
      jitterMinMs: config.jitterMinSeconds * 1000,
      jitterMaxMs: config.jitterMaxSeconds * 1000,
    },
    retry: {
      maxAttempts: config.maxRetries,
      baseDelayMs: config.retryDelayMin * 1000,
      maxDelayMs: config.retryDelayMax * 1000,
    },
    circuitBreaker: {
      failureThreshold: config.circuitFailureThreshold,
      cooldownMs: config.circuitCooldownSeconds * 1000,
    },
    cooldown: {
      baseSeconds: config.cooldownBaseSeconds,
      capExponent: config.cooldownCapExponent,
    },
    identity: {
      dynamicRatio: config.dynamicFingerprintRatio,
      rotationEnabled: config.identityRotationEnabled,
      relayEnabled: config.relayEnabled,
      relayEndpoints,
      includeDirect: config.relayIncludeDirect,
      rotationPeriodMs: config.identityRotationPeriodSeconds * 1000,
    },
    strategies: config.strategies,
    enableMultiStrategy: config.enableMultiStrategy,
    attemptTimeoutMs: config.attemptTimeoutSeconds * 1000,
    cooldownMode: config.cooldownMode,
  };
}

export interface LoggingSettings {
  logLevel: LogLevel;
  logFormat: LogFormat;
}

export function mergeLoggingWithCli(cli: Partial<LoggingSettings>, config: ClientConfig): LoggingSettings {
  return {
    logLevel: cli.logLevel ?? config.logLevel,
    logFormat: cli.logFormat ?? config.logFormat,
  };
}
