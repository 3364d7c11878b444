import { z } from 'zod';
import fingerprintData from '../data/fingerprints.json';
import { createLogger } from './logger';
import { pick, randomInt } from './random';
import type { FingerprintSource, Identity, IdentityConfig, IdentityProvider, IdentityStats, Logger, RandomSource, Route } from './types';

export const FingerprintTemplateSchema = z.object({
  browser: z.string().min(1),
  template: z.string().min(1),
  platforms: z.array(z.string().min(1)).min(1),
  majorMin: z.number().int().positive(),
  majorMax: z.number().int().positive(),
  patchMax: z.number().int().nonnegative(),
});

export const FingerprintPoolsSchema = z.object({
  static: z.array(z.string().min(1)).min(1, 'static pool must not be empty'),
  dynamic: z.array(FingerprintTemplateSchema),
});

export type FingerprintTemplate = z.infer<typeof FingerprintTemplateSchema>;
export type FingerprintPools = z.infer<typeof FingerprintPoolsSchema>;

export const DEFAULT_FINGERPRINT_POOLS: FingerprintPools = FingerprintPoolsSchema.parse(fingerprintData);

export function generateFingerprint(template: FingerprintTemplate, random: RandomSource): string {
  const values: Record<string, string> = {
    platform: pick(random, template.platforms),
    major: String(randomInt(random, template.majorMin, template.majorMax)),
    build: String(randomInt(random, 5000, 6999)),
    patch: String(randomInt(random, 0, template.patchMax)),
  };
  return template.template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export interface IdentityProviderDeps {
  random?: RandomSource;
  logger?: Logger;
  pools?: FingerprintPools;
}

export function createIdentityProvider(config: IdentityConfig, deps: IdentityProviderDeps = {}): IdentityProvider {
  const random = deps.random ?? Math.random;
  const logger = deps.logger ?? createLogger('IdentityProvider', 'info');
  const pools = deps.pools ?? DEFAULT_FINGERPRINT_POOLS;

  if (config.relayEnabled && config.relayEndpoints.length === 0) {
    throw new Error('Relay mode is enabled but no relay endpoint is configured');
  }

  const startedAt = Date.now();
  let issued = 0;
  let dynamicIssued = 0;
  let staticIssued = 0;
  let lastEpoch = -1;
  const poolSize = config.relayEndpoints.length + (config.includeDirect ? 1 : 0);

  function currentRoute(now: number): Route {
    if (!config.relayEnabled) {
      return { kind: 'direct' };
    }

    // Rotation follows the clock, not the number of requests.
    const epoch = Math.floor((now - startedAt) / config.rotationPeriodMs);
    const slot = epoch % poolSize;
    const endpoint = slot < config.relayEndpoints.length ? config.relayEndpoints[slot] : undefined;
    if (epoch !== lastEpoch) {
      lastEpoch = epoch;
      logger.debug('Relay rotated', { epoch, endpoint: endpoint ?? 'direct' });
    }
    if (endpoint === undefined) {
      return { kind: 'direct' };
    }
    return { kind: 'relayed', relayId: `relay-${epoch}`, endpoint };
  }

  function nextFingerprint(): { fingerprint: string; source: FingerprintSource } {
    if (!config.rotationEnabled) {
      return { fingerprint: pools.static[0], source: 'static' };
    }
    if (pools.dynamic.length > 0 && random() < config.dynamicRatio) {
      return { fingerprint: generateFingerprint(pick(random, pools.dynamic), random), source: 'dynamic' };
    }
    return { fingerprint: pick(random, pools.static), source: 'static' };
  }

  function next(): Identity {
    const now = Date.now();
    const { fingerprint, source } = nextFingerprint();
    issued++;
    if (source === 'dynamic') {
      dynamicIssued++;
    } else {
      staticIssued++;
    }

    const identity: Identity = Object.freeze({
      id: issued,
      fingerprint,
      route: currentRoute(now),
      source,
      issuedAt: now,
    });
    logger.debug('Identity issued', { id: identity.id, source, fingerprint: fingerprint.slice(0, 80) });
    return identity;
  }

  function getStats(): IdentityStats {
    const route = currentRoute(Date.now());

    return {
      issued,
      dynamicIssued,
      staticIssued,
      staticPoolSize: pools.static.length,
      relayEnabled: config.relayEnabled,
      relayPoolSize: config.relayEnabled ? poolSize : 0,
      currentRelay: route.kind === 'relayed' ? route.relayId : undefined,
    };
  }

  return {
    next,
    getStats,
  };
}
