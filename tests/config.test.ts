import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, unlinkSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { ClientConfigSchema, loadConfig, mergeLoggingWithCli, parseConfig, toClientConfig } from '../src/config';
import { ConfigError } from '../src/reliability/errors';

const TEST_DIR = join(__dirname, '../.test-data');
const TEST_CONFIG_PATH = join(TEST_DIR, 'client-config.json');

describe('ClientConfigSchema', () => {
  it('fills every option from the defaults', () => {
    const config = parseConfig({});

    expect(config).toMatchObject({
      rateLimitPerMinute: 10,
      rateLimitPerHour: 200,
      maxRetries: 3,
      circuitFailureThreshold: 5,
      circuitCooldownSeconds: 60,
      cooldownMode: 'block',
      enableMultiStrategy: true,
      relayEnabled: false,
      relayEndpoint: 'socks5://127.0.0.1:9050',
      dynamicFingerprintRatio: 0.7,
      logLevel: 'info',
      logFormat: 'text',
    });
    expect(config.strategies.map((s) => s.name)).toEqual([
      'android_client',
      'android_music',
      'ios_client',
      'web_embed',
      'tv_embedded',
      'mweb',
      'default',
    ]);
  });

  it('rejects an out-of-range fingerprint ratio', () => {
    expect(ClientConfigSchema.safeParse({ dynamicFingerprintRatio: 1.5 }).success).toBe(false);
  });

  it('rejects a relay the transport cannot use', () => {
    expect(() => parseConfig({ relayEndpoint: 'ftp://relay.local' })).toThrow(
      'Invalid config: relayEndpoint - relay must be an http(s) or socks URL'
    );
    expect(() => parseConfig({ relayEndpoints: ['http://relay.local:8080', 'relay.local'] })).toThrow(
      'Invalid config: relayEndpoints.1 - relay must be an http(s) or socks URL'
    );
  });

  it('rejects an unknown cooldown mode', () => {
    expect(ClientConfigSchema.safeParse({ cooldownMode: 'sleep' }).success).toBe(false);
  });

  it('reports the offending field as a ConfigError', () => {
    let caught: unknown;
    try {
      parseConfig({ rateLimitPerMinute: 0 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect((caught as ConfigError).field).toBe('rateLimitPerMinute');
    expect((caught as ConfigError).message).toMatch(/^Invalid config: rateLimitPerMinute - /);
  });

  it('rejects a retry delay range that is upside down', () => {
    expect(() => parseConfig({ retryDelayMin: 20, retryDelayMax: 10 })).toThrow(
      'Invalid config: retryDelayMin - retryDelayMin must not exceed retryDelayMax'
    );
  });

  it('rejects a jitter range that is upside down', () => {
    expect(() => parseConfig({ jitterMinSeconds: 6, jitterMaxSeconds: 5 })).toThrow(
      'Invalid config: jitterMinSeconds - jitterMinSeconds must not exceed jitterMaxSeconds'
    );
  });

  it('rejects duplicate strategy names', () => {
    const profile = { clients: ['web'] };

    expect(() =>
      parseConfig({
        strategies: [
          { name: 'web', priority: 1, profile },
          { name: 'web', priority: 2, profile },
        ],
      })
    ).toThrow(/strategy names must be unique/);
  });

  it('rejects an empty strategy list', () => {
    expect(() => parseConfig({ strategies: [] })).toThrow(/at least one strategy is required/);
  });
});

describe('toClientConfig', () => {
  it('converts seconds to milliseconds', () => {
    const config = toClientConfig(parseConfig({}));

    expect(config.rateLimiter).toEqual({
      requestsPerMinute: 10,
      requestsPerHour: 200,
      jitterMinMs: 1000,
      jitterMaxMs: 5000,
    });
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 2000, maxDelayMs: 10000 });
    expect(config.circuitBreaker).toEqual({ failureThreshold: 5, cooldownMs: 60000 });
    expect(config.cooldown).toEqual({ baseSeconds: 60, capExponent: 3 });
    expect(config.attemptTimeoutMs).toBe(120000);
    expect(config.identity.rotationPeriodMs).toBe(45000);
  });

  it('puts the primary relay first without duplicating it', () => {
    const config = toClientConfig(
      parseConfig({
        relayEnabled: true,
        relayEndpoint: 'http://relay-a.local:8080',
        relayEndpoints: ['http://relay-b.local:8080', 'http://relay-a.local:8080'],
      })
    );

    expect(config.identity.relayEnabled).toBe(true);
    expect(config.identity.relayEndpoints).toEqual(['http://relay-a.local:8080', 'http://relay-b.local:8080']);
    expect(config.identity.includeDirect).toBe(false);
  });

  it('passes the direct slot option to the identity provider', () => {
    const config = toClientConfig(parseConfig({ relayEnabled: true, relayIncludeDirect: true }));

    expect(config.identity.includeDirect).toBe(true);
    expect(config.identity.relayEndpoints).toEqual(['socks5://127.0.0.1:9050']);
  });
});

describe('loadConfig', () => {
  beforeEach(() => {
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(TEST_CONFIG_PATH)) {
      unlinkSync(TEST_CONFIG_PATH);
    }
  });

  it('loads a valid config file', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({ rateLimitPerMinute: 4, cooldownMode: 'hint' }));

    const config = loadConfig(TEST_CONFIG_PATH);

    expect(config.rateLimitPerMinute).toBe(4);
    expect(config.cooldownMode).toBe('hint');
    expect(config.rateLimitPerHour).toBe(200);
  });

  it('throws a descriptive error for invalid values', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({ maxRetries: -1 }));

    expect(() => loadConfig(TEST_CONFIG_PATH)).toThrow(/maxRetries/);
  });

  it('throws for a missing file', () => {
    expect(() => loadConfig('/nonexistent/client.json')).toThrow('Config file not found: /nonexistent/client.json');
  });

  it('throws for invalid JSON', () => {
    writeFileSync(TEST_CONFIG_PATH, 'not valid json');

    expect(() => loadConfig(TEST_CONFIG_PATH)).toThrow(`Invalid JSON in config file: ${TEST_CONFIG_PATH}`);
  });
});

describe('mergeLoggingWithCli', () => {
  it('uses config values when the CLI leaves them unset', () => {
    const config = parseConfig({ logLevel: 'warn', logFormat: 'json' });

    expect(mergeLoggingWithCli({}, config)).toEqual({ logLevel: 'warn', logFormat: 'json' });
  });

  it('lets CLI values win', () => {
    const config = parseConfig({ logLevel: 'warn', logFormat: 'json' });

    expect(mergeLoggingWithCli({ logLevel: 'debug' }, config)).toEqual({ logLevel: 'debug', logFormat: 'json' });
  });
});
