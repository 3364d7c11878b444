import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../src/cli';

describe('parseCliArgs', () => {
  it('collects positional urls', () => {
    const result = parseCliArgs(['https://example.test/a', 'https://example.test/b']);

    expect(result.urls).toEqual(['https://example.test/a', 'https://example.test/b']);
  });

  it('sets default values', () => {
    const result = parseCliArgs([]);

    expect(result).toEqual({
      urls: [],
      concurrency: 1,
      help: false,
      stats: false,
      logFormat: undefined,
      logLevel: undefined,
      configPath: undefined,
    });
  });

  it('-n sets concurrency', () => {
    expect(parseCliArgs(['-n', '4']).concurrency).toBe(4);
    expect(parseCliArgs(['--concurrency', '2']).concurrency).toBe(2);
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => parseCliArgs(['-n', '0'])).toThrow('Invalid --concurrency: 0');
    expect(() => parseCliArgs(['-n', 'many'])).toThrow('Invalid --concurrency: many');
  });

  it('--help and -h return help flag', () => {
    expect(parseCliArgs(['--help']).help).toBe(true);
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  it('--stats sets stats flag', () => {
    expect(parseCliArgs(['--stats', 'https://example.test/a']).stats).toBe(true);
  });

  it('--log-format json sets logFormat to json', () => {
    expect(parseCliArgs(['--log-format', 'json']).logFormat).toBe('json');
  });

  it('rejects an unknown log format', () => {
    expect(() => parseCliArgs(['--log-format', 'xml'])).toThrow('Invalid --log-format: xml');
  });

  it('--log-level debug sets logLevel to debug', () => {
    expect(parseCliArgs(['--log-level', 'debug']).logLevel).toBe('debug');
  });

  it('rejects an unknown log level', () => {
    expect(() => parseCliArgs(['--log-level', 'verbose'])).toThrow('Invalid --log-level: verbose');
  });

  it('--config and -c set configPath', () => {
    expect(parseCliArgs(['--config', 'client.json']).configPath).toBe('client.json');
    expect(parseCliArgs(['-c', 'other.json']).configPath).toBe('other.json');
  });
});
