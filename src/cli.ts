import { parseArgs } from 'node:util';
import type { LogLevel, LogFormat } from './reliability/types';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'text'];

export interface CliOptions {
  urls: string[];
  concurrency: number;
  help: boolean;
  stats: boolean;
  logFormat?: LogFormat;
  logLevel?: LogLevel;
  configPath?: string;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Parses command-line arguments into CLI options.
 */
export function parseCliArgs(args: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args,
    options: {
      concurrency: {
        type: 'string',
        short: 'n',
        default: '1',
      },
      help: {
        type: 'boolean',
        short: 'h',
        default: false,
      },
      stats: {
        type: 'boolean',
        default: false,
      },
      'log-format': {
        type: 'string',
      },
      'log-level': {
        type: 'string',
      },
      config: {
        type: 'string',
        short: 'c',
      },
    },
    allowPositionals: true,
  });

  const concurrency = parseInt(values.concurrency ?? '1', 10);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Invalid --concurrency: ${values.concurrency}`);
  }

  const logFormat = values['log-format'];
  if (logFormat !== undefined && !isLogFormat(logFormat)) {
    throw new Error(`Invalid --log-format: ${logFormat}`);
  }

  const logLevel = values['log-level'];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new Error(`Invalid --log-level: ${logLevel}`);
  }

  return {
    urls: positionals,
    concurrency,
    help: values.help ?? false,
    stats: values.stats ?? false,
    logFormat,
    logLevel,
    configPath: values.config,
  };
}

/**
 * Prints usage information to the console.
 */
export function printUsage(): void {
  console.log(`
Usage: resilient-fetch [options] <url...>

Options:
  --config, -c        Path to JSON config file
  --concurrency, -n   Parallel fetches sharing one client (default: 1)
  --stats             Print client stats after the run
  --log-format        Log format: text or json (default: text)
  --log-level         Log level: debug, info, warn, error (default: info)
  --help, -h          Show this help message

Examples:
  resilient-fetch https://example.com/watch?v=abc
  resilient-fetch -n 3 https://example.com/a https://example.com/b
  resilient-fetch --config client.json --log-format json --stats https://example.com/a
`);
}
