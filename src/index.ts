#!/usr/bin/env node
import { parseCliArgs, printUsage } from './cli';
import { loadConfig, parseConfig, toClientConfig, mergeLoggingWithCli, type ClientConfig } from './config';
import { createResilientClient } from './reliability';
import { createLogger, createLoggerFactory } from './reliability/logger';
import { createHttpTransport, type HttpRequest } from './transport/http';
import { fetchAll } from './batch';

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help || options.urls.length === 0) {
    printUsage();
    return options.help ? 0 : 1;
  }

  const config: ClientConfig = options.configPath ? loadConfig(options.configPath) : parseConfig({});
  const logging = mergeLoggingWithCli(options, config);
  const logger = createLogger('cli', logging.logLevel, logging.logFormat);

  const client = createResilientClient({
    transport: createHttpTransport(),
    config: toClientConfig(config),
    createLogger: createLoggerFactory(logging.logLevel, logging.logFormat),
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, cancelling in-flight fetches');
    controller.abort();
  });

  const requests: HttpRequest[] = options.urls.map((url) => ({ url }));
  const outcomes = await fetchAll(client, requests, {
    concurrency: options.concurrency,
    signal: controller.signal,
    onSettled: (progress) => {
      logger.info('Progress', { ...progress });
    },
  });

  console.log('\n=== FETCH SUMMARY ===');
  for (const outcome of outcomes) {
    if (outcome.ok) {
      console.log(`OK    ${outcome.value.status} ${outcome.request.url} (${outcome.value.body.length} bytes)`);
    } else {
      console.log(`FAIL  ${outcome.request.url}: ${outcome.error.name}: ${outcome.error.message}`);
    }
  }

  if (options.stats) {
    console.log('\n=== CLIENT STATS ===');
    console.log(JSON.stringify(client.getStats(), null, 2));
  }

  return outcomes.every((o) => o.ok) ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
