#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from './config.js';
import { defaultOperations, getOperationsByName } from './operations/index.js';
import { StressClient } from './stress-client.js';

type RunOptions = {
  serverUri?: string;
  concurrency?: string;
  timeout?: string;
  seed?: string;
  displayInterval?: string;
  maxContentLength?: string;
  maxParameters?: string;
  ops?: string;
  duration?: string;
  list?: boolean;
};

const program = new Command();

program
  .name('http-stress')
  .description('Drive randomized concurrent HTTP traffic at a server until stopped and report failures')
  .version('1.0.0');

program
  .command('run', { isDefault: true })
  .description('Run the stress client against a server (Ctrl+C to stop)')
  .option('-s, --server-uri <uri>', 'Target server base address (STRESS_SERVER_URI)')
  .option('-c, --concurrency <number>', 'Number of concurrent workers (STRESS_CONCURRENCY)')
  .option('-t, --timeout <ms>', 'Per-request timeout in milliseconds (STRESS_REQUEST_TIMEOUT_MS)')
  .option('--seed <number>', 'Base random seed (STRESS_RANDOM_SEED)')
  .option('-i, --display-interval <ms>', 'Snapshot interval in milliseconds (STRESS_DISPLAY_INTERVAL_MS)')
  .option('--max-content-length <chars>', 'Largest request body (STRESS_MAX_CONTENT_LENGTH)')
  .option('--max-parameters <number>', 'Most query parameters or headers per request (STRESS_MAX_PARAMETERS)')
  .option('--ops <names>', 'Operations to run (comma-separated)')
  .option('-d, --duration <seconds>', 'Stop automatically after this many seconds')
  .option('--list', 'List available operations and exit')
  .action(async (_options: unknown, command: Command) => {
    const options = command.opts<RunOptions>();

    if (options.list) {
      defaultOperations.forEach((op, i) => console.log(`${i}: ${op.name}`));
      return;
    }

    try {
      const cfg = loadConfig({
        serverUri: options.serverUri,
        concurrency: options.concurrency,
        requestTimeoutMs: options.timeout,
        randomSeed: options.seed,
        displayIntervalMs: options.displayInterval,
        maxContentLength: options.maxContentLength,
        maxParameters: options.maxParameters,
      });

      const operations = options.ops
        ? getOperationsByName(options.ops.split(','))
        : [...defaultOperations];

      if (operations.length === 0) {
        console.error(`No operations found matching: ${options.ops}`);
        console.error('Available operations:', defaultOperations.map(op => op.name).join(', '));
        process.exit(2);
      }

      const durationSeconds = options.duration === undefined ? undefined : Number(options.duration);
      if (durationSeconds !== undefined && !(Number.isFinite(durationSeconds) && durationSeconds > 0)) {
        throw new Error(`Invalid duration: ${options.duration}`);
      }

      console.log(`Server: ${cfg.serverUri}`);
      console.log(`Concurrency: ${cfg.concurrency}, timeout: ${cfg.requestTimeoutMs}ms, seed: ${cfg.randomSeed}`);
      console.log(`Operations: ${operations.map(op => op.name).join(', ')}`);

      const client = new StressClient(operations, cfg);

      let shuttingDown = false;
      const shutdown = async () => {
        if (shuttingDown) return;
        shuttingDown = true;
        await client.stop();
        client.printFinalReport();
        process.exit(client.totalErrorCount > 0 ? 1 : 0);
      };
      const onSignal = () => {
        shutdown().catch(error => {
          console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
          process.exit(2);
        });
      };

      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      await client.start();

      if (durationSeconds !== undefined) {
        setTimeout(onSignal, durationSeconds * 1000);
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error(`Error: ${error.message}`);
      } else {
        console.error('An unknown error occurred');
      }
      process.exit(2);
    }
  });

program.parseAsync().catch(error => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(2);
});
