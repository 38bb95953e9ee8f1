#!/usr/bin/env -S node --import tsx
/**
 * CLI entry point
 *
 * Usage:
 *   ipwatch daemon --env-file ./.env
 *   ipwatch manual --config ./ipwatch.json
 */

import { wrapError } from '@ipwatch/core';
import { USAGE, UsageError, parseArgs, type CliArgs } from './args.js';
import { ConfigError, loadConfig } from './config.js';
import { Logger, createLogger } from './logger.js';
import { createApp, runCommand, startDaemon, type App } from './app.js';

function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

function waitForShutdown(app: App): Promise<number> {
  const scheduler = startDaemon(app);

  return new Promise<number>((resolve) => {
    let stopping = false;
    const shutdown = async (signal: string) => {
      if (stopping) return;
      stopping = true;
      app.logger.info('Shutting down', { signal });
      await scheduler.stop();
      app.logger.info('Shutdown complete', { signal });
      resolve(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  });
}

async function main(argv: readonly string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      console.error('');
      console.error(USAGE);
      return 1;
    }
    throw err;
  }

  if (args.help) {
    print(USAGE);
    return 0;
  }
  const command = args.command;
  if (!command) {
    console.error(USAGE);
    return 1;
  }

  let logger = new Logger();
  try {
    const config = await loadConfig({ configPath: args.configPath, envFile: args.envFile });
    logger = createLogger({
      ...config.logging,
      level: args.verbose ? 'debug' : config.logging.level,
    });

    const app = createApp(config, logger);
    if (command === 'daemon') {
      return await waitForShutdown(app);
    }
    return await runCommand(command, args, app, print);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 1;
    }
    const error = wrapError(err);
    logger.error('Command failed', { command, code: error.code, error: error.message });
    console.error(error.toActionableMessage());
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
