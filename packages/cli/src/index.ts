/**
 * @ipwatch/cli
 *
 * Configuration, logging, scheduling and the command line front end.
 */

export { createApp, runCommand, startDaemon, DEFAULT_TIMELINE_DAYS } from './app.js';
export type { App, AppOverrides, OneShotCommand } from './app.js';
export { COMMANDS, USAGE, UsageError, parseArgs } from './args.js';
export type { CliArgs, Command } from './args.js';
export {
  ConfigError,
  configSchema,
  configFromEnv,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
  redactConfig,
} from './config.js';
export type { AppConfig, Env, LoadConfigOptions, LoggingConfig } from './config.js';
export { Logger, RotatingFileSink, createLogger, redactSecrets } from './logger.js';
export type { LogFormat, LogLevel, LoggerOptions, LogStream } from './logger.js';
export { DailyScheduler, getNextRun } from './scheduler.js';
export type { DailySchedulerOptions } from './scheduler.js';
