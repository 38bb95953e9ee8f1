/**
 * Wiring from configuration to the watcher, and the one-shot commands
 */

import { resolve } from 'node:path';
import { systemClock, type Clock, type IAddressProber, type INotifier } from '@ipwatch/core';
import {
  ChangeDetector,
  HistoryStore,
  IpWatcher,
  NotificationFormatter,
  formatChangeTimeline,
  formatCycleResult,
  formatHistorySummary,
} from '@ipwatch/watch-core';
import { AddressProber, PublicIpClient } from '@ipwatch/probe';
import { DiscordNotifier } from '@ipwatch/notifier-discord';
import type { CliArgs, Command } from './args.js';
import { redactConfig, type AppConfig } from './config.js';
import type { Logger } from './logger.js';
import { DailyScheduler } from './scheduler.js';

export interface App {
  config: AppConfig;
  logger: Logger;
  store: HistoryStore;
  notifier: INotifier;
  watcher: IpWatcher;
}

export interface AppOverrides {
  prober?: IAddressProber;
  notifier?: INotifier;
  clock?: Clock;
  /** Base directory for relative history paths (default: process.cwd()) */
  cwd?: string;
}

export const DEFAULT_TIMELINE_DAYS = 7;

export function createApp(config: AppConfig, logger: Logger, overrides: AppOverrides = {}): App {
  const clock = overrides.clock ?? systemClock;

  const store = new HistoryStore({
    filePath: resolve(overrides.cwd ?? process.cwd(), config.history.filePath),
    keepDays: config.history.keepDays,
    maxRecords: config.history.maxRecords,
    autoCleanup: config.history.autoCleanup,
    backupOnCorruption: config.history.backupOnCorruption,
    clock,
    logger: logger.child({ component: 'history' }),
  });

  const prober =
    overrides.prober ??
    new AddressProber({
      checkLocalIp: config.probe.checkLocalIp,
      checkPublicIp: config.probe.checkPublicIp,
      publicIpClient: new PublicIpClient({
        services: config.probe.services,
        timeoutMs: config.probe.timeoutMs,
        logger: logger.child({ component: 'probe' }),
      }),
      clock,
      logger: logger.child({ component: 'probe' }),
    });

  const notifier =
    overrides.notifier ??
    new DiscordNotifier({
      webhookUrl: config.discord.webhookUrl,
      username: config.discord.username,
      timeoutMs: config.discord.timeoutMs,
      logger: logger.child({ component: 'discord' }),
    });

  const detector = new ChangeDetector(
    {
      store,
      notifier,
      formatter: new NotificationFormatter({ template: config.discord.messageTemplate }),
    },
    {
      delivery: { attempts: config.discord.retryAttempts, delayMs: config.discord.retryDelayMs },
      clock,
      logger: logger.child({ component: 'detector' }),
    }
  );

  const watcher = new IpWatcher(
    { prober, store, detector },
    {
      probe: { attempts: config.probe.retryAttempts, delayMs: config.probe.retryDelayMs },
      // One attempt may walk every service in turn.
      probeTimeoutMs: config.probe.timeoutMs * config.probe.services.length,
      clock,
      logger,
    }
  );

  return { config, logger, store, notifier, watcher };
}

export type OneShotCommand = Exclude<Command, 'daemon'>;

/**
 * Run a non-daemon command, writing its report through `out`.
 *
 * @returns process exit code
 */
export async function runCommand(
  command: OneShotCommand,
  args: CliArgs,
  app: App,
  out: (text: string) => void
): Promise<number> {
  switch (command) {
    case 'manual': {
      const result = await app.watcher.runCycle('manual');
      out(formatCycleResult(result));
      return result.success ? 0 : 1;
    }

    case 'test': {
      const result = await app.watcher.runCycle('test');
      out(formatCycleResult(result));
      const reachable = app.notifier.testConnection ? await app.notifier.testConnection() : true;
      out(`Webhook: ${reachable ? 'reachable' : 'unreachable'}`);
      return result.success && reachable ? 0 : 1;
    }

    case 'status': {
      const days = args.days ?? DEFAULT_TIMELINE_DAYS;
      const summary = await app.watcher.getHistorySummary();
      const timeline = await app.watcher.getChangeTimeline(days);
      out(`${formatHistorySummary(summary)}\n\n${formatChangeTimeline(timeline, days)}`);
      return 0;
    }

    case 'check':
      out(JSON.stringify(redactConfig(app.config), null, 2));
      return 0;

    case 'cleanup': {
      const days = args.days ?? app.config.history.keepDays;
      const removed = await app.watcher.cleanup(days);
      out(`Removed ${removed} event(s) older than ${days} day(s)`);
      return 0;
    }

    case 'export': {
      const exported = await app.watcher.exportHistory(args.out);
      out(`History exported to ${exported}`);
      return 0;
    }

    default: {
      const exhaustive: never = command;
      throw new Error(`Unhandled command: ${String(exhaustive)}`);
    }
  }
}

/**
 * Start the daily scheduled check. The caller owns `stop()`.
 */
export function startDaemon(app: App): DailyScheduler {
  const scheduler = new DailyScheduler({
    time: app.config.schedule.time,
    logger: app.logger.child({ component: 'scheduler' }),
    task: async () => {
      const result = await app.watcher.runCycle('scheduled');
      if (!result.success) {
        app.logger.warn('Scheduled check finished with failures', {
          failures: result.failures.map((f) => `${f.stage}:${f.code}`),
        });
      }
    },
  });

  const next = scheduler.start();
  app.logger.info('Daemon started', { schedule: app.config.schedule.time, nextRun: next });
  return scheduler;
}
