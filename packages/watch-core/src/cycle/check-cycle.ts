/**
 * IP Watcher
 *
 * Entry point for the front end: one call per scheduled tick or manual
 * invocation.
 */

import {
  WatchError,
  isTransientError,
  silentLogger,
  systemClock,
  withRetries,
  withTimeout,
  wrapError,
  type AddressSnapshot,
  type CheckMode,
  type Clock,
  type IAddressProber,
  type RetryConfig,
  type WatchLogger,
} from '@ipwatch/core';
import type {
  IChangeDetector,
  IHistoryStore,
  IIpWatcher,
  IpWatcherConfig,
  IpWatcherDeps,
} from '../interfaces/index.js';
import type { CheckEvent, CycleResult, HistorySummary } from '../types/index.js';

export const DEFAULT_PROBE_RETRY: Required<RetryConfig> = {
  attempts: 3,
  delayMs: 5000,
};

export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

export class IpWatcher implements IIpWatcher {
  private readonly prober: IAddressProber;
  private readonly store: IHistoryStore;
  private readonly detector: IChangeDetector;
  private readonly probeRetry: RetryConfig;
  private readonly probeTimeoutMs: number;
  private readonly clock: Clock;
  private readonly logger: WatchLogger;

  constructor(deps: IpWatcherDeps, config: IpWatcherConfig = {}) {
    this.prober = deps.prober;
    this.store = deps.store;
    this.detector = deps.detector;
    this.probeRetry = {
      attempts: config.probe?.attempts ?? DEFAULT_PROBE_RETRY.attempts,
      delayMs: config.probe?.delayMs ?? DEFAULT_PROBE_RETRY.delayMs,
    };
    this.probeTimeoutMs = config.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? silentLogger;
  }

  async runCycle(mode: CheckMode): Promise<CycleResult> {
    const startedAt = this.clock.now();
    this.logger.info('Starting check cycle', { mode });

    let snapshot: AddressSnapshot;
    try {
      snapshot = await this.probe();
    } catch (err) {
      const wrapped = wrapError(err, 'PROBE_FAILED');
      this.logger.error('Address probe failed', { mode, code: wrapped.code, error: wrapped.message });
      return this.probeFailed(mode, wrapped, startedAt);
    }

    const result = await this.detector.process(snapshot, mode, startedAt);
    this.logger.info('Check cycle finished', {
      mode,
      success: result.success,
      ipChanged: result.ipChanged,
      notificationSent: result.notificationSent,
      durationSeconds: result.durationSeconds,
    });
    return result;
  }

  private probe(): Promise<AddressSnapshot> {
    return withRetries(
      async (ctx) => {
        if (ctx.attempt > 1) {
          this.logger.warn('Retrying address probe', { attempt: ctx.attempt, attempts: ctx.attempts });
        }
        return withTimeout(this.prober.probe(), this.probeTimeoutMs, 'Address probe');
      },
      this.probeRetry,
      isTransientError
    );
  }

  private probeFailed(mode: CheckMode, err: WatchError, startedAt: Date): CycleResult {
    const now = this.clock.now();
    return {
      mode,
      timestamp: now,
      ipChanged: false,
      shouldNotify: false,
      notificationSent: false,
      recorded: false,
      durationSeconds: Math.max(0, Math.round((now.getTime() - startedAt.getTime()) / 10) / 100),
      success: false,
      failures: [{ stage: 'probe', code: err.code, message: err.message }],
    };
  }

  async getHistorySummary(): Promise<HistorySummary> {
    await this.store.load();
    return this.store.getSummary();
  }

  async cleanup(keepDays?: number): Promise<number> {
    await this.store.load();
    return this.store.cleanupOldRecords(keepDays);
  }

  async exportHistory(outputPath?: string): Promise<string> {
    await this.store.load();
    return this.store.exportHistory(outputPath);
  }

  async getChangeTimeline(days?: number): Promise<CheckEvent[]> {
    await this.store.load();
    return this.store.getChangeTimeline(days);
  }
}
