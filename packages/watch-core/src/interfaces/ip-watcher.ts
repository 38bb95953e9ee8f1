/**
 * IP Watcher Interface
 */

import type { CheckMode, Clock, IAddressProber, RetryConfig, WatchLogger } from '@ipwatch/core';
import type { CheckEvent, CycleResult, HistorySummary } from '../types/index.js';
import type { IChangeDetector } from './change-detector.js';
import type { IHistoryStore } from './history-store.js';

export interface IpWatcherDeps {
  prober: IAddressProber;
  store: IHistoryStore;
  detector: IChangeDetector;
}

export interface IpWatcherConfig {
  /** Retry budget for probing (default: 3 attempts, 5000ms apart) */
  probe?: RetryConfig;
  /** Upper bound for one probe attempt in ms (default: 10000) */
  probeTimeoutMs?: number;
  clock?: Clock;
  logger?: WatchLogger;
}

export interface IIpWatcher {
  /**
   * Probe, evaluate, notify and record one cycle. Never throws for
   * probe, delivery or persistence failures.
   */
  runCycle(mode: CheckMode): Promise<CycleResult>;

  getHistorySummary(): Promise<HistorySummary>;

  cleanup(keepDays?: number): Promise<number>;

  exportHistory(outputPath?: string): Promise<string>;

  getChangeTimeline(days?: number): Promise<CheckEvent[]>;
}
