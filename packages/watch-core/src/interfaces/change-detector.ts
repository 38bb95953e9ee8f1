/**
 * Change Detector Interface
 */

import type {
  AddressSnapshot,
  CheckMode,
  Clock,
  INotifier,
  RetryConfig,
  WatchLogger,
} from '@ipwatch/core';
import type { CheckDecision, CycleResult } from '../types/index.js';
import type { NotificationFormatter } from '../formatters/index.js';
import type { IHistoryStore } from './history-store.js';

/**
 * Collaborators the ChangeDetector works against
 */
export interface ChangeDetectorDeps {
  store: IHistoryStore;
  notifier: INotifier;
  /** Default: the stock template */
  formatter?: NotificationFormatter;
}

/**
 * Configuration for the ChangeDetector
 */
export interface ChangeDetectorConfig {
  /** Retry budget for notification delivery (default: 3 attempts, 5000ms apart) */
  delivery?: RetryConfig;
  clock?: Clock;
  logger?: WatchLogger;
}

export interface IChangeDetector {
  /**
   * Decide whether the snapshot is a change and whether to notify.
   * Reads the store, never writes it.
   *
   * @throws WatchError INVALID_ADDRESS when the snapshot has no public address
   */
  evaluate(snapshot: AddressSnapshot, mode: CheckMode): Promise<CheckDecision>;

  /**
   * Evaluate, notify when due, and record the outcome (except in test mode).
   * Delivery and persistence errors are reported in the result, not thrown.
   */
  process(snapshot: AddressSnapshot, mode: CheckMode, startedAt?: Date): Promise<CycleResult>;
}
