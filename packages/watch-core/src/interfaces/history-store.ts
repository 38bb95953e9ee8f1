/**
 * History Store Interface
 *
 * Sole reader and writer of the persisted HistoryRecord.
 */

import type { AddressSnapshot, CheckMode, Clock, WatchLogger } from '@ipwatch/core';
import type {
  CheckEvent,
  HistoryRecord,
  HistoryStatistics,
  HistorySummary,
} from '../types/index.js';

/**
 * Configuration for the HistoryStore
 */
export interface HistoryStoreConfig {
  /** Location of the JSON file (default: 'data/ip_history.json') */
  filePath?: string;
  /** Retention window in days for event cleanup (default: 30) */
  keepDays?: number;
  /** Hard cap on retained events, oldest evicted first (default: 1000) */
  maxRecords?: number;
  /** Run age-based cleanup after each recorded check (default: true) */
  autoCleanup?: boolean;
  /** Copy an unreadable file aside before reinitialising (default: true) */
  backupOnCorruption?: boolean;
  clock?: Clock;
  logger?: WatchLogger;
}

export interface IHistoryStore {
  /**
   * Read the persisted record, or a fresh one when none exists.
   * A corrupt file is backed up and replaced by a fresh record in memory.
   *
   * @throws WatchError HISTORY_READ_FAILED when the file exists but cannot be read
   */
  load(): Promise<HistoryRecord>;

  /**
   * Atomically persist the record.
   *
   * @returns false when the write failed; the previous file is left intact
   */
  save(record: HistoryRecord): Promise<boolean>;

  getLastPublicIp(): string | undefined;

  /**
   * Whether the candidate differs from the committed public address.
   * The first observation always counts as a change.
   */
  hasChanged(candidatePublicIp: string): boolean;

  /**
   * Append a check event, update current state and statistics, and persist.
   * Loads the file first if `load()` has not been called yet.
   *
   * @returns false when the event was not persisted
   */
  recordCheck(
    snapshot: AddressSnapshot,
    mode: CheckMode,
    notificationSent: boolean,
    durationSeconds?: number
  ): Promise<boolean>;

  getStatistics(): HistoryStatistics;

  /**
   * Drop events older than the window, always keeping the newest one.
   * Loads the file first if `load()` has not been called yet.
   *
   * @returns number of events removed
   * @throws WatchError HISTORY_WRITE_FAILED when the pruned record could not be saved
   */
  cleanupOldRecords(keepDays?: number): Promise<number>;

  getSummary(): Promise<HistorySummary>;

  getChangeTimeline(days?: number): CheckEvent[];

  exportHistory(outputPath?: string): Promise<string>;
}
