/**
 * History Types
 *
 * Shape of the persisted history file. Field names are part of the on-disk
 * contract; optional values are stored as null.
 */

import type { CheckMode } from '@ipwatch/core';

/** ISO-8601 timestamp in UTC */
export type IsoTimestamp = string;

export interface HistoryMetadata {
  createdAt: IsoTimestamp;
  lastUpdated: IsoTimestamp;
  schemaVersion: string;
  /** Lifetime count of committed checks, unaffected by pruning */
  totalChecks: number;
}

/** What we believe the addresses are right now */
export interface CurrentState {
  publicIp: string | null;
  localIp: string | null;
  lastUpdated: IsoTimestamp;
  lastNotificationSent: IsoTimestamp | null;
}

/** Lifetime aggregates, never recomputed from the pruned event log */
export interface HistoryStatistics {
  totalIpChanges: number;
  totalNotificationsSent: number;
  lastChangeDate: IsoTimestamp | null;
  checkFrequencyByMode: Record<string, number>;
}

/**
 * One committed check. Immutable once written.
 */
export interface CheckEvent {
  timestamp: IsoTimestamp;
  publicIp: string | null;
  localIp: string | null;
  mode: CheckMode;
  ipChanged: boolean;
  notificationSent: boolean;
  durationSeconds: number;
  /** Present only when ipChanged and an earlier address was known */
  previousPublicIp?: string;
}

export interface HistoryRecord {
  metadata: HistoryMetadata;
  current: CurrentState;
  statistics: HistoryStatistics;
  events: CheckEvent[];
}

/**
 * Read-only projection for status reporting
 */
export interface HistorySummary {
  metadata: HistoryMetadata;
  current: CurrentState;
  statistics: HistoryStatistics;
  /** Share of lifetime checks per mode, in percent with one decimal */
  frequencyPercentage: Record<string, number>;
  /** Up to ten newest events, newest first */
  recentActivity: CheckEvent[];
  /** Events still retained in the log */
  totalEventRecords: number;
  /** Human-readable size of the history file */
  historyFileSize: string;
}
