/**
 * Construction helpers for HistoryRecord
 */

import { CHECK_MODES } from '@ipwatch/core';
import type { HistoryRecord, HistoryStatistics } from '../types/index.js';
import { HISTORY_SCHEMA_VERSION } from './history-schema.js';

export function createEmptyHistory(now: Date): HistoryRecord {
  const at = now.toISOString();
  return {
    metadata: {
      createdAt: at,
      lastUpdated: at,
      schemaVersion: HISTORY_SCHEMA_VERSION,
      totalChecks: 0,
    },
    current: {
      publicIp: null,
      localIp: null,
      lastUpdated: at,
      lastNotificationSent: null,
    },
    statistics: {
      totalIpChanges: 0,
      totalNotificationsSent: 0,
      lastChangeDate: null,
      checkFrequencyByMode: Object.fromEntries(CHECK_MODES.map((mode) => [mode, 0])),
    },
    events: [],
  };
}

export function cloneStatistics(statistics: HistoryStatistics): HistoryStatistics {
  return {
    ...statistics,
    checkFrequencyByMode: { ...statistics.checkFrequencyByMode },
  };
}

export function roundSeconds(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds < 0) return 0;
  return Math.round(seconds * 100) / 100;
}
