/**
 * Type exports for watch-core
 */

export type {
  IsoTimestamp,
  HistoryMetadata,
  CurrentState,
  HistoryStatistics,
  CheckEvent,
  HistoryRecord,
  HistorySummary,
} from './history.js';

export type {
  CheckDecision,
  CycleStage,
  CycleFailure,
  CycleResult,
} from './cycle.js';
