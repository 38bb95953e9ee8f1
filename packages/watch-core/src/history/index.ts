export {
  HistoryStore,
  DEFAULT_HISTORY_FILE,
  DEFAULT_KEEP_DAYS,
  DEFAULT_MAX_RECORDS,
  formatFileSize,
  compactTimestamp,
} from './history-store.js';
export {
  historyRecordSchema,
  checkEventSchema,
  parseHistory,
  serializeHistory,
  HISTORY_SCHEMA_VERSION,
} from './history-schema.js';
export type { ParseHistoryResult } from './history-schema.js';
export { createEmptyHistory } from './history-record.js';
export { pruneOlderThan, capToMaxRecords, sortEvents, DAY_MS } from './retention.js';
export type { PruneResult } from './retention.js';
