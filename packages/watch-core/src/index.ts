/**
 * @ipwatch/watch-core
 *
 * Change detection, notification policy and history persistence.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// History Module
export {
  HistoryStore,
  DEFAULT_HISTORY_FILE,
  DEFAULT_KEEP_DAYS,
  DEFAULT_MAX_RECORDS,
  historyRecordSchema,
  parseHistory,
  serializeHistory,
  createEmptyHistory,
  pruneOlderThan,
  capToMaxRecords,
  formatFileSize,
} from './history/index.js';
export type { ParseHistoryResult, PruneResult } from './history/index.js';

// Change Detection Module
export {
  ChangeDetector,
  DEFAULT_DELIVERY_RETRY,
  shouldNotify,
  isRecordedMode,
} from './changes/index.js';

// Cycle
export { IpWatcher, DEFAULT_PROBE_RETRY, DEFAULT_PROBE_TIMEOUT_MS } from './cycle/index.js';

// Formatters
export {
  NotificationFormatter,
  findUnknownPlaceholders,
  DEFAULT_MESSAGE_TEMPLATE,
  DISCORD_MAX_MESSAGE_LENGTH,
  TEMPLATE_PLACEHOLDERS,
  formatCycleResult,
  formatHistorySummary,
  formatChangeTimeline,
} from './formatters/index.js';
export type { NotificationFormatterOptions, TemplatePlaceholder } from './formatters/index.js';
