/**
 * Interface exports for watch-core
 */

export type {
  IHistoryStore,
  HistoryStoreConfig,
} from './history-store.js';

export type {
  IChangeDetector,
  ChangeDetectorConfig,
  ChangeDetectorDeps,
} from './change-detector.js';

export type {
  IIpWatcher,
  IpWatcherConfig,
  IpWatcherDeps,
} from './ip-watcher.js';
