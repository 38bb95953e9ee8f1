import type { WatchLogger } from '../interfaces/index.js';

/** Discards everything; the default when no logger is injected */
export const silentLogger: WatchLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
