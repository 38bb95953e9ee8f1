export { WatchError, wrapError, isTransientError } from './watch-error.js';
export type { WatchErrorCode, WatchErrorDetails } from './watch-error.js';
