export { IpWatcher, DEFAULT_PROBE_RETRY, DEFAULT_PROBE_TIMEOUT_MS } from './check-cycle.js';
