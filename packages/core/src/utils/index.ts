export { withRetries, sleep } from './retry.js';
export type { RetryConfig, RetryContext } from './retry.js';
export { withTimeout } from './timeout.js';
export { normalizeIp, isValidIp, isPrivateIpv4, sameIp } from './ip.js';
export { systemClock, fixedClock } from './clock.js';
export { silentLogger } from './logger.js';
