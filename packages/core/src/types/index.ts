export type { CheckMode, AddressSnapshot } from './address.js';
export { CHECK_MODES } from './address.js';
