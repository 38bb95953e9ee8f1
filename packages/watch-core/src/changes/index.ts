export { ChangeDetector, DEFAULT_DELIVERY_RETRY, deliveryDelayMs } from './change-detector.js';
export { shouldNotify, isRecordedMode } from './notify-policy.js';
