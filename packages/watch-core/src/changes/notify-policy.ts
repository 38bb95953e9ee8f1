import type { CheckMode } from '@ipwatch/core';

/**
 * Notification policy per mode.
 *
 * | mode      | unchanged | changed |
 * |-----------|-----------|---------|
 * | scheduled | no        | yes     |
 * | manual    | yes       | yes     |
 * | test      | no        | no      |
 */
export function shouldNotify(mode: CheckMode, ipChanged: boolean): boolean {
  switch (mode) {
    case 'scheduled':
      return ipChanged;
    case 'manual':
      return true;
    case 'test':
      return false;
    default: {
      const unreachable: never = mode;
      throw new Error(`Unhandled check mode: ${String(unreachable)}`);
    }
  }
}

/** Whether a cycle in this mode is committed to history */
export function isRecordedMode(mode: CheckMode): boolean {
  return mode !== 'test';
}
