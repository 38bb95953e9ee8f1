/**
 * Check Cycle Types
 */

import type { CheckMode, WatchErrorCode } from '@ipwatch/core';

/**
 * Verdict for one snapshot, before anything is sent or recorded
 */
export interface CheckDecision {
  mode: CheckMode;
  timestamp: Date;
  publicIp: string;
  localIp?: string;
  /** Committed address the candidate was compared against */
  previousPublicIp?: string;
  ipChanged: boolean;
  shouldNotify: boolean;
}

export type CycleStage = 'probe' | 'delivery' | 'persistence';

export interface CycleFailure {
  stage: CycleStage;
  code: WatchErrorCode;
  message: string;
}

/**
 * Outcome of one cycle, as handed to the front end
 */
export interface CycleResult {
  mode: CheckMode;
  timestamp: Date;
  publicIp?: string;
  localIp?: string;
  previousPublicIp?: string;
  ipChanged: boolean;
  shouldNotify: boolean;
  /** True only when the notifier confirmed delivery */
  notificationSent: boolean;
  /** True when the event reached disk */
  recorded: boolean;
  durationSeconds: number;
  /** Rendered notification text, when one was due */
  message?: string;
  success: boolean;
  failures: CycleFailure[];
}
