/**
 * Address types shared by the prober, the history store and the front end
 */

/** How a check was triggered */
export type CheckMode = 'scheduled' | 'manual' | 'test';

export const CHECK_MODES: readonly CheckMode[] = ['scheduled', 'manual', 'test'];

/**
 * One probe result.
 * Either address may be missing when it could not be determined.
 */
export interface AddressSnapshot {
  /** Address of the primary LAN interface */
  local?: string;
  /** Address seen by the outside world */
  public?: string;
  /** When the probe completed */
  observedAt: Date;
}
