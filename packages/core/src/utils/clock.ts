import type { Clock } from '../interfaces/index.js';

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Fixed clock, handy for tests and replays */
export function fixedClock(at: Date | string): Clock & { set(next: Date | string): void } {
  let current = new Date(at);
  return {
    now: () => new Date(current),
    set(next: Date | string) {
      current = new Date(next);
    },
  };
}
