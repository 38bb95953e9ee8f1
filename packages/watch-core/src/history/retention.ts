/**
 * Event log retention
 *
 * Pure functions over the event list. Both keep at least the newest event.
 */

import type { CheckEvent } from '../types/index.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface PruneResult {
  kept: CheckEvent[];
  removed: number;
}

function eventTime(event: CheckEvent): number {
  const ms = Date.parse(event.timestamp);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}

export function sortEvents(events: CheckEvent[]): CheckEvent[] {
  return [...events].sort((a, b) => eventTime(a) - eventTime(b));
}

export function newestEvent(events: CheckEvent[]): CheckEvent | undefined {
  let newest: CheckEvent | undefined;
  for (const event of events) {
    if (!newest || eventTime(event) >= eventTime(newest)) {
      newest = event;
    }
  }
  return newest;
}

/**
 * Remove events strictly older than the cutoff.
 */
export function pruneOlderThan(events: CheckEvent[], cutoff: Date): PruneResult {
  const cutoffMs = cutoff.getTime();
  const kept = events.filter((event) => eventTime(event) >= cutoffMs);

  if (kept.length === 0) {
    const newest = newestEvent(events);
    if (newest) kept.push(newest);
  }

  return { kept, removed: events.length - kept.length };
}

/**
 * Evict oldest events until at most `maxRecords` remain.
 */
export function capToMaxRecords(events: CheckEvent[], maxRecords: number): PruneResult {
  const limit = Math.max(1, Math.floor(maxRecords));
  if (events.length <= limit) {
    return { kept: events, removed: 0 };
  }

  const kept = sortEvents(events).slice(-limit);
  return { kept, removed: events.length - kept.length };
}

export function cutoffForDays(now: Date, keepDays: number): Date {
  return new Date(now.getTime() - keepDays * DAY_MS);
}
