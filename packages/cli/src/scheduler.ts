/**
 * Daily scheduler for daemon mode
 */

import { WatchError, silentLogger, timeOfDaySchema, type WatchLogger } from '@ipwatch/core';

function parseTimeOfDay(time: string): { hours: number; minutes: number } {
  const parsed = timeOfDaySchema.safeParse(time);
  if (!parsed.success) {
    throw new WatchError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid time of day: ${JSON.stringify(time)}`,
      suggestion: 'Use 24-hour HH:MM, for example 09:00',
    });
  }
  const [hours, minutes] = parsed.data.split(':').map(Number);
  return { hours: hours ?? 0, minutes: minutes ?? 0 };
}

/**
 * Next local-time occurrence of `time` (HH:MM) strictly after `from`.
 */
export function getNextRun(time: string, from: Date): Date {
  const { hours, minutes } = parseTimeOfDay(time);
  const next = new Date(from);
  next.setHours(hours, minutes, 0, 0);
  if (next.getTime() <= from.getTime()) {
    next.setDate(next.getDate() + 1);
    next.setHours(hours, minutes, 0, 0);
  }
  return next;
}

export interface DailySchedulerOptions {
  /** HH:MM in local time */
  time: string;
  task: () => Promise<void>;
  logger?: WatchLogger;
}

/**
 * Runs a task once a day. A tick that fires while the previous run is still
 * going is skipped.
 */
export class DailyScheduler {
  private readonly time: string;
  private readonly task: () => Promise<void>;
  private readonly logger: WatchLogger;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private nextRun: Date | null = null;
  private stopped = true;

  constructor(options: DailySchedulerOptions) {
    parseTimeOfDay(options.time);
    this.time = options.time;
    this.task = options.task;
    this.logger = options.logger ?? silentLogger;
  }

  get running(): boolean {
    return !this.stopped;
  }

  getNextRun(): Date | null {
    return this.nextRun;
  }

  start(): Date {
    this.stopped = false;
    return this.schedule();
  }

  private schedule(): Date {
    const now = new Date();
    const next = getNextRun(this.time, now);
    this.nextRun = next;
    this.timer = setTimeout(() => this.tick(), next.getTime() - now.getTime());
    this.logger.info('Next scheduled check', { at: next.toISOString() });
    return next;
  }

  private tick(): void {
    this.timer = null;
    if (this.stopped) return;

    if (this.inFlight) {
      this.logger.warn('Previous check still running, skipping this run');
    } else {
      this.inFlight = this.runTask().finally(() => {
        this.inFlight = null;
      });
    }

    this.schedule();
  }

  private async runTask(): Promise<void> {
    try {
      await this.task();
    } catch (err) {
      this.logger.error('Scheduled check failed', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /**
   * Cancel future runs and wait for a run in progress to finish.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRun = null;
    if (this.inFlight) {
      this.logger.info('Waiting for the running check to finish');
      await this.inFlight;
    }
  }
}
