/**
 * History Store
 *
 * Owns the JSON history file: current addresses, lifetime statistics and
 * a bounded log of check events.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import {
  WatchError,
  sameIp,
  silentLogger,
  systemClock,
  type AddressSnapshot,
  type CheckMode,
  type Clock,
  type WatchLogger,
} from '@ipwatch/core';
import type { HistoryStoreConfig, IHistoryStore } from '../interfaces/index.js';
import type {
  CheckEvent,
  HistoryRecord,
  HistoryStatistics,
  HistorySummary,
} from '../types/index.js';
import { parseHistory, serializeHistory } from './history-schema.js';
import { cloneStatistics, createEmptyHistory, roundSeconds } from './history-record.js';
import {
  capToMaxRecords,
  cutoffForDays,
  pruneOlderThan,
  sortEvents,
} from './retention.js';

export const DEFAULT_HISTORY_FILE = 'data/ip_history.json';
export const DEFAULT_KEEP_DAYS = 30;
export const DEFAULT_MAX_RECORDS = 1000;
const RECENT_ACTIVITY_LIMIT = 10;

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/** YYYYMMDD_HHMMSS in UTC */
export function compactTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * File-backed history with atomic writes.
 *
 * Every save goes to a temporary file in the same directory which is then
 * renamed over the target, so readers never observe a partial document.
 */
export class HistoryStore implements IHistoryStore {
  private record: HistoryRecord;
  private loaded = false;
  readonly filePath: string;
  private readonly keepDays: number;
  private readonly maxRecords: number;
  private readonly autoCleanup: boolean;
  private readonly backupOnCorruption: boolean;
  private readonly clock: Clock;
  private readonly logger: WatchLogger;

  constructor(config: HistoryStoreConfig = {}) {
    this.filePath = config.filePath ?? DEFAULT_HISTORY_FILE;
    this.keepDays = config.keepDays ?? DEFAULT_KEEP_DAYS;
    this.maxRecords = config.maxRecords ?? DEFAULT_MAX_RECORDS;
    this.autoCleanup = config.autoCleanup ?? true;
    this.backupOnCorruption = config.backupOnCorruption ?? true;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? silentLogger;
    this.record = createEmptyHistory(this.clock.now());
  }

  async load(): Promise<HistoryRecord> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.debug('No history file yet, starting fresh', { filePath: this.filePath });
        this.record = createEmptyHistory(this.clock.now());
        this.loaded = true;
        return this.record;
      }
      throw new WatchError({
        code: 'HISTORY_READ_FAILED',
        message: `Failed to read history file: ${this.filePath}`,
        suggestion: 'Check that the file is readable by the current user',
        context: { filePath: this.filePath },
        cause: err instanceof Error ? err : undefined,
      });
    }

    const parsed = parseHistory(content);
    if (!parsed.ok) {
      this.logger.error('History file is unreadable, reinitialising', {
        filePath: this.filePath,
        reason: parsed.reason,
      });
      if (this.backupOnCorruption) {
        await this.backupCorruptFile();
      }
      this.record = createEmptyHistory(this.clock.now());
      this.loaded = true;
      return this.record;
    }

    this.record = { ...parsed.record, events: sortEvents(parsed.record.events) };
    this.loaded = true;
    return this.record;
  }

  /** Mutations start from the persisted record, never from the constructor's placeholder. */
  private async ensureLoaded(): Promise<void> {
    if (!this.loaded) await this.load();
  }

  private async backupCorruptFile(): Promise<string | undefined> {
    const { dir, name } = path.parse(this.filePath);
    const backupPath = path.join(dir, `${name}.corrupted.${this.clock.now().getTime()}.bak`);
    try {
      await fs.copyFile(this.filePath, backupPath);
      this.logger.warn('Backed up corrupt history file', { backupPath });
      return backupPath;
    } catch (err) {
      this.logger.error('Failed to back up corrupt history file', {
        filePath: this.filePath,
        error: err instanceof Error ? err.message : String(err),
      });
      return undefined;
    }
  }

  async save(record: HistoryRecord): Promise<boolean> {
    record.metadata.lastUpdated = this.clock.now().toISOString();
    this.record = record;
    this.loaded = true;

    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(
      dir,
      `.${path.basename(this.filePath)}.${process.pid}.${randomUUID()}.tmp`
    );

    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmpPath, serializeHistory(record), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
      this.logger.debug('History saved', { filePath: this.filePath, events: record.events.length });
      return true;
    } catch (err) {
      this.logger.error('Failed to save history', {
        filePath: this.filePath,
        error: err instanceof Error ? err.message : String(err),
      });
      await this.removeQuietly(tmpPath);
      return false;
    }
  }

  private async removeQuietly(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (err) {
      this.logger.debug('Could not remove temporary file', {
        filePath,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  getLastPublicIp(): string | undefined {
    const ip = this.record.current.publicIp?.trim();
    return ip ? ip : undefined;
  }

  hasChanged(candidatePublicIp: string): boolean {
    if (!candidatePublicIp.trim()) return false;
    const last = this.getLastPublicIp();
    if (last === undefined) return true;
    return !sameIp(last, candidatePublicIp);
  }

  async recordCheck(
    snapshot: AddressSnapshot,
    mode: CheckMode,
    notificationSent: boolean,
    durationSeconds = 0
  ): Promise<boolean> {
    if (mode === 'test') {
      this.logger.debug('Test checks are not recorded');
      return false;
    }

    const publicIp = snapshot.public?.trim();
    if (!publicIp) {
      throw new WatchError({
        code: 'INVALID_ADDRESS',
        message: 'Cannot record a check without a public address',
        suggestion: 'Only record snapshots whose public address was detected',
        context: { mode },
      });
    }

    await this.ensureLoaded();

    const localIp = snapshot.local?.trim() || null;
    const timestamp = this.clock.now().toISOString();
    const previous = this.getLastPublicIp();
    const ipChanged = this.hasChanged(publicIp);

    const event: CheckEvent = {
      timestamp,
      publicIp,
      localIp,
      mode,
      ipChanged,
      notificationSent,
      durationSeconds: roundSeconds(durationSeconds),
    };
    if (ipChanged && previous !== undefined) {
      event.previousPublicIp = previous;
    }

    const { current, statistics, metadata } = this.record;
    this.record.events = sortEvents([...this.record.events, event]);

    current.publicIp = publicIp;
    if (localIp) current.localIp = localIp;
    current.lastUpdated = timestamp;
    if (notificationSent) current.lastNotificationSent = timestamp;

    metadata.totalChecks += 1;
    statistics.checkFrequencyByMode[mode] = (statistics.checkFrequencyByMode[mode] ?? 0) + 1;
    if (ipChanged) {
      statistics.totalIpChanges += 1;
      statistics.lastChangeDate = timestamp;
    }
    if (notificationSent) statistics.totalNotificationsSent += 1;

    const capped = capToMaxRecords(this.record.events, this.maxRecords);
    if (capped.removed > 0) {
      this.record.events = capped.kept;
      this.logger.debug('Evicted oldest events', { removed: capped.removed });
    }

    if (this.autoCleanup && this.keepDays > 0) {
      const pruned = pruneOlderThan(this.record.events, cutoffForDays(this.clock.now(), this.keepDays));
      if (pruned.removed > 0) {
        this.record.events = pruned.kept;
        this.logger.debug('Removed expired events', { removed: pruned.removed });
      }
    }

    this.logger.info('Check recorded', { mode, publicIp, ipChanged, notificationSent });
    return this.save(this.record);
  }

  getStatistics(): HistoryStatistics {
    return cloneStatistics(this.record.statistics);
  }

  async cleanupOldRecords(keepDays: number = this.keepDays): Promise<number> {
    if (keepDays <= 0) return 0;
    await this.ensureLoaded();

    const { kept, removed } = pruneOlderThan(
      this.record.events,
      cutoffForDays(this.clock.now(), keepDays)
    );
    if (removed === 0) return 0;

    this.record.events = kept;
    if (!(await this.save(this.record))) {
      throw new WatchError({
        code: 'HISTORY_WRITE_FAILED',
        message: `Removed ${removed} event(s) in memory but could not write ${this.filePath}`,
        suggestion: 'Check that the history directory is writable',
        context: { filePath: this.filePath, removed, keepDays },
      });
    }
    this.logger.info('Cleaned up old events', { removed, keepDays });
    return removed;
  }

  async getSummary(): Promise<HistorySummary> {
    const { metadata, current, statistics, events } = this.record;
    const total = metadata.totalChecks;

    const frequencyPercentage: Record<string, number> = {};
    if (total > 0) {
      for (const [mode, count] of Object.entries(statistics.checkFrequencyByMode)) {
        frequencyPercentage[mode] = Math.round((count / total) * 1000) / 10;
      }
    }

    return {
      metadata: { ...metadata },
      current: { ...current },
      statistics: cloneStatistics(statistics),
      frequencyPercentage,
      recentActivity: [...events]
        .reverse()
        .slice(0, RECENT_ACTIVITY_LIMIT)
        .map((event) => ({ ...event })),
      totalEventRecords: events.length,
      historyFileSize: await this.fileSize(),
    };
  }

  private async fileSize(): Promise<string> {
    try {
      const stat = await fs.stat(this.filePath);
      return formatFileSize(stat.size);
    } catch (err) {
      if (isNotFound(err)) return formatFileSize(0);
      return 'unknown';
    }
  }

  getChangeTimeline(days = 7): CheckEvent[] {
    const cutoffMs = cutoffForDays(this.clock.now(), days).getTime();
    return this.record.events
      .filter((event) => event.ipChanged && Date.parse(event.timestamp) >= cutoffMs)
      .reverse()
      .map((event) => ({ ...event }));
  }

  async exportHistory(outputPath?: string): Promise<string> {
    const target = outputPath ?? `ip_history_export_${compactTimestamp(this.clock.now())}.json`;
    try {
      const dir = path.dirname(target);
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(target, serializeHistory(this.record), 'utf-8');
    } catch (err) {
      throw new WatchError({
        code: 'EXPORT_FAILED',
        message: `Failed to export history to ${target}`,
        suggestion: 'Check that the destination directory is writable',
        context: { outputPath: target },
        cause: err instanceof Error ? err : undefined,
      });
    }
    this.logger.info('History exported', { outputPath: target });
    return target;
  }
}
