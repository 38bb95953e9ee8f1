/**
 * History file schema
 *
 * Objects pass unknown keys through so that files written by newer versions
 * survive a load/save round trip.
 */

import { z } from 'zod';
import { checkModeSchema } from '@ipwatch/core';
import type { HistoryRecord } from '../types/index.js';

export const HISTORY_SCHEMA_VERSION = '1.0';

const timestamp = z.string().min(1);

const metadataSchema = z
  .object({
    createdAt: timestamp,
    lastUpdated: timestamp,
    schemaVersion: z.string().default(HISTORY_SCHEMA_VERSION),
    totalChecks: z.number().int().min(0),
  })
  .passthrough();

const currentSchema = z
  .object({
    publicIp: z.string().nullable().default(null),
    localIp: z.string().nullable().default(null),
    lastUpdated: timestamp,
    lastNotificationSent: timestamp.nullable().default(null),
  })
  .passthrough();

const statisticsSchema = z
  .object({
    totalIpChanges: z.number().int().min(0),
    totalNotificationsSent: z.number().int().min(0),
    lastChangeDate: timestamp.nullable().default(null),
    checkFrequencyByMode: z.record(z.number().int().min(0)),
  })
  .passthrough();

export const checkEventSchema = z
  .object({
    timestamp,
    publicIp: z.string().nullable(),
    localIp: z.string().nullable(),
    mode: checkModeSchema,
    ipChanged: z.boolean(),
    notificationSent: z.boolean(),
    durationSeconds: z.number().min(0),
    previousPublicIp: z.string().optional(),
  })
  .passthrough();

export const historyRecordSchema = z
  .object({
    metadata: metadataSchema,
    current: currentSchema,
    statistics: statisticsSchema,
    events: z.array(checkEventSchema),
  })
  .passthrough();

export type ParseHistoryResult =
  | { ok: true; record: HistoryRecord }
  | { ok: false; reason: string };

/**
 * Parse file content into a HistoryRecord without throwing.
 */
export function parseHistory(content: string): ParseHistoryResult {
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let raw: unknown;
  try {
    raw = JSON.parse(sanitized);
  } catch (err) {
    return { ok: false, reason: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const result = historyRecordSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => {
        const path = issue.path.length ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
      })
      .join('; ');
    return { ok: false, reason: `Invalid history structure: ${issues}` };
  }

  return { ok: true, record: result.data };
}

export function serializeHistory(record: HistoryRecord): string {
  return `${JSON.stringify(record, null, 2)}\n`;
}
