/**
 * Zod schemas for values crossing package boundaries
 */

import { z } from 'zod';

export const checkModeSchema = z.enum(['scheduled', 'manual', 'test']);

/** 24-hour wall clock time, e.g. "09:00" */
export const timeOfDaySchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, { message: 'Expected HH:MM (00:00-23:59)' });
