// ============================================================================
// Gateway — Shared Zod Building Blocks
// ============================================================================

import { z } from 'zod';
import { RECORD_TYPES } from '../constants/consent.constants.js';

/** ISO-8601 calendar date or date-time with offset, parsed to a Date. */
export const dateInputSchema = z
  .union([z.string().datetime({ offset: true }), z.string().date()])
  .transform((value) => new Date(value));

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Inclusive upper bound of a range. A calendar date covers the whole UTC day,
 * so `2024-06-30` becomes `2024-06-30T23:59:59.999Z`.
 */
export const dateRangeEndSchema = z
  .union([z.string().datetime({ offset: true }), z.string().date()])
  .transform((value) =>
    CALENDAR_DATE.test(value) ? new Date(`${value}T23:59:59.999Z`) : new Date(value),
  );

export const recordTypeSchema = z.enum(RECORD_TYPES);

export const entityIdSchema = z.string().min(1).max(100);

export const uuidParamSchema = z.object({
  id: z.string().uuid(),
});

export type UuidParam = z.infer<typeof uuidParamSchema>;

/** Opaque bytes carried as base64 (standard or url-safe alphabet). */
export const base64PayloadSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9+/_-]+={0,2}$/, 'payload must be base64 encoded');
