// ============================================================================
// Data Transfer — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  base64PayloadSchema,
  dateInputSchema,
  dateRangeEndSchema,
  entityIdSchema,
  recordTypeSchema,
} from './common.schema.js';

// --- Data Request ---
// A single-day window may omit `to`.

export const dataRequestSchema = z.object({
  hiuId: entityIdSchema,
  consentId: z.string().uuid(),
  queryWindow: z.object({
    from: dateInputSchema,
    to: dateRangeEndSchema.optional(),
    recordTypes: z.array(recordTypeSchema).min(1).optional(),
  }),
});

export type DataRequest = z.infer<typeof dataRequestSchema>;

// --- HIU Param ---

export const hiuParamSchema = z.object({
  hiuId: entityIdSchema,
});

export type HiuParam = z.infer<typeof hiuParamSchema>;

// --- Data Delivered (HIP -> gateway callback body) ---

export const dataDeliveredSchema = z.object({
  payload: base64PayloadSchema,
});

export type DataDelivered = z.infer<typeof dataDeliveredSchema>;
