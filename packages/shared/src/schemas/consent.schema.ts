// ============================================================================
// Consent — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  dateInputSchema,
  dateRangeEndSchema,
  entityIdSchema,
  recordTypeSchema,
} from './common.schema.js';

// --- Consent Init ---
// Range ordering and non-empty scope are domain rules checked by the
// consent service (INVALID_RANGE / INVALID_SCOPE), not here.

export const consentInitSchema = z.object({
  patientId: z.string().min(1).max(200),
  hiuId: entityIdSchema,
  hipId: entityIdSchema,
  dateRange: z.object({
    from: dateInputSchema,
    to: dateRangeEndSchema,
  }),
  recordTypes: z.array(recordTypeSchema),
});

export type ConsentInit = z.infer<typeof consentInitSchema>;

// --- Consent Granted (approval channel -> gateway callback body) ---

export const consentGrantedSchema = z.object({
  validUntil: dateInputSchema,
});

export type ConsentGranted = z.infer<typeof consentGrantedSchema>;

// --- Consent Denied (approval channel -> gateway callback body) ---

export const consentDeniedSchema = z.object({
  reason: z.string().max(500).optional(),
});

export type ConsentDenied = z.infer<typeof consentDeniedSchema>;
