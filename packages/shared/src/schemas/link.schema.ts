// ============================================================================
// Patient Linking — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { OTP_LENGTH } from '../constants/link.constants.js';
import { entityIdSchema } from './common.schema.js';

// --- Link Init ---

export const linkInitSchema = z.object({
  patientRef: z.string().min(1).max(200),
  hipId: entityIdSchema,
});

export type LinkInit = z.infer<typeof linkInitSchema>;

// --- Link Confirm ---

export const linkConfirmSchema = z.object({
  requestId: z.string().uuid(),
  otp: z
    .string()
    .length(OTP_LENGTH)
    .regex(/^\d+$/, 'otp must be numeric'),
});

export type LinkConfirm = z.infer<typeof linkConfirmSchema>;

// --- Patient Param ---

export const patientParamSchema = z.object({
  patientId: z.string().min(1).max(200),
});

export type PatientParam = z.infer<typeof patientParamSchema>;

// --- Discovery Result (HIP -> gateway callback body) ---

export const discoveryResultSchema = z.object({
  careContexts: z
    .array(
      z.object({
        referenceNumber: z.string().min(1).max(200),
        display: z.string().max(500).optional(),
      }),
    )
    .min(1),
});

export type DiscoveryResult = z.infer<typeof discoveryResultSchema>;
