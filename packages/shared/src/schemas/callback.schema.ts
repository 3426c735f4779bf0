// ============================================================================
// Callback Router — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { CallbackKind } from '../constants/gateway.constants.js';

const CALLBACK_KINDS = [
  CallbackKind.DISCOVERY_RESULT,
  CallbackKind.CONSENT_GRANTED,
  CallbackKind.CONSENT_DENIED,
  CallbackKind.DATA_DELIVERED,
] as const;

export const callbackKindSchema = z.enum(CALLBACK_KINDS);

// --- Webhook Envelope ---
// Parsed by hand in the route: a malformed envelope must still receive 200.

export const callbackEnvelopeSchema = z.object({
  kind: callbackKindSchema,
  body: z.record(z.unknown()).default({}),
});

export type CallbackEnvelope = z.infer<typeof callbackEnvelopeSchema>;

export const correlationParamSchema = z.object({
  correlationId: z.string().min(1).max(100),
});

export type CorrelationParam = z.infer<typeof correlationParamSchema>;
