// ============================================================================
// Bridge Registry — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  BridgeRole,
  BridgeService,
  BRIDGE_ID_MAX_LENGTH,
  CALLBACK_URL_MAX_LENGTH,
} from '../constants/bridge.constants.js';

const BRIDGE_ROLES = [BridgeRole.HIP, BridgeRole.HIU] as const;

const BRIDGE_SERVICES = [
  BridgeService.DISCOVERY,
  BridgeService.LINKING,
  BridgeService.CONSENT,
  BridgeService.DATA_TRANSFER,
] as const;

const callbackUrlSchema = z
  .string()
  .max(CALLBACK_URL_MAX_LENGTH)
  .url()
  .refine((url) => url.startsWith('https://') || url.startsWith('http://'), {
    message: 'callbackUrl must be an http(s) URL',
  });

// --- Register Bridge ---

export const registerBridgeSchema = z.object({
  bridgeId: z
    .string()
    .min(1)
    .max(BRIDGE_ID_MAX_LENGTH)
    .regex(/^[A-Za-z0-9._-]+$/, 'bridgeId may contain letters, digits, dot, dash and underscore'),
  role: z.enum(BRIDGE_ROLES),
  callbackUrl: callbackUrlSchema,
  services: z.array(z.enum(BRIDGE_SERVICES)).default([]),
});

export type RegisterBridge = z.infer<typeof registerBridgeSchema>;

// --- Update Callback URL ---

export const updateBridgeUrlSchema = z.object({
  callbackUrl: callbackUrlSchema,
});

export type UpdateBridgeUrl = z.infer<typeof updateBridgeUrlSchema>;

// --- Bridge ID Param ---

export const bridgeIdParamSchema = z.object({
  id: z.string().min(1).max(BRIDGE_ID_MAX_LENGTH),
});

export type BridgeIdParam = z.infer<typeof bridgeIdParamSchema>;
