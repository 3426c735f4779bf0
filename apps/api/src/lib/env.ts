import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  DEFAULT_TOKEN_TTL_SECONDS,
  DEFAULT_OUTBOUND_TIMEOUT_MS,
  DEFAULT_FORWARD_MAX_ATTEMPTS,
  DEFAULT_FORWARD_BACKOFF_MS,
  DEFAULT_SWEEP_INTERVAL_SECONDS,
} from '@consent-gateway/shared/constants/gateway.constants.js';
import {
  DEFAULT_LINK_TTL_SECONDS,
  DEFAULT_MAX_OTP_ATTEMPTS,
} from '@consent-gateway/shared/constants/link.constants.js';
import { DEFAULT_DELIVERY_TIMEOUT_SECONDS } from '@consent-gateway/shared/constants/transfer.constants.js';

// Load .env from monorepo root
dotenv.config({ path: fileURLToPath(new URL('../../../../.env', import.meta.url)) });

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.coerce.number().default(3001),
  API_HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  GATEWAY_TOKEN_SECRET: z.string().min(16),
  GATEWAY_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(DEFAULT_TOKEN_TTL_SECONDS),
  GATEWAY_CLIENTS: z.string().default(''),
  GATEWAY_CLIENT_ID: z.string().min(1).default('consent-gateway'),
  GATEWAY_CM_ID: z.string().min(1).default('sbx'),

  LINK_TTL_SECONDS: z.coerce.number().int().positive().default(DEFAULT_LINK_TTL_SECONDS),
  LINK_MAX_OTP_ATTEMPTS: z.coerce.number().int().positive().default(DEFAULT_MAX_OTP_ATTEMPTS),
  DELIVERY_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(DEFAULT_DELIVERY_TIMEOUT_SECONDS),
  FORWARD_MAX_ATTEMPTS: z.coerce.number().int().positive().default(DEFAULT_FORWARD_MAX_ATTEMPTS),
  FORWARD_BACKOFF_MS: z.coerce.number().int().min(0).default(DEFAULT_FORWARD_BACKOFF_MS),
  OUTBOUND_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_OUTBOUND_TIMEOUT_MS),
  SWEEP_INTERVAL_SECONDS: z.coerce.number().int().min(0).default(DEFAULT_SWEEP_INTERVAL_SECONDS),

  OTP_SERVICE_URL: z.string().url().optional(),
  CONSENT_NOTIFY_URL: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | undefined;

/** Validate an arbitrary variable source; used by getEnv and by tests. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
    throw new Error('Invalid environment variables');
  }
  return result.data;
}

export function getEnv(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}

/**
 * Parse GATEWAY_CLIENTS ("clientId:secret,clientId2:secret2") into a map.
 * Entries without a colon or with an empty half are skipped.
 */
export function parseGatewayClients(raw: string): Map<string, string> {
  const clients = new Map<string, string>();
  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    const sep = trimmed.indexOf(':');
    if (sep <= 0 || sep === trimmed.length - 1) continue;
    clients.set(trimmed.slice(0, sep), trimmed.slice(sep + 1));
  }
  return clients;
}
