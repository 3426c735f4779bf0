import { type FastifyInstance, type FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import rateLimit from '@fastify/rate-limit';

// ---------------------------------------------------------------------------
// Rate limit tiers:
// Keyed by caller IP: limits run on onRequest, before the bearer token has
// been verified.
//   Default:          100 req/min
//   Token issuance:   10 req/min
//   Webhook callback: 600 req/min (bridges retry in bursts)
// ---------------------------------------------------------------------------

export interface RateLimitPluginOptions {
  /** Override default max for testing. */
  defaultMax?: number;
}

function clientKey(request: FastifyRequest): string {
  return request.ip;
}

async function rateLimitPlugin(app: FastifyInstance, opts: RateLimitPluginOptions) {
  const defaultMax = opts.defaultMax ?? 100;

  await app.register(rateLimit, {
    max: defaultMax,
    timeWindow: '1 minute',
    keyGenerator: clientKey,
    errorResponseBuilder: (_request, context) => ({
      error: {
        code: 'RATE_LIMITED',
        message: `Rate limit exceeded. Retry after ${Math.ceil(context.ttl / 1000)} seconds.`,
      },
    }),
  });
}

// ---------------------------------------------------------------------------
// Route-level rate limit config factories
// ---------------------------------------------------------------------------

/**
 * Token issuance: 10 req/min.
 * Use as route-level config: { config: { rateLimit: sessionRateLimit() } }
 */
export function sessionRateLimit() {
  return {
    max: 10,
    timeWindow: '1 minute',
    keyGenerator: clientKey,
  };
}

/**
 * Webhook callbacks: 600 req/min.
 * Use as route-level config: { config: { rateLimit: webhookRateLimit() } }
 */
export function webhookRateLimit() {
  return {
    max: 600,
    timeWindow: '1 minute',
    keyGenerator: clientKey,
  };
}

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

export const rateLimitPluginFp = fp(rateLimitPlugin, {
  name: 'rate-limit-plugin',
});
