import { type FastifyInstance } from 'fastify';
import { createSessionSchema, type CreateSession } from '@consent-gateway/shared/schemas/token.schema.js';
import { sessionRateLimit } from '../../plugins/rate-limit.plugin.js';
import { createTokenHandlers, type TokenHandlerDeps } from './token.handlers.js';

// ---------------------------------------------------------------------------
// Token Routes — no bearer token required (this is where one is obtained)
// ---------------------------------------------------------------------------

export async function tokenRoutes(
  app: FastifyInstance,
  opts: { deps: TokenHandlerDeps },
) {
  const handlers = createTokenHandlers(opts.deps);

  app.post<{ Body: CreateSession }>('/gateway/sessions', {
    schema: { body: createSessionSchema },
    config: { rateLimit: sessionRateLimit() },
    handler: handlers.createSessionHandler,
  });
}
