import { type FastifyInstance } from 'fastify';
import { webhookRateLimit } from '../../plugins/rate-limit.plugin.js';
import { createCallbackHandlers, type CallbackHandlerDeps } from './callback.handlers.js';

// ---------------------------------------------------------------------------
// Callback Routes — webhook entry for HIPs and the consent approval channel.
// No body schema: a malformed envelope is logged and still acknowledged.
// ---------------------------------------------------------------------------

export async function callbackRoutes(
  app: FastifyInstance,
  opts: { deps: CallbackHandlerDeps },
) {
  const handlers = createCallbackHandlers(opts.deps);

  app.post('/callback/:correlationId', {
    preHandler: [app.authenticateCallback],
    config: { rateLimit: webhookRateLimit() },
    handler: handlers.callbackHandler,
  });
}
