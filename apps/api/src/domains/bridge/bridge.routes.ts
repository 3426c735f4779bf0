import { type FastifyInstance } from 'fastify';
import {
  registerBridgeSchema,
  updateBridgeUrlSchema,
  bridgeIdParamSchema,
  type RegisterBridge,
  type UpdateBridgeUrl,
  type BridgeIdParam,
} from '@consent-gateway/shared/schemas/bridge.schema.js';
import { createBridgeHandlers, type BridgeHandlerDeps } from './bridge.handlers.js';

// ---------------------------------------------------------------------------
// Bridge Routes — bearer token + inter-bridge headers required
// ---------------------------------------------------------------------------

export async function bridgeRoutes(
  app: FastifyInstance,
  opts: { deps: BridgeHandlerDeps },
) {
  const handlers = createBridgeHandlers(opts.deps);

  app.post<{ Body: RegisterBridge }>('/bridge/register', {
    schema: { body: registerBridgeSchema },
    preHandler: [app.authenticate],
    handler: handlers.registerHandler,
  });

  app.patch<{ Params: BridgeIdParam; Body: UpdateBridgeUrl }>('/bridge/:id/url', {
    schema: { params: bridgeIdParamSchema, body: updateBridgeUrlSchema },
    preHandler: [app.authenticate],
    handler: handlers.updateUrlHandler,
  });

  app.get<{ Params: BridgeIdParam }>('/bridge/:id', {
    schema: { params: bridgeIdParamSchema },
    preHandler: [app.authenticate],
    handler: handlers.getBridgeHandler,
  });

  app.post<{ Params: BridgeIdParam }>('/bridge/:id/suspend', {
    schema: { params: bridgeIdParamSchema },
    preHandler: [app.authenticate],
    handler: handlers.suspendHandler,
  });

  app.post<{ Params: BridgeIdParam }>('/bridge/:id/activate', {
    schema: { params: bridgeIdParamSchema },
    preHandler: [app.authenticate],
    handler: handlers.activateHandler,
  });
}
