import { type FastifyRequest, type FastifyReply } from 'fastify';
import type {
  RegisterBridge,
  UpdateBridgeUrl,
  BridgeIdParam,
} from '@consent-gateway/shared/schemas/bridge.schema.js';
import type { BridgeRegistry } from './bridge.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface BridgeHandlerDeps {
  bridgeRegistry: BridgeRegistry;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createBridgeHandlers(deps: BridgeHandlerDeps) {
  const { bridgeRegistry } = deps;

  // -------------------------------------------------------------------------
  // POST /bridge/register
  // -------------------------------------------------------------------------

  async function registerHandler(
    request: FastifyRequest<{ Body: RegisterBridge }>,
    reply: FastifyReply,
  ) {
    const { bridgeId, role, callbackUrl, services } = request.body;
    const bridge = await bridgeRegistry.register(bridgeId, role, callbackUrl, services);
    return reply.code(201).send({ data: bridge });
  }

  // -------------------------------------------------------------------------
  // PATCH /bridge/:id/url
  // -------------------------------------------------------------------------

  async function updateUrlHandler(
    request: FastifyRequest<{ Params: BridgeIdParam; Body: UpdateBridgeUrl }>,
    reply: FastifyReply,
  ) {
    const bridge = await bridgeRegistry.updateCallback(
      request.params.id,
      request.body.callbackUrl,
    );
    return reply.code(200).send({ data: bridge });
  }

  // -------------------------------------------------------------------------
  // GET /bridge/:id
  // -------------------------------------------------------------------------

  async function getBridgeHandler(
    request: FastifyRequest<{ Params: BridgeIdParam }>,
    reply: FastifyReply,
  ) {
    const bridge = await bridgeRegistry.resolve(request.params.id);
    return reply.code(200).send({ data: bridge });
  }

  // -------------------------------------------------------------------------
  // POST /bridge/:id/suspend, POST /bridge/:id/activate
  // -------------------------------------------------------------------------

  async function suspendHandler(
    request: FastifyRequest<{ Params: BridgeIdParam }>,
    reply: FastifyReply,
  ) {
    const bridge = await bridgeRegistry.suspend(request.params.id);
    return reply.code(200).send({ data: bridge });
  }

  async function activateHandler(
    request: FastifyRequest<{ Params: BridgeIdParam }>,
    reply: FastifyReply,
  ) {
    const bridge = await bridgeRegistry.activate(request.params.id);
    return reply.code(200).send({ data: bridge });
  }

  return {
    registerHandler,
    updateUrlHandler,
    getBridgeHandler,
    suspendHandler,
    activateHandler,
  };
}
