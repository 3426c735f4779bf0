import { type FastifyRequest, type FastifyReply } from 'fastify';
import type {
  LinkInit,
  LinkConfirm,
  PatientParam,
} from '@consent-gateway/shared/schemas/link.schema.js';
import type { UuidParam } from '@consent-gateway/shared/schemas/common.schema.js';
import type { LinkService } from './link.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface LinkHandlerDeps {
  linkService: LinkService;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createLinkHandlers(deps: LinkHandlerDeps) {
  const { linkService } = deps;

  // -------------------------------------------------------------------------
  // POST /link/init — 202, the OTP follows once the HIP answers discovery
  // -------------------------------------------------------------------------

  async function initHandler(
    request: FastifyRequest<{ Body: LinkInit }>,
    reply: FastifyReply,
  ) {
    const created = await linkService.initDiscovery(request.body.patientRef, request.body.hipId);
    return reply.code(202).send({ data: { requestId: created.requestId } });
  }

  // -------------------------------------------------------------------------
  // POST /link/confirm
  // -------------------------------------------------------------------------

  async function confirmHandler(
    request: FastifyRequest<{ Body: LinkConfirm }>,
    reply: FastifyReply,
  ) {
    const link = await linkService.confirm(request.body.requestId, request.body.otp);
    return reply.code(200).send({ data: link });
  }

  // -------------------------------------------------------------------------
  // GET /link/status/:id
  // -------------------------------------------------------------------------

  async function statusHandler(
    request: FastifyRequest<{ Params: UuidParam }>,
    reply: FastifyReply,
  ) {
    const status = await linkService.getStatus(request.params.id);
    return reply.code(200).send({ data: status });
  }

  // -------------------------------------------------------------------------
  // GET /link/contexts/:patientId
  // -------------------------------------------------------------------------

  async function contextsHandler(
    request: FastifyRequest<{ Params: PatientParam }>,
    reply: FastifyReply,
  ) {
    const links = await linkService.listLinks(request.params.patientId);
    return reply.code(200).send({ data: links });
  }

  return { initHandler, confirmHandler, statusHandler, contextsHandler };
}
