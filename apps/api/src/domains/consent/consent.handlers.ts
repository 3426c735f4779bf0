import { type FastifyRequest, type FastifyReply } from 'fastify';
import type { ConsentInit } from '@consent-gateway/shared/schemas/consent.schema.js';
import type { PatientParam } from '@consent-gateway/shared/schemas/link.schema.js';
import type { UuidParam } from '@consent-gateway/shared/schemas/common.schema.js';
import type { ConsentService } from './consent.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface ConsentHandlerDeps {
  consentService: ConsentService;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createConsentHandlers(deps: ConsentHandlerDeps) {
  const { consentService } = deps;

  // -------------------------------------------------------------------------
  // POST /consent/init — 202, the decision arrives as a callback
  // -------------------------------------------------------------------------

  async function initHandler(
    request: FastifyRequest<{ Body: ConsentInit }>,
    reply: FastifyReply,
  ) {
    const { patientId, hiuId, hipId, dateRange, recordTypes } = request.body;
    const artefact = await consentService.requestConsent(
      patientId,
      hiuId,
      hipId,
      dateRange,
      recordTypes,
    );
    return reply.code(202).send({ data: { consentId: artefact.consentId } });
  }

  // -------------------------------------------------------------------------
  // GET /consent/status/:id
  // -------------------------------------------------------------------------

  async function statusHandler(
    request: FastifyRequest<{ Params: UuidParam }>,
    reply: FastifyReply,
  ) {
    const status = await consentService.getStatus(request.params.id);
    return reply.code(200).send({ data: status });
  }

  // -------------------------------------------------------------------------
  // POST /consent/:id/revoke
  // -------------------------------------------------------------------------

  async function revokeHandler(
    request: FastifyRequest<{ Params: UuidParam }>,
    reply: FastifyReply,
  ) {
    const artefact = await consentService.revoke(request.params.id);
    return reply.code(200).send({ data: artefact });
  }

  // -------------------------------------------------------------------------
  // GET /consent/summary/:patientId
  // -------------------------------------------------------------------------

  async function summaryHandler(
    request: FastifyRequest<{ Params: PatientParam }>,
    reply: FastifyReply,
  ) {
    const summary = await consentService.summarize(request.params.patientId);
    return reply.code(200).send({ data: summary });
  }

  return { initHandler, statusHandler, revokeHandler, summaryHandler };
}
