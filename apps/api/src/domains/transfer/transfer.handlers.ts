import { type FastifyRequest, type FastifyReply } from 'fastify';
import type { DataRequest, HiuParam } from '@consent-gateway/shared/schemas/transfer.schema.js';
import type { UuidParam } from '@consent-gateway/shared/schemas/common.schema.js';
import type { TransferService } from './transfer.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface TransferHandlerDeps {
  transferService: TransferService;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createTransferHandlers(deps: TransferHandlerDeps) {
  const { transferService } = deps;

  // -------------------------------------------------------------------------
  // POST /data/request — 202 with the job's state after the HIP forward
  // -------------------------------------------------------------------------

  async function requestHandler(
    request: FastifyRequest<{ Body: DataRequest }>,
    reply: FastifyReply,
  ) {
    const { hiuId, consentId, queryWindow } = request.body;
    const job = await transferService.requestData(hiuId, consentId, queryWindow);
    return reply.code(202).send({ data: { transferId: job.transferId, state: job.state } });
  }

  async function statusHandler(
    request: FastifyRequest<{ Params: UuidParam }>,
    reply: FastifyReply,
  ) {
    const job = await transferService.getStatus(request.params.id);
    return reply.code(200).send({ data: job });
  }

  async function acknowledgeHandler(
    request: FastifyRequest<{ Params: UuidParam }>,
    reply: FastifyReply,
  ) {
    const job = await transferService.acknowledge(request.params.id);
    return reply.code(200).send({ data: job });
  }

  async function summaryHandler(
    request: FastifyRequest<{ Params: HiuParam }>,
    reply: FastifyReply,
  ) {
    const summary = await transferService.summarize(request.params.hiuId);
    return reply.code(200).send({ data: summary });
  }

  return { requestHandler, statusHandler, acknowledgeHandler, summaryHandler };
}
