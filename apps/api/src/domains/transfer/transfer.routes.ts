import { type FastifyInstance } from 'fastify';
import {
  dataRequestSchema,
  hiuParamSchema,
  type DataRequest,
  type HiuParam,
} from '@consent-gateway/shared/schemas/transfer.schema.js';
import { uuidParamSchema, type UuidParam } from '@consent-gateway/shared/schemas/common.schema.js';
import { createTransferHandlers, type TransferHandlerDeps } from './transfer.handlers.js';

// ---------------------------------------------------------------------------
// Data Transfer Routes
// ---------------------------------------------------------------------------

export async function transferRoutes(
  app: FastifyInstance,
  opts: { deps: TransferHandlerDeps },
) {
  const handlers = createTransferHandlers(opts.deps);

  app.post<{ Body: DataRequest }>('/data/request', {
    schema: { body: dataRequestSchema },
    preHandler: [app.authenticate],
    handler: handlers.requestHandler,
  });

  app.get<{ Params: UuidParam }>('/data/status/:id', {
    schema: { params: uuidParamSchema },
    preHandler: [app.authenticate],
    handler: handlers.statusHandler,
  });

  app.post<{ Params: UuidParam }>('/data/:id/ack', {
    schema: { params: uuidParamSchema },
    preHandler: [app.authenticate],
    handler: handlers.acknowledgeHandler,
  });

  app.get<{ Params: HiuParam }>('/data/summary/:hiuId', {
    schema: { params: hiuParamSchema },
    preHandler: [app.authenticate],
    handler: handlers.summaryHandler,
  });
}
