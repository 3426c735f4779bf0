import { type FastifyInstance } from 'fastify';
import {
  linkInitSchema,
  linkConfirmSchema,
  patientParamSchema,
  type LinkInit,
  type LinkConfirm,
  type PatientParam,
} from '@consent-gateway/shared/schemas/link.schema.js';
import { uuidParamSchema, type UuidParam } from '@consent-gateway/shared/schemas/common.schema.js';
import { createLinkHandlers, type LinkHandlerDeps } from './link.handlers.js';

// ---------------------------------------------------------------------------
// Link Routes
// ---------------------------------------------------------------------------

export async function linkRoutes(
  app: FastifyInstance,
  opts: { deps: LinkHandlerDeps },
) {
  const handlers = createLinkHandlers(opts.deps);

  app.post<{ Body: LinkInit }>('/link/init', {
    schema: { body: linkInitSchema },
    preHandler: [app.authenticate],
    handler: handlers.initHandler,
  });

  app.post<{ Body: LinkConfirm }>('/link/confirm', {
    schema: { body: linkConfirmSchema },
    preHandler: [app.authenticate],
    handler: handlers.confirmHandler,
  });

  app.get<{ Params: UuidParam }>('/link/status/:id', {
    schema: { params: uuidParamSchema },
    preHandler: [app.authenticate],
    handler: handlers.statusHandler,
  });

  app.get<{ Params: PatientParam }>('/link/contexts/:patientId', {
    schema: { params: patientParamSchema },
    preHandler: [app.authenticate],
    handler: handlers.contextsHandler,
  });
}
