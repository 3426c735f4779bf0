import { type FastifyInstance } from 'fastify';
import { consentInitSchema, type ConsentInit } from '@consent-gateway/shared/schemas/consent.schema.js';
import { patientParamSchema, type PatientParam } from '@consent-gateway/shared/schemas/link.schema.js';
import { uuidParamSchema, type UuidParam } from '@consent-gateway/shared/schemas/common.schema.js';
import { createConsentHandlers, type ConsentHandlerDeps } from './consent.handlers.js';

// ---------------------------------------------------------------------------
// Consent Routes
// ---------------------------------------------------------------------------

export async function consentRoutes(
  app: FastifyInstance,
  opts: { deps: ConsentHandlerDeps },
) {
  const handlers = createConsentHandlers(opts.deps);

  app.post<{ Body: ConsentInit }>('/consent/init', {
    schema: { body: consentInitSchema },
    preHandler: [app.authenticate],
    handler: handlers.initHandler,
  });

  app.get<{ Params: UuidParam }>('/consent/status/:id', {
    schema: { params: uuidParamSchema },
    preHandler: [app.authenticate],
    handler: handlers.statusHandler,
  });

  app.post<{ Params: UuidParam }>('/consent/:id/revoke', {
    schema: { params: uuidParamSchema },
    preHandler: [app.authenticate],
    handler: handlers.revokeHandler,
  });

  app.get<{ Params: PatientParam }>('/consent/summary/:patientId', {
    schema: { params: patientParamSchema },
    preHandler: [app.authenticate],
    handler: handlers.summaryHandler,
  });
}
