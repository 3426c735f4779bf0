import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  callbackEnvelopeSchema,
  correlationParamSchema,
} from '@consent-gateway/shared/schemas/callback.schema.js';
import { AppError } from '../../lib/errors.js';
import type { CallbackRouter } from './callback.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface CallbackHandlerDeps {
  callbackRouter: CallbackRouter;
}

const RECEIVED = { data: { received: true } } as const;

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createCallbackHandlers(deps: CallbackHandlerDeps) {
  const { callbackRouter } = deps;

  // -------------------------------------------------------------------------
  // POST /callback/:correlationId
  // Webhooks always get 200 once authenticated. The outcome is only logged;
  // callers observe it through the status endpoints.
  // -------------------------------------------------------------------------

  async function callbackHandler(request: FastifyRequest, reply: FastifyReply) {
    const params = correlationParamSchema.safeParse(request.params);
    const envelope = callbackEnvelopeSchema.safeParse(request.body);

    if (!params.success || !envelope.success) {
      request.log.warn(
        {
          params: params.success ? undefined : params.error.flatten().fieldErrors,
          envelope: envelope.success ? undefined : envelope.error.flatten().fieldErrors,
        },
        'malformed callback dropped',
      );
      return reply.code(200).send(RECEIVED);
    }

    const { correlationId } = params.data;
    const { kind, body } = envelope.data;

    try {
      await callbackRouter.handleCallback(correlationId, kind, body);
      request.log.info({ correlationId, kind }, 'callback accepted');
    } catch (err) {
      if (err instanceof AppError) {
        request.log.warn(
          { correlationId, kind, code: err.code, reason: err.message },
          'callback rejected',
        );
      } else {
        request.log.error({ err, correlationId, kind }, 'callback failed');
      }
    }

    return reply.code(200).send(RECEIVED);
  }

  return { callbackHandler };
}
