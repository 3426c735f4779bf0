import { type FastifyRequest, type FastifyReply } from 'fastify';
import type { CreateSession } from '@consent-gateway/shared/schemas/token.schema.js';
import type { TokenService } from './token.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface TokenHandlerDeps {
  tokenService: TokenService;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createTokenHandlers(deps: TokenHandlerDeps) {
  // -------------------------------------------------------------------------
  // POST /gateway/sessions — exchange client credentials for a bearer token
  // -------------------------------------------------------------------------

  async function createSessionHandler(
    request: FastifyRequest<{ Body: CreateSession }>,
    reply: FastifyReply,
  ) {
    const issued = deps.tokenService.issueToken(
      request.body.clientId,
      request.body.clientSecret,
    );

    return reply.code(200).send({ data: issued });
  }

  return { createSessionHandler };
}
