import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import {
  GatewayErrorCode,
  GatewayHeader,
  REQUIRED_BRIDGE_HEADERS,
} from '@consent-gateway/shared/constants/gateway.constants.js';
import type { TokenService, VerifiedToken } from '../domains/token/token.service.js';

// ---------------------------------------------------------------------------
// Type augmentation: add bridgeContext to Fastify request
// ---------------------------------------------------------------------------

export interface BridgeContext {
  clientId: string;
  requestId: string;
  timestamp: string;
  cmId: string;
}

declare module 'fastify' {
  interface FastifyRequest {
    bridgeContext: BridgeContext;
  }
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
    authenticateCallback: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
}

// ---------------------------------------------------------------------------
// Helper: read a single header value
// ---------------------------------------------------------------------------

function headerValue(request: FastifyRequest, name: string): string | null {
  const raw = request.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value && value.trim().length > 0 ? value.trim() : null;
}

// ---------------------------------------------------------------------------
// Helper: extract bearer token from the Authorization header
// ---------------------------------------------------------------------------

function parseBearer(authorization: string | null): string | null {
  if (!authorization) return null;
  const [scheme, token] = authorization.split(/\s+/, 2);
  if (!scheme || scheme.toLowerCase() !== 'bearer' || !token) return null;
  return token;
}

// ---------------------------------------------------------------------------
// Plugin: authenticate
// ---------------------------------------------------------------------------

export interface BridgeAuthPluginOptions {
  tokenService: Pick<TokenService, 'verifyToken'>;
}

async function bridgeAuthPlugin(app: FastifyInstance, opts: BridgeAuthPluginOptions) {
  const { tokenService } = opts;

  /** Replies 401 and returns null unless the bearer token verifies. */
  function verifyBearer(request: FastifyRequest, reply: FastifyReply): VerifiedToken | null {
    const token = parseBearer(headerValue(request, GatewayHeader.AUTHORIZATION));
    if (!token) {
      reply.code(401).send({
        error: { code: GatewayErrorCode.UNAUTHORIZED, message: 'Authentication required' },
      });
      return null;
    }

    const verified = tokenService.verifyToken(token);
    if (!verified) {
      reply.code(401).send({
        error: { code: GatewayErrorCode.UNAUTHORIZED, message: 'Invalid or expired token' },
      });
      return null;
    }
    return verified;
  }

  function bridgeContext(request: FastifyRequest, verified: VerifiedToken): BridgeContext {
    return {
      clientId: verified.clientId,
      requestId: headerValue(request, GatewayHeader.REQUEST_ID) ?? '',
      timestamp: headerValue(request, GatewayHeader.TIMESTAMP) ?? '',
      cmId: headerValue(request, GatewayHeader.CM_ID) ?? '',
    };
  }

  function missingHeaders(request: FastifyRequest): string[] {
    return REQUIRED_BRIDGE_HEADERS.filter((name) => !headerValue(request, name));
  }

  /**
   * authenticate — preHandler for every inter-bridge call. Verifies the
   * TokenService-issued bearer token; request-id, timestamp and X-CM-ID are
   * opaque pass-throughs checked for presence only.
   */
  app.decorate('authenticate', async function authenticate(
    request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const verified = verifyBearer(request, reply);
    if (!verified) return;

    const missing = missingHeaders(request);
    if (missing.length > 0) {
      reply.code(400).send({
        error: {
          code: GatewayErrorCode.MISSING_HEADER,
          message: `Missing required header(s): ${missing.join(', ')}`,
        },
      });
      return;
    }

    request.bridgeContext = bridgeContext(request, verified);
  });

  /**
   * authenticateCallback — the webhook variant. Only the token can refuse a
   * callback; absent pass-through headers are logged and left empty.
   */
  app.decorate('authenticateCallback', async function authenticateCallback(
    request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const verified = verifyBearer(request, reply);
    if (!verified) return;

    const missing = missingHeaders(request);
    if (missing.length > 0) {
      request.log.warn({ clientId: verified.clientId, missing }, 'callback missing bridge headers');
    }

    request.bridgeContext = bridgeContext(request, verified);
  });
}

// ---------------------------------------------------------------------------
// Exports
// ---------------------------------------------------------------------------

export const bridgeAuthPluginFp = fp(bridgeAuthPlugin, {
  name: 'bridge-auth-plugin',
});

export { parseBearer };
