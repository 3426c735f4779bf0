// ============================================================================
// Token Service
// Issues and verifies bearer tokens for bridge <-> gateway calls. A token is
// base64url(JSON{sub, iat, exp}) + "." + base64url(HMAC-SHA256(secret, body)),
// so issuing and verifying are pure functions of credentials, secret and clock.
// ============================================================================

import { createHash, createHmac, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { TOKEN_TYPE } from '@consent-gateway/shared/constants/gateway.constants.js';
import { UnauthorizedError } from '../../lib/errors.js';
import type { Clock } from '../../lib/clock.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface IssuedToken {
  accessToken: string;
  tokenType: typeof TOKEN_TYPE;
  expiresIn: number;
  expiresAt: Date;
}

export interface VerifiedToken {
  clientId: string;
  expiresAt: Date;
}

const tokenClaimsSchema = z.object({
  sub: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

type TokenClaims = z.infer<typeof tokenClaimsSchema>;

export interface TokenServiceDeps {
  secret: string;
  ttlSeconds: number;
  /** clientId -> clientSecret */
  clients: ReadonlyMap<string, string>;
  /** Identity the gateway presents on its own outbound calls. */
  gatewayClientId: string;
  clock: Clock;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function sign(secret: string, body: string): string {
  return createHmac('sha256', secret).update(body).digest('base64url');
}

function sha256(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/** Constant-time string comparison over fixed-length digests. */
function safeEqual(a: string, b: string): boolean {
  return timingSafeEqual(sha256(a), sha256(b));
}

function decodeClaims(body: string): TokenClaims | null {
  try {
    const parsed: unknown = JSON.parse(Buffer.from(body, 'base64url').toString('utf8'));
    const result = tokenClaimsSchema.safeParse(parsed);
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Service Factory
// ---------------------------------------------------------------------------

export function createTokenService(deps: TokenServiceDeps) {
  const { secret, ttlSeconds, clients, gatewayClientId, clock } = deps;

  function mint(clientId: string): IssuedToken {
    const iat = Math.floor(clock.now().getTime() / 1000);
    const exp = iat + ttlSeconds;
    const body = Buffer.from(JSON.stringify({ sub: clientId, iat, exp })).toString('base64url');

    return {
      accessToken: `${body}.${sign(secret, body)}`,
      tokenType: TOKEN_TYPE,
      expiresIn: ttlSeconds,
      expiresAt: new Date(exp * 1000),
    };
  }

  return {
    /**
     * Exchange client credentials for a bearer token.
     * Unknown client and wrong secret are indistinguishable to the caller.
     */
    issueToken(clientId: string, clientSecret: string): IssuedToken {
      const expected = clients.get(clientId);
      if (expected === undefined || !safeEqual(expected, clientSecret)) {
        throw new UnauthorizedError('Invalid client credentials');
      }
      return mint(clientId);
    },

    /** Token the gateway itself presents to bridges and collaborators. */
    issueGatewayToken(): IssuedToken {
      return mint(gatewayClientId);
    },

    /**
     * Returns the token's subject, or null for a malformed, forged or
     * expired token.
     */
    verifyToken(token: string): VerifiedToken | null {
      const parts = token.split('.');
      if (parts.length !== 2) return null;
      const [body, signature] = parts;
      if (!body || !signature) return null;

      if (!safeEqual(sign(secret, body), signature)) return null;

      const claims = decodeClaims(body);
      if (!claims) return null;

      const expiresAtMs = claims.exp * 1000;
      if (clock.now().getTime() >= expiresAtMs) return null;

      return { clientId: claims.sub, expiresAt: new Date(expiresAtMs) };
    },
  };
}

export type TokenService = ReturnType<typeof createTokenService>;
