import { randomUUID } from 'node:crypto';
import { pathToFileURL } from 'node:url';
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { GatewayErrorCode } from '@consent-gateway/shared/constants/gateway.constants.js';
import { getEnv, parseGatewayClients, type Env } from './lib/env.js';
import { AppError } from './lib/errors.js';
import { systemClock, type Clock } from './lib/clock.js';
import { connectDatabase } from './lib/db.js';
import { createBridgeClient, type BridgeClient, type OutboundConfig } from './lib/bridge-client.js';
import { createSweeper } from './lib/sweeper.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import { bridgeAuthPluginFp } from './plugins/bridge-auth.plugin.js';
import { createTokenService } from './domains/token/token.service.js';
import { tokenRoutes } from './domains/token/token.routes.js';
import {
  createBridgeRepository,
  createInMemoryBridgeRepository,
} from './domains/bridge/bridge.repository.js';
import { createBridgeRegistry } from './domains/bridge/bridge.service.js';
import { bridgeRoutes } from './domains/bridge/bridge.routes.js';
import { createCallbackRouter } from './domains/callback/callback.service.js';
import { callbackRoutes } from './domains/callback/callback.routes.js';
import {
  createLinkRepository,
  createInMemoryLinkRepository,
} from './domains/link/link.repository.js';
import {
  createHttpOtpDispatcher,
  createLoggingOtpDispatcher,
  type OtpDispatcher,
} from './domains/link/link.otp.js';
import { createLinkService } from './domains/link/link.service.js';
import { linkRoutes } from './domains/link/link.routes.js';
import {
  createConsentRepository,
  createInMemoryConsentRepository,
} from './domains/consent/consent.repository.js';
import {
  createHttpConsentNotifier,
  createLoggingConsentNotifier,
  type ConsentNotifier,
} from './domains/consent/consent.notifier.js';
import { createConsentService } from './domains/consent/consent.service.js';
import { consentRoutes } from './domains/consent/consent.routes.js';
import {
  createTransferRepository,
  createInMemoryTransferRepository,
} from './domains/transfer/transfer.repository.js';
import { createTransferService } from './domains/transfer/transfer.service.js';
import { transferRoutes } from './domains/transfer/transfer.routes.js';

// ---------------------------------------------------------------------------
// Build options. Each has a production default; tests override them.
// ---------------------------------------------------------------------------

export interface BuildAppOptions {
  env?: Env;
  clock?: Clock;
  /** Replaces the HTTP bridge client. */
  bridgeClient?: BridgeClient;
  otpDispatcher?: OtpDispatcher;
  notifier?: ConsentNotifier;
  fetchImpl?: typeof fetch;
  /** Backoff sleep between forwarding attempts. */
  sleep?: (ms: number) => Promise<void>;
  logger?: boolean;
  rateLimitMax?: number;
}

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
  const env = opts.env ?? getEnv();
  const clock = opts.clock ?? systemClock;

  const app = Fastify({
    logger: opts.logger === false ? false : { level: env.LOG_LEVEL },
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // -------------------------------------------------------------------------
  // Error handler — AppError subclasses carry their own status and code
  // -------------------------------------------------------------------------

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof AppError) {
      const body: { code: string; message: string; details?: unknown } = {
        code: error.code,
        message: error.message,
      };
      if (error.details !== undefined) body.details = error.details;
      return reply.code(error.statusCode).send({ error: body });
    }
    if (error.validation) {
      return reply.code(400).send({
        error: {
          code: GatewayErrorCode.VALIDATION_ERROR,
          message: 'Validation failed',
          details: error.validation,
        },
      });
    }
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send({
        error: { code: error.code ?? 'ERROR', message: error.message },
      });
    }
    request.log.error(error);
    return reply.code(500).send({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });

  // -------------------------------------------------------------------------
  // Persistence: Postgres when configured, process memory otherwise
  // -------------------------------------------------------------------------

  const database = env.DATABASE_URL ? connectDatabase(env.DATABASE_URL) : null;
  const repos = database
    ? {
        bridgeRepo: createBridgeRepository(database.db),
        linkRepo: createLinkRepository(database.db),
        consentRepo: createConsentRepository(database.db),
        transferRepo: createTransferRepository(database.db),
      }
    : {
        bridgeRepo: createInMemoryBridgeRepository(),
        linkRepo: createInMemoryLinkRepository(),
        consentRepo: createInMemoryConsentRepository(),
        transferRepo: createInMemoryTransferRepository(),
      };

  // -------------------------------------------------------------------------
  // Services
  // -------------------------------------------------------------------------

  const logger = app.log;

  const tokenService = createTokenService({
    secret: env.GATEWAY_TOKEN_SECRET,
    ttlSeconds: env.GATEWAY_TOKEN_TTL_SECONDS,
    clients: parseGatewayClients(env.GATEWAY_CLIENTS),
    gatewayClientId: env.GATEWAY_CLIENT_ID,
    clock,
  });

  const outbound: OutboundConfig = {
    cmId: env.GATEWAY_CM_ID,
    timeoutMs: env.OUTBOUND_TIMEOUT_MS,
    getAccessToken: () => tokenService.issueGatewayToken().accessToken,
    fetchImpl: opts.fetchImpl,
  };

  const bridgeClient = opts.bridgeClient ?? createBridgeClient(outbound);
  const otpDispatcher =
    opts.otpDispatcher ??
    (env.OTP_SERVICE_URL
      ? createHttpOtpDispatcher(env.OTP_SERVICE_URL, outbound)
      : createLoggingOtpDispatcher(logger));
  const notifier =
    opts.notifier ??
    (env.CONSENT_NOTIFY_URL
      ? createHttpConsentNotifier(env.CONSENT_NOTIFY_URL, outbound)
      : createLoggingConsentNotifier(logger));

  const bridgeRegistry = createBridgeRegistry({ bridgeRepo: repos.bridgeRepo, clock, logger });
  const callbackRouter = createCallbackRouter({ clock, logger });

  const linkService = createLinkService({
    linkRepo: repos.linkRepo,
    bridgeRegistry,
    callbackRouter,
    bridgeClient,
    otpDispatcher,
    clock,
    logger,
    config: { ttlSeconds: env.LINK_TTL_SECONDS, maxOtpAttempts: env.LINK_MAX_OTP_ATTEMPTS },
  });

  const consentService = createConsentService({
    consentRepo: repos.consentRepo,
    bridgeRegistry,
    callbackRouter,
    notifier,
    clock,
    logger,
  });

  const transferService = createTransferService({
    transferRepo: repos.transferRepo,
    consentService,
    bridgeRegistry,
    callbackRouter,
    bridgeClient,
    clock,
    logger,
    config: {
      deliveryTimeoutSeconds: env.DELIVERY_TIMEOUT_SECONDS,
      forwardRetry: {
        maxAttempts: env.FORWARD_MAX_ATTEMPTS,
        baseDelayMs: env.FORWARD_BACKOFF_MS,
        sleep: opts.sleep,
      },
    },
  });

  const sweeper = createSweeper(
    { link: linkService, consent: consentService, transfer: transferService },
    { intervalMs: env.SWEEP_INTERVAL_SECONDS * 1000, clock, logger },
  );

  // Correlations live in memory; rebuild them from open entities on start.
  app.addHook('onReady', async () => {
    const restored = {
      link: await linkService.restorePending(),
      consent: await consentService.restorePending(),
      transfer: await transferService.restorePending(),
    };
    if (restored.link + restored.consent + restored.transfer > 0) {
      logger.info(restored, 'restored pending callback correlations');
    }
    sweeper.start();
  });
  app.addHook('onClose', async () => {
    sweeper.stop();
    if (database) await database.close();
  });

  // -------------------------------------------------------------------------
  // Plugins
  // -------------------------------------------------------------------------

  app.register(helmet);
  app.register(cors, { origin: env.CORS_ORIGIN });
  app.register(rateLimitPluginFp, { defaultMax: opts.rateLimitMax });
  app.register(bridgeAuthPluginFp, { tokenService });

  // -------------------------------------------------------------------------
  // Routes
  // -------------------------------------------------------------------------

  app.get('/health', async () => ({ status: 'ok' }));

  app.register(tokenRoutes, { deps: { tokenService } });
  app.register(bridgeRoutes, { deps: { bridgeRegistry } });
  app.register(callbackRoutes, { deps: { callbackRouter } });
  app.register(linkRoutes, { deps: { linkService } });
  app.register(consentRoutes, { deps: { consentService } });
  app.register(transferRoutes, { deps: { transferService } });

  return app;
}

// Start server when run directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  const env = getEnv();
  const app = buildApp({ env });

  app.listen({ port: env.API_PORT, host: env.API_HOST }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
