// ============================================================================
// Callback Router
// Single source of truth for "who is waiting for what": every outbound
// asynchronous call registers its correlation id here before it is sent,
// and every inbound webhook is dispatched from here.
// ============================================================================

import type { z } from 'zod';
import {
  GatewayErrorCode,
  type CallbackKind,
  type CallbackOwner,
} from '@consent-gateway/shared/constants/gateway.constants.js';
import { AppError, NotFoundError, StateConflictError, ValidationError } from '../../lib/errors.js';
import { createKeyedLock } from '../../lib/keyed-lock.js';
import type { Clock } from '../../lib/clock.js';
import type { Logger } from '../../lib/logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CorrelationEntry {
  owner: CallbackOwner;
  expectedKinds: ReadonlySet<CallbackKind>;
  registeredAt: Date;
}

type Dispatch = (correlationId: string, rawBody: unknown) => Promise<void>;

export interface CallbackRouterDeps {
  clock: Clock;
  logger: Logger;
}

/**
 * Errors after which the correlation can never complete: the owning entity
 * is missing or already closed. Anything else leaves the entry in place.
 */
function closesCorrelation(err: unknown): boolean {
  return (
    err instanceof AppError &&
    !(err instanceof ValidationError) &&
    (err.statusCode === 404 || err.statusCode === 409 || err.statusCode === 410)
  );
}

// ---------------------------------------------------------------------------
// Router Factory
// ---------------------------------------------------------------------------

export function createCallbackRouter(deps: CallbackRouterDeps) {
  const { clock, logger } = deps;
  const entries = new Map<string, CorrelationEntry>();
  const handlers = new Map<CallbackKind, Dispatch>();
  const lock = createKeyedLock();

  return {
    /** Record that `owner` awaits one of `kinds` for this correlation id. */
    expect(correlationId: string, owner: CallbackOwner, kinds: readonly CallbackKind[]): void {
      entries.set(correlationId, {
        owner,
        expectedKinds: new Set(kinds),
        registeredAt: clock.now(),
      });
    },

    forget(correlationId: string): void {
      entries.delete(correlationId);
    },

    lookup(correlationId: string): CorrelationEntry | null {
      return entries.get(correlationId) ?? null;
    },

    pendingCount(): number {
      return entries.size;
    },

    /**
     * Bind a callback kind to the state machine operation that consumes it.
     * The raw webhook body is parsed with `schema` before `handler` runs.
     */
    registerHandler<S extends z.ZodTypeAny>(
      kind: CallbackKind,
      schema: S,
      handler: (correlationId: string, body: z.output<S>) => Promise<void>,
    ): void {
      if (handlers.has(kind)) {
        throw new Error(`A handler for ${kind} is already registered`);
      }
      handlers.set(kind, async (correlationId, rawBody) => {
        const parsed = schema.safeParse(rawBody);
        if (!parsed.success) {
          throw new ValidationError(
            `Invalid ${kind} callback body`,
            parsed.error.flatten().fieldErrors,
          );
        }
        await handler(correlationId, parsed.data);
      });
    },

    /**
     * Dispatch one webhook. Calls for the same correlation id run one at a
     * time, so a duplicate arriving mid-dispatch finds the entry gone.
     */
    handleCallback(correlationId: string, kind: CallbackKind, body: unknown): Promise<void> {
      return lock.run(correlationId, async () => {
        const entry = entries.get(correlationId);
        if (!entry) {
          throw new NotFoundError(
            `Correlation ${correlationId}`,
            GatewayErrorCode.UNKNOWN_CORRELATION,
          );
        }

        if (!entry.expectedKinds.has(kind)) {
          throw new StateConflictError(
            `Correlation ${correlationId} does not expect ${kind}`,
            GatewayErrorCode.UNEXPECTED_CALLBACK,
          );
        }

        const dispatch = handlers.get(kind);
        if (!dispatch) {
          throw new Error(`No handler registered for ${kind}`);
        }

        try {
          await dispatch(correlationId, body);
        } catch (err) {
          if (closesCorrelation(err)) {
            entries.delete(correlationId);
            logger.info({ correlationId, kind, owner: entry.owner }, 'correlation closed by rejected callback');
          }
          throw err;
        }

        entries.delete(correlationId);
        logger.debug({ correlationId, kind, owner: entry.owner }, 'callback dispatched');
      });
    },
  };
}

export type CallbackRouter = ReturnType<typeof createCallbackRouter>;
