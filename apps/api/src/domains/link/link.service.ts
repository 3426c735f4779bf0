// ============================================================================
// Link State Machine
// INITIATED -> OTP_SENT -> CONFIRMED, OTP_SENT -> FAILED,
// INITIATED | OTP_SENT -> EXPIRED. Transitions only move forward.
// ============================================================================

import { createHash, randomInt, randomUUID, timingSafeEqual } from 'node:crypto';
import {
  CallbackKind,
  CallbackOwner,
  GatewayErrorCode,
} from '@consent-gateway/shared/constants/gateway.constants.js';
import { BridgeRole } from '@consent-gateway/shared/constants/bridge.constants.js';
import {
  LinkState,
  LinkFailureReason,
  LINK_TERMINAL_STATES,
  LINK_VALID_TRANSITIONS,
  OTP_LENGTH,
} from '@consent-gateway/shared/constants/link.constants.js';
import { discoveryResultSchema } from '@consent-gateway/shared/schemas/link.schema.js';
import type {
  CandidateCareContext,
  SelectCareContextLink,
  SelectLinkRequest,
} from '@consent-gateway/shared/schemas/db/gateway.schema.js';
import { NotFoundError, StateConflictError, ValidationError } from '../../lib/errors.js';
import { createKeyedLock } from '../../lib/keyed-lock.js';
import type { BridgeClient } from '../../lib/bridge-client.js';
import type { Clock } from '../../lib/clock.js';
import type { Logger } from '../../lib/logger.js';
import type { BridgeRegistry } from '../bridge/bridge.service.js';
import type { CallbackRouter } from '../callback/callback.service.js';
import type { LinkRepository, LinkRequestUpdate } from './link.repository.js';
import type { OtpDispatcher } from './link.otp.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A link request as callers see it: everything but the OTP hash. */
export interface LinkRequestView {
  requestId: string;
  patientRef: string;
  hipId: string;
  state: LinkState;
  otpAttempts: number;
  candidateCareContexts: CandidateCareContext[];
  failureReason: LinkFailureReason | null;
  expiresAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface LinkServiceConfig {
  ttlSeconds: number;
  maxOtpAttempts: number;
}

export interface LinkServiceDeps {
  linkRepo: LinkRepository;
  bridgeRegistry: Pick<BridgeRegistry, 'resolveActive'>;
  callbackRouter: Pick<CallbackRouter, 'expect' | 'forget' | 'registerHandler'>;
  bridgeClient: Pick<BridgeClient, 'discover'>;
  otpDispatcher: OtpDispatcher;
  clock: Clock;
  logger: Logger;
  config: LinkServiceConfig;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toView(row: SelectLinkRequest): LinkRequestView {
  return {
    requestId: row.requestId,
    patientRef: row.patientRef,
    hipId: row.hipId,
    state: row.state,
    otpAttempts: row.otpAttempts,
    candidateCareContexts: row.candidateCareContexts,
    failureReason: row.failureReason,
    expiresAt: row.expiresAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function generateOtp(): string {
  return randomInt(0, 10 ** OTP_LENGTH).toString().padStart(OTP_LENGTH, '0');
}

function hashOtp(otp: string): string {
  return createHash('sha256').update(otp).digest('hex');
}

function otpMatches(otp: string, storedHash: string): boolean {
  const given = Buffer.from(hashOtp(otp), 'hex');
  const stored = Buffer.from(storedHash, 'hex');
  return given.length === stored.length && timingSafeEqual(given, stored);
}

function isOpen(state: LinkState): boolean {
  return !LINK_TERMINAL_STATES.has(state);
}

function isPastDeadline(row: SelectLinkRequest, now: Date): boolean {
  return now.getTime() > row.expiresAt.getTime();
}

function unknownRequest(requestId: string): NotFoundError {
  return new NotFoundError(`Link request ${requestId}`, GatewayErrorCode.UNKNOWN_REQUEST);
}

// ---------------------------------------------------------------------------
// Service Factory
// ---------------------------------------------------------------------------

export function createLinkService(deps: LinkServiceDeps) {
  const {
    linkRepo,
    bridgeRegistry,
    callbackRouter,
    bridgeClient,
    otpDispatcher,
    clock,
    logger,
    config,
  } = deps;
  const lock = createKeyedLock();
  const ttlMs = config.ttlSeconds * 1000;

  async function transition(
    row: SelectLinkRequest,
    to: LinkState,
    patch: Omit<LinkRequestUpdate, 'state' | 'updatedAt'> = {},
  ): Promise<SelectLinkRequest> {
    if (!LINK_VALID_TRANSITIONS[row.state].includes(to)) {
      throw new StateConflictError(
        `Link request ${row.requestId} cannot move from ${row.state} to ${to}`,
      );
    }
    const updated = await linkRepo.update(row.requestId, {
      ...patch,
      state: to,
      updatedAt: clock.now(),
    });
    if (!updated) throw unknownRequest(row.requestId);
    return updated;
  }

  /** Lazy expiry. Caller must hold the request's lock. */
  async function expireIfDue(row: SelectLinkRequest, now: Date): Promise<SelectLinkRequest> {
    if (!isOpen(row.state) || !isPastDeadline(row, now)) return row;

    const expired = await transition(row, LinkState.EXPIRED, { otpHash: null });
    callbackRouter.forget(row.requestId);
    logger.info({ requestId: row.requestId, from: row.state }, 'link request expired');
    return expired;
  }

  // -------------------------------------------------------------------------
  // onDiscoveryResult — HIP answered with candidate care contexts
  // -------------------------------------------------------------------------

  async function onDiscoveryResult(
    requestId: string,
    careContexts: readonly CandidateCareContext[],
  ): Promise<LinkRequestView> {
    const { request, otp } = await lock.run(requestId, async () => {
      const row = await linkRepo.findById(requestId);
      if (!row) throw unknownRequest(requestId);

      const now = clock.now();
      if (isOpen(row.state) && isPastDeadline(row, now)) {
        await expireIfDue(row, now);
        throw new StateConflictError(
          `Link request ${requestId} has expired`,
          GatewayErrorCode.REQUEST_EXPIRED,
          410,
        );
      }
      if (row.state !== LinkState.INITIATED) {
        throw new StateConflictError(
          `Link request ${requestId} is ${row.state}; discovery result not accepted`,
        );
      }

      const code = generateOtp();
      const updated = await transition(row, LinkState.OTP_SENT, {
        candidateCareContexts: careContexts.map((c) => ({ ...c })),
        otpHash: hashOtp(code),
        otpAttempts: 0,
        expiresAt: new Date(now.getTime() + ttlMs),
      });
      return { request: updated, otp: code };
    });

    try {
      await otpDispatcher.send({
        requestId,
        patientRef: request.patientRef,
        hipId: request.hipId,
        otp,
        expiresAt: request.expiresAt,
      });
    } catch (err) {
      logger.warn({ err, requestId }, 'otp dispatch failed; request will expire unless retried');
    }

    return toView(request);
  }

  callbackRouter.registerHandler(
    CallbackKind.DISCOVERY_RESULT,
    discoveryResultSchema,
    async (requestId, body) => {
      await onDiscoveryResult(requestId, body.careContexts);
    },
  );

  return {
    // -----------------------------------------------------------------------
    // initDiscovery — create INITIATED and ask the HIP for care contexts
    // -----------------------------------------------------------------------

    async initDiscovery(patientRef: string, hipId: string): Promise<LinkRequestView> {
      const bridge = await bridgeRegistry.resolveActive(hipId, BridgeRole.HIP);

      const now = clock.now();
      const request = await linkRepo.insert({
        requestId: randomUUID(),
        patientRef,
        hipId,
        state: LinkState.INITIATED,
        otpAttempts: 0,
        otpHash: null,
        candidateCareContexts: [],
        failureReason: null,
        expiresAt: new Date(now.getTime() + ttlMs),
        createdAt: now,
        updatedAt: now,
      });

      callbackRouter.expect(request.requestId, CallbackOwner.LINK, [CallbackKind.DISCOVERY_RESULT]);

      try {
        await bridgeClient.discover(bridge, { requestId: request.requestId, patientRef });
      } catch (err) {
        logger.warn(
          { err, requestId: request.requestId, hipId },
          'discovery dispatch failed; request will expire',
        );
      }

      return toView(request);
    },

    onDiscoveryResult,

    // -----------------------------------------------------------------------
    // confirm — verify the OTP and persist the care context link
    // -----------------------------------------------------------------------

    confirm(requestId: string, otp: string): Promise<SelectCareContextLink> {
      return lock.run(requestId, async () => {
        const row = await linkRepo.findById(requestId);
        if (!row) throw unknownRequest(requestId);

        const now = clock.now();

        if (row.state === LinkState.CONFIRMED) {
          throw new StateConflictError(
            `Link request ${requestId} is already confirmed`,
            GatewayErrorCode.ALREADY_CONFIRMED,
          );
        }

        if (isOpen(row.state) && isPastDeadline(row, now)) {
          await expireIfDue(row, now);
          throw new StateConflictError(
            `Link request ${requestId} has expired`,
            GatewayErrorCode.REQUEST_EXPIRED,
            410,
          );
        }

        if (row.state !== LinkState.OTP_SENT || !row.otpHash) {
          throw new StateConflictError(
            `Link request ${requestId} is ${row.state}; OTP cannot be confirmed`,
          );
        }

        if (!otpMatches(otp, row.otpHash)) {
          const attempts = row.otpAttempts + 1;
          if (attempts >= config.maxOtpAttempts) {
            await transition(row, LinkState.FAILED, {
              otpAttempts: attempts,
              otpHash: null,
              failureReason: LinkFailureReason.OTP_ATTEMPTS_EXHAUSTED,
            });
            logger.info({ requestId, attempts }, 'link request failed: otp attempts exhausted');
          } else {
            await linkRepo.update(requestId, { otpAttempts: attempts, updatedAt: now });
          }
          throw new ValidationError(
            'Invalid OTP',
            { attemptsRemaining: config.maxOtpAttempts - attempts },
            GatewayErrorCode.INVALID_OTP,
          );
        }

        // Append before the transition. A failed append leaves OTP_SENT.
        const link = await linkRepo.appendCareContexts(
          row.patientRef,
          row.hipId,
          row.candidateCareContexts.map((c) => c.referenceNumber),
          now,
        );
        await transition(row, LinkState.CONFIRMED, { otpHash: null });
        logger.info({ requestId, hipId: row.hipId }, 'care contexts linked');
        return link;
      });
    },

    getStatus(requestId: string): Promise<LinkRequestView> {
      return lock.run(requestId, async () => {
        const row = await linkRepo.findById(requestId);
        if (!row) throw unknownRequest(requestId);
        return toView(await expireIfDue(row, clock.now()));
      });
    },

    listLinks(patientId: string): Promise<SelectCareContextLink[]> {
      return linkRepo.listLinksByPatient(patientId);
    },

    /** Expire every open request whose deadline passed. Returns the count. */
    async sweepExpired(now: Date = clock.now()): Promise<number> {
      const due = await linkRepo.listOpenExpiredBefore(now);
      let expired = 0;
      for (const candidate of due) {
        const changed = await lock.run(candidate.requestId, async () => {
          const row = await linkRepo.findById(candidate.requestId);
          if (!row || !isOpen(row.state) || !isPastDeadline(row, now)) return false;
          await expireIfDue(row, now);
          return true;
        });
        if (changed) expired++;
      }
      return expired;
    },

    /** Re-register discovery correlations for INITIATED requests. Returns the count. */
    async restorePending(): Promise<number> {
      const waiting = await linkRepo.listAwaitingDiscovery();
      for (const row of waiting) {
        callbackRouter.expect(row.requestId, CallbackOwner.LINK, [CallbackKind.DISCOVERY_RESULT]);
      }
      return waiting.length;
    },
  };
}

export type LinkService = ReturnType<typeof createLinkService>;
