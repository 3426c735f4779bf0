// ============================================================================
// Consent State Machine
// REQUESTED -> GRANTED -> EXPIRED | REVOKED, REQUESTED -> DENIED.
// Expiry is evaluated at read time under the consent's lock; the sweep only
// does the same for artefacts nobody reads.
// ============================================================================

import { randomUUID } from 'node:crypto';
import {
  CallbackKind,
  CallbackOwner,
  GatewayErrorCode,
} from '@consent-gateway/shared/constants/gateway.constants.js';
import { BridgeRole } from '@consent-gateway/shared/constants/bridge.constants.js';
import {
  ConsentStatus,
  CONSENT_VALID_TRANSITIONS,
  RECORD_TYPES,
  type RecordType,
} from '@consent-gateway/shared/constants/consent.constants.js';
import {
  consentGrantedSchema,
  consentDeniedSchema,
} from '@consent-gateway/shared/schemas/consent.schema.js';
import type { SelectConsentArtefact } from '@consent-gateway/shared/schemas/db/gateway.schema.js';
import { NotFoundError, StateConflictError, ValidationError } from '../../lib/errors.js';
import { createKeyedLock } from '../../lib/keyed-lock.js';
import type { Clock } from '../../lib/clock.js';
import type { Logger } from '../../lib/logger.js';
import type { BridgeRegistry } from '../bridge/bridge.service.js';
import type { CallbackRouter } from '../callback/callback.service.js';
import type { ConsentRepository, ConsentUpdate } from './consent.repository.js';
import type { ConsentNotifier } from './consent.notifier.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DateRange {
  from: Date;
  to: Date;
}

export interface ConsentStatusView {
  consentId: string;
  status: ConsentStatus;
  validUntil: Date | null;
}

export interface ConsentSummary {
  patientId: string;
  total: number;
  byStatus: Record<ConsentStatus, number>;
  byHiu: Record<string, number>;
}

/**
 * Held while the consent's lock is taken. Callers use it to check activity
 * and act on the answer before any revoke or expiry can interleave.
 */
export interface ConsentScope {
  artefact: SelectConsentArtefact | null;
  checkActive(hipId: string, recordType: RecordType, at: Date, date?: Date): Promise<boolean>;
}

export interface ConsentServiceDeps {
  consentRepo: ConsentRepository;
  bridgeRegistry: Pick<BridgeRegistry, 'resolveActive'>;
  callbackRouter: Pick<CallbackRouter, 'expect' | 'forget' | 'registerHandler'>;
  notifier: ConsentNotifier;
  clock: Clock;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function unknownConsent(consentId: string): NotFoundError {
  return new NotFoundError(`Consent ${consentId}`, GatewayErrorCode.UNKNOWN_CONSENT);
}

function isLapsed(row: SelectConsentArtefact, at: Date): boolean {
  return (
    row.status === ConsentStatus.GRANTED &&
    row.validUntil !== null &&
    at.getTime() > row.validUntil.getTime()
  );
}

function withinScope(
  row: SelectConsentArtefact,
  hipId: string,
  recordType: RecordType,
  at: Date,
  date: Date,
): boolean {
  return (
    row.status === ConsentStatus.GRANTED &&
    row.validUntil !== null &&
    at.getTime() <= row.validUntil.getTime() &&
    row.hipId === hipId &&
    row.recordTypes.includes(recordType) &&
    date.getTime() >= row.dateFrom.getTime() &&
    date.getTime() <= row.dateTo.getTime()
  );
}

function emptyStatusCounts(): Record<ConsentStatus, number> {
  return {
    [ConsentStatus.REQUESTED]: 0,
    [ConsentStatus.GRANTED]: 0,
    [ConsentStatus.DENIED]: 0,
    [ConsentStatus.EXPIRED]: 0,
    [ConsentStatus.REVOKED]: 0,
  };
}

// ---------------------------------------------------------------------------
// Service Factory
// ---------------------------------------------------------------------------

export function createConsentService(deps: ConsentServiceDeps) {
  const { consentRepo, bridgeRegistry, callbackRouter, notifier, clock, logger } = deps;
  const lock = createKeyedLock();

  async function transition(
    row: SelectConsentArtefact,
    to: ConsentStatus,
    patch: Omit<ConsentUpdate, 'status' | 'updatedAt'> = {},
  ): Promise<SelectConsentArtefact> {
    if (!CONSENT_VALID_TRANSITIONS[row.status].includes(to)) {
      throw new StateConflictError(
        `Consent ${row.consentId} cannot move from ${row.status} to ${to}`,
      );
    }
    const updated = await consentRepo.update(row.consentId, {
      ...patch,
      status: to,
      updatedAt: clock.now(),
    });
    if (!updated) throw unknownConsent(row.consentId);
    return updated;
  }

  /** GRANTED -> EXPIRED once `at` passes validUntil. Caller holds the lock. */
  async function expireIfLapsed(
    row: SelectConsentArtefact,
    at: Date,
  ): Promise<SelectConsentArtefact> {
    if (!isLapsed(row, at)) return row;
    const expired = await transition(row, ConsentStatus.EXPIRED);
    logger.info({ consentId: row.consentId, validUntil: row.validUntil }, 'consent expired');
    return expired;
  }

  async function load(consentId: string): Promise<SelectConsentArtefact> {
    const row = await consentRepo.findById(consentId);
    if (!row) throw unknownConsent(consentId);
    return row;
  }

  async function decide(
    consentId: string,
    to: typeof ConsentStatus.GRANTED | typeof ConsentStatus.DENIED,
    patch: Omit<ConsentUpdate, 'status' | 'updatedAt'>,
  ): Promise<SelectConsentArtefact> {
    return lock.run(consentId, async () => {
      const row = await load(consentId);
      if (row.status !== ConsentStatus.REQUESTED) {
        throw new StateConflictError(
          `Consent ${consentId} is ${row.status}; only a REQUESTED consent can be decided`,
        );
      }
      const updated = await transition(row, to, patch);
      logger.info({ consentId, status: to }, 'consent decided');
      return updated;
    });
  }

  function withConsent<T>(consentId: string, fn: (scope: ConsentScope) => Promise<T>): Promise<T> {
    return lock.run(consentId, async () => {
      let current = await consentRepo.findById(consentId);
      const scope: ConsentScope = {
        get artefact() {
          return current;
        },
        async checkActive(hipId, recordType, at, date = at) {
          if (!current) return false;
          current = await expireIfLapsed(current, at);
          return withinScope(current, hipId, recordType, at, date);
        },
      };
      return fn(scope);
    });
  }

  // -------------------------------------------------------------------------
  // Callback handlers
  // -------------------------------------------------------------------------

  async function onGrantCallback(
    consentId: string,
    validUntil: Date,
  ): Promise<SelectConsentArtefact> {
    return decide(consentId, ConsentStatus.GRANTED, { grantedAt: clock.now(), validUntil });
  }

  async function onDenyCallback(consentId: string): Promise<SelectConsentArtefact> {
    return decide(consentId, ConsentStatus.DENIED, {});
  }

  callbackRouter.registerHandler(
    CallbackKind.CONSENT_GRANTED,
    consentGrantedSchema,
    async (consentId, body) => {
      await onGrantCallback(consentId, body.validUntil);
    },
  );

  callbackRouter.registerHandler(
    CallbackKind.CONSENT_DENIED,
    consentDeniedSchema,
    async (consentId, body) => {
      if (body.reason) logger.info({ consentId, reason: body.reason }, 'consent denial reason');
      await onDenyCallback(consentId);
    },
  );

  return {
    // -----------------------------------------------------------------------
    // requestConsent — create REQUESTED and ask the patient
    // -----------------------------------------------------------------------

    async requestConsent(
      patientId: string,
      hiuId: string,
      hipId: string,
      dateRange: DateRange,
      recordTypes: readonly RecordType[],
    ): Promise<SelectConsentArtefact> {
      if (dateRange.from.getTime() > dateRange.to.getTime()) {
        throw new ValidationError(
          'dateRange.from must not be after dateRange.to',
          { from: dateRange.from.toISOString(), to: dateRange.to.toISOString() },
          GatewayErrorCode.INVALID_RANGE,
        );
      }
      if (recordTypes.length === 0) {
        throw new ValidationError(
          'recordTypes must name at least one record type',
          { allowed: RECORD_TYPES },
          GatewayErrorCode.INVALID_SCOPE,
        );
      }

      await bridgeRegistry.resolveActive(hiuId, BridgeRole.HIU);
      await bridgeRegistry.resolveActive(hipId, BridgeRole.HIP);

      const now = clock.now();
      const artefact = await consentRepo.insert({
        consentId: randomUUID(),
        patientId,
        hiuId,
        hipId,
        dateFrom: dateRange.from,
        dateTo: dateRange.to,
        recordTypes: [...new Set(recordTypes)],
        status: ConsentStatus.REQUESTED,
        grantedAt: null,
        validUntil: null,
        revokedAt: null,
        createdAt: now,
        updatedAt: now,
      });

      callbackRouter.expect(artefact.consentId, CallbackOwner.CONSENT, [
        CallbackKind.CONSENT_GRANTED,
        CallbackKind.CONSENT_DENIED,
      ]);

      try {
        await notifier.notify({
          consentId: artefact.consentId,
          patientId,
          hiuId,
          hipId,
          dateRange: { from: artefact.dateFrom, to: artefact.dateTo },
          recordTypes: artefact.recordTypes,
        });
      } catch (err) {
        logger.warn({ err, consentId: artefact.consentId }, 'consent approval notification failed');
      }

      return artefact;
    },

    onGrantCallback,
    onDenyCallback,

    /** GRANTED -> REVOKED. Irreversible. */
    revoke(consentId: string): Promise<SelectConsentArtefact> {
      return lock.run(consentId, async () => {
        const now = clock.now();
        const row = await expireIfLapsed(await load(consentId), now);
        if (row.status !== ConsentStatus.GRANTED) {
          throw new StateConflictError(
            `Consent ${consentId} is ${row.status}; only a GRANTED consent can be revoked`,
          );
        }
        const revoked = await transition(row, ConsentStatus.REVOKED, { revokedAt: now });
        logger.info({ consentId }, 'consent revoked');
        return revoked;
      });
    },

    /**
     * True iff the consent is GRANTED, `at` is not past validUntil, and the
     * HIP, record type and `date` all fall inside its scope. Unknown ids are
     * simply inactive. Expires a lapsed consent as a side effect.
     */
    checkActive(
      consentId: string,
      hipId: string,
      recordType: RecordType,
      at: Date,
      date: Date = at,
    ): Promise<boolean> {
      return withConsent(consentId, (scope) => scope.checkActive(hipId, recordType, at, date));
    },

    withConsent,

    getStatus(consentId: string): Promise<ConsentStatusView> {
      return lock.run(consentId, async () => {
        const row = await expireIfLapsed(await load(consentId), clock.now());
        return { consentId: row.consentId, status: row.status, validUntil: row.validUntil };
      });
    },

    /** Counts of a patient's consents by effective status and by HIU. */
    async summarize(patientId: string): Promise<ConsentSummary> {
      const rows = await consentRepo.listByPatient(patientId);
      const now = clock.now();
      const byStatus = emptyStatusCounts();
      const byHiu: Record<string, number> = {};

      for (const row of rows) {
        const status = isLapsed(row, now) ? ConsentStatus.EXPIRED : row.status;
        byStatus[status] += 1;
        byHiu[row.hiuId] = (byHiu[row.hiuId] ?? 0) + 1;
      }

      return { patientId, total: rows.length, byStatus, byHiu };
    },

    /** Expire every GRANTED consent whose validUntil passed. Returns the count. */
    async sweepExpired(now: Date = clock.now()): Promise<number> {
      const due = await consentRepo.listGrantedExpiredBefore(now);
      let expired = 0;
      for (const candidate of due) {
        const changed = await lock.run(candidate.consentId, async () => {
          const row = await consentRepo.findById(candidate.consentId);
          if (!row || !isLapsed(row, now)) return false;
          await expireIfLapsed(row, now);
          return true;
        });
        if (changed) expired++;
      }
      return expired;
    },

    /** Re-register decision correlations for REQUESTED consents. Returns the count. */
    async restorePending(): Promise<number> {
      const waiting = await consentRepo.listAwaitingDecision();
      for (const row of waiting) {
        callbackRouter.expect(row.consentId, CallbackOwner.CONSENT, [
          CallbackKind.CONSENT_GRANTED,
          CallbackKind.CONSENT_DENIED,
        ]);
      }
      return waiting.length;
    },
  };
}

export type ConsentService = ReturnType<typeof createConsentService>;
