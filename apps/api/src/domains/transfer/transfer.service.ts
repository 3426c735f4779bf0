// ============================================================================
// Data Transfer Orchestrator
// Moves one consented health-information fetch from HIU request to HIP
// delivery to HIU hand-off. The job row is the durability point; forwarding
// on either side is bounded best effort and never re-fetches from the HIP.
// ============================================================================

import { randomUUID } from 'node:crypto';
import {
  CallbackKind,
  CallbackOwner,
  GatewayErrorCode,
} from '@consent-gateway/shared/constants/gateway.constants.js';
import { BridgeRole } from '@consent-gateway/shared/constants/bridge.constants.js';
import type { RecordType } from '@consent-gateway/shared/constants/consent.constants.js';
import {
  TransferState,
  TransferFailureReason,
  TRANSFER_VALID_TRANSITIONS,
} from '@consent-gateway/shared/constants/transfer.constants.js';
import { dataDeliveredSchema } from '@consent-gateway/shared/schemas/transfer.schema.js';
import type { SelectDataTransfer } from '@consent-gateway/shared/schemas/db/gateway.schema.js';
import {
  ForbiddenError,
  NotFoundError,
  StateConflictError,
  ValidationError,
} from '../../lib/errors.js';
import { createKeyedLock } from '../../lib/keyed-lock.js';
import { withRetry, type RetryPolicy } from '../../lib/retry.js';
import type { BridgeClient } from '../../lib/bridge-client.js';
import type { Clock } from '../../lib/clock.js';
import type { Logger } from '../../lib/logger.js';
import type { BridgeRegistry } from '../bridge/bridge.service.js';
import type { CallbackRouter } from '../callback/callback.service.js';
import type { ConsentService } from '../consent/consent.service.js';
import type { TransferRepository, TransferUpdate } from './transfer.repository.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueryWindow {
  from: Date;
  /** Defaults to `from` (a single-day window). */
  to?: Date;
  /** Defaults to every record type the consent covers. */
  recordTypes?: readonly RecordType[];
}

/** A job as callers see it. The payload itself only travels to the HIU. */
export type TransferView = Omit<SelectDataTransfer, 'payload'> & { hasPayload: boolean };

export interface TransferSummary {
  hiuId: string;
  total: number;
  byState: Record<TransferState, number>;
  byHip: Record<string, number>;
}

export interface TransferServiceConfig {
  deliveryTimeoutSeconds: number;
  forwardRetry: RetryPolicy;
}

export interface TransferServiceDeps {
  transferRepo: TransferRepository;
  consentService: Pick<ConsentService, 'withConsent'>;
  bridgeRegistry: Pick<BridgeRegistry, 'resolveActive'>;
  callbackRouter: Pick<CallbackRouter, 'expect' | 'forget' | 'registerHandler'>;
  bridgeClient: Pick<BridgeClient, 'requestHealthInformation' | 'transferHealthInformation'>;
  clock: Clock;
  logger: Logger;
  config: TransferServiceConfig;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function toTransferView(row: SelectDataTransfer): TransferView {
  const { payload, ...rest } = row;
  return { ...rest, hasPayload: payload !== null };
}

function unknownJob(transferId: string): NotFoundError {
  return new NotFoundError(`Transfer ${transferId}`, GatewayErrorCode.UNKNOWN_JOB);
}

function isOverdue(row: SelectDataTransfer, now: Date): boolean {
  return (
    row.state === TransferState.FORWARDED &&
    row.deadlineAt !== null &&
    now.getTime() > row.deadlineAt.getTime()
  );
}

function emptyStateCounts(): Record<TransferState, number> {
  return {
    [TransferState.PENDING]: 0,
    [TransferState.FORWARDED]: 0,
    [TransferState.DELIVERED]: 0,
    [TransferState.FAILED]: 0,
  };
}

// ---------------------------------------------------------------------------
// Service Factory
// ---------------------------------------------------------------------------

export function createTransferService(deps: TransferServiceDeps) {
  const {
    transferRepo,
    consentService,
    bridgeRegistry,
    callbackRouter,
    bridgeClient,
    clock,
    logger,
    config,
  } = deps;
  const lock = createKeyedLock();
  const deliveryTimeoutMs = config.deliveryTimeoutSeconds * 1000;

  async function transition(
    row: SelectDataTransfer,
    to: TransferState,
    patch: Omit<TransferUpdate, 'state' | 'updatedAt'> = {},
  ): Promise<SelectDataTransfer> {
    if (!TRANSFER_VALID_TRANSITIONS[row.state].includes(to)) {
      throw new StateConflictError(
        `Transfer ${row.transferId} cannot move from ${row.state} to ${to}`,
      );
    }
    const updated = await transferRepo.update(row.transferId, {
      ...patch,
      state: to,
      updatedAt: clock.now(),
    });
    if (!updated) throw unknownJob(row.transferId);
    return updated;
  }

  async function load(transferId: string): Promise<SelectDataTransfer> {
    const row = await transferRepo.findById(transferId);
    if (!row) throw unknownJob(transferId);
    return row;
  }

  /** FORWARDED -> FAILED(TIMEOUT). Caller holds the job's lock. */
  async function failWithTimeout(row: SelectDataTransfer): Promise<SelectDataTransfer> {
    const failed = await transition(row, TransferState.FAILED, {
      failureReason: TransferFailureReason.TIMEOUT,
    });
    callbackRouter.forget(row.transferId);
    logger.info({ transferId: row.transferId, deadlineAt: row.deadlineAt }, 'transfer timed out');
    return failed;
  }

  async function timeoutIfDue(row: SelectDataTransfer, now: Date): Promise<SelectDataTransfer> {
    return isOverdue(row, now) ? failWithTimeout(row) : row;
  }

  // -------------------------------------------------------------------------
  // onDataDelivered — HIP pushed the payload
  // -------------------------------------------------------------------------

  async function onDataDelivered(transferId: string, payload: string): Promise<TransferView> {
    const delivered = await lock.run(transferId, async () => {
      const now = clock.now();
      const row = await timeoutIfDue(await load(transferId), now);
      if (row.state === TransferState.DELIVERED || row.state === TransferState.FAILED) {
        throw new StateConflictError(
          `Transfer ${transferId} is already ${row.state}`,
          GatewayErrorCode.ALREADY_DELIVERED,
        );
      }
      return transition(row, TransferState.DELIVERED, { payload, deliveredAt: now });
    });
    logger.info({ transferId, hipId: delivered.hipId }, 'transfer delivered by HIP');

    const outcome = await withRetry(
      async () => {
        const hiu = await bridgeRegistry.resolveActive(delivered.hiuId, BridgeRole.HIU);
        await bridgeClient.transferHealthInformation(hiu, {
          transferId,
          consentId: delivered.consentId,
          hipId: delivered.hipId,
          payload,
        });
      },
      config.forwardRetry,
      (attempt, err) => logger.warn({ err, transferId, attempt }, 'HIU forward failed; retrying'),
    );

    if (outcome.ok) {
      logger.info({ transferId, hiuId: delivered.hiuId }, 'transfer forwarded to HIU');
      return toTransferView(delivered);
    }

    // The payload stays: delivery to the gateway already happened.
    const failed = await lock.run(transferId, async () => {
      const row = await load(transferId);
      if (row.state !== TransferState.DELIVERED) return row;
      return transition(row, TransferState.FAILED, {
        failureReason: TransferFailureReason.HIU_FORWARD_FAILED,
      });
    });
    logger.error(
      { err: outcome.lastError, transferId, attempts: outcome.attempts },
      'HIU forward exhausted retries',
    );
    return toTransferView(failed);
  }

  callbackRouter.registerHandler(
    CallbackKind.DATA_DELIVERED,
    dataDeliveredSchema,
    async (transferId, body) => {
      await onDataDelivered(transferId, body.payload);
    },
  );

  return {
    // -----------------------------------------------------------------------
    // requestData — gate on consent, create PENDING, forward to the HIP
    // -----------------------------------------------------------------------

    async requestData(
      hiuId: string,
      consentId: string,
      queryWindow: QueryWindow,
    ): Promise<TransferView> {
      const windowFrom = queryWindow.from;
      const windowTo = queryWindow.to ?? queryWindow.from;
      if (windowFrom.getTime() > windowTo.getTime()) {
        throw new ValidationError(
          'queryWindow.from must not be after queryWindow.to',
          undefined,
          GatewayErrorCode.INVALID_RANGE,
        );
      }

      const { job, hip } = await consentService.withConsent(consentId, async (scope) => {
        const artefact = scope.artefact;
        if (!artefact) {
          throw new NotFoundError(`Consent ${consentId}`, GatewayErrorCode.UNKNOWN_CONSENT);
        }

        const notActive = new ForbiddenError(
          `Consent ${consentId} does not cover this request`,
          GatewayErrorCode.CONSENT_NOT_ACTIVE,
        );
        if (artefact.hiuId !== hiuId) throw notActive;

        const recordTypes = [...new Set(queryWindow.recordTypes ?? artefact.recordTypes)];
        const now = clock.now();
        for (const recordType of recordTypes) {
          for (const date of [windowFrom, windowTo]) {
            if (!(await scope.checkActive(artefact.hipId, recordType, now, date))) {
              throw notActive;
            }
          }
        }

        const bridge = await bridgeRegistry.resolveActive(artefact.hipId, BridgeRole.HIP);

        const created = await transferRepo.insert({
          transferId: randomUUID(),
          consentId,
          hipId: artefact.hipId,
          hiuId,
          patientId: artefact.patientId,
          recordTypes,
          windowFrom,
          windowTo,
          state: TransferState.PENDING,
          failureReason: null,
          payload: null,
          forwardAttempts: 0,
          deadlineAt: null,
          deliveredAt: null,
          acknowledgedAt: null,
          createdAt: now,
          updatedAt: now,
        });
        return { job: created, hip: bridge };
      });

      callbackRouter.expect(job.transferId, CallbackOwner.TRANSFER, [CallbackKind.DATA_DELIVERED]);

      const outcome = await withRetry(
        () =>
          bridgeClient.requestHealthInformation(hip, {
            transferId: job.transferId,
            consentId,
            patientId: job.patientId,
            recordTypes: job.recordTypes,
            dateRange: { from: windowFrom.toISOString(), to: windowTo.toISOString() },
          }),
        config.forwardRetry,
        (attempt, err) =>
          logger.warn({ err, transferId: job.transferId, attempt }, 'HIP forward failed; retrying'),
      );

      const recorded = await lock.run(job.transferId, async () => {
        const row = await load(job.transferId);
        if (row.state !== TransferState.PENDING) {
          // The HIP answered before the outcome was recorded.
          const updated = await transferRepo.update(row.transferId, {
            forwardAttempts: outcome.attempts,
            updatedAt: clock.now(),
          });
          return updated ?? row;
        }

        if (outcome.ok) {
          return transition(row, TransferState.FORWARDED, {
            forwardAttempts: outcome.attempts,
            deadlineAt: new Date(clock.now().getTime() + deliveryTimeoutMs),
          });
        }

        callbackRouter.forget(row.transferId);
        logger.error(
          { err: outcome.lastError, transferId: row.transferId, attempts: outcome.attempts },
          'HIP forward exhausted retries',
        );
        return transition(row, TransferState.FAILED, {
          forwardAttempts: outcome.attempts,
          failureReason: TransferFailureReason.FORWARD_FAILED,
        });
      });

      return toTransferView(recorded);
    },

    onDataDelivered,

    /** FORWARDED -> FAILED(TIMEOUT). Any other state is a conflict. */
    onDeliveryTimeout(transferId: string): Promise<TransferView> {
      return lock.run(transferId, async () => {
        const row = await load(transferId);
        if (row.state !== TransferState.FORWARDED) {
          throw new StateConflictError(
            `Transfer ${transferId} is ${row.state}; only a FORWARDED job can time out`,
          );
        }
        return toTransferView(await failWithTimeout(row));
      });
    },

    getStatus(transferId: string): Promise<TransferView> {
      return lock.run(transferId, async () => {
        const row = await timeoutIfDue(await load(transferId), clock.now());
        return toTransferView(row);
      });
    },

    /** HIU confirms receipt of a closed job; the stored payload is dropped. */
    acknowledge(transferId: string): Promise<TransferView> {
      return lock.run(transferId, async () => {
        const row = await timeoutIfDue(await load(transferId), clock.now());
        if (row.state !== TransferState.DELIVERED && row.state !== TransferState.FAILED) {
          throw new StateConflictError(
            `Transfer ${transferId} is ${row.state}; only a closed job can be acknowledged`,
          );
        }
        if (row.acknowledgedAt) return toTransferView(row);

        const now = clock.now();
        const updated = await transferRepo.update(transferId, {
          payload: null,
          acknowledgedAt: now,
          updatedAt: now,
        });
        if (!updated) throw unknownJob(transferId);
        return toTransferView(updated);
      });
    },

    /** Counts of an HIU's jobs by effective state and by HIP. */
    async summarize(hiuId: string): Promise<TransferSummary> {
      const rows = await transferRepo.listByHiu(hiuId);
      const now = clock.now();
      const byState = emptyStateCounts();
      const byHip: Record<string, number> = {};

      for (const row of rows) {
        const state = isOverdue(row, now) ? TransferState.FAILED : row.state;
        byState[state] += 1;
        byHip[row.hipId] = (byHip[row.hipId] ?? 0) + 1;
      }

      return { hiuId, total: rows.length, byState, byHip };
    },

    /** Time out every FORWARDED job past its deadline. Returns the count. */
    async sweepTimeouts(now: Date = clock.now()): Promise<number> {
      const due = await transferRepo.listForwardedPastDeadline(now);
      let failed = 0;
      for (const candidate of due) {
        const changed = await lock.run(candidate.transferId, async () => {
          const row = await transferRepo.findById(candidate.transferId);
          if (!row || !isOverdue(row, now)) return false;
          await failWithTimeout(row);
          return true;
        });
        if (changed) failed++;
      }
      return failed;
    },

    /** Re-register delivery correlations for open jobs. Returns the count. */
    async restorePending(): Promise<number> {
      const waiting = await transferRepo.listAwaitingDelivery();
      for (const row of waiting) {
        callbackRouter.expect(row.transferId, CallbackOwner.TRANSFER, [CallbackKind.DATA_DELIVERED]);
      }
      return waiting.length;
    },
  };
}

export type TransferService = ReturnType<typeof createTransferService>;
