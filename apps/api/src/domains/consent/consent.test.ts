import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { BridgeRole } from '@consent-gateway/shared/constants/bridge.constants.js';
import {
  CallbackKind,
  CallbackOwner,
  GatewayErrorCode,
} from '@consent-gateway/shared/constants/gateway.constants.js';
import {
  ConsentStatus,
  RecordType,
  RECORD_TYPES,
} from '@consent-gateway/shared/constants/consent.constants.js';
import { consentInitSchema } from '@consent-gateway/shared/schemas/consent.schema.js';
import { createManualClock, type ManualClock } from '../../lib/clock.js';
import { AppError } from '../../lib/errors.js';
import { createInMemoryBridgeRepository } from '../bridge/bridge.repository.js';
import { createBridgeRegistry, type BridgeRegistry } from '../bridge/bridge.service.js';
import { createCallbackRouter, type CallbackRouter } from '../callback/callback.service.js';
import { createInMemoryConsentRepository } from './consent.repository.js';
import {
  createConsentService,
  type ConsentService,
  type ConsentServiceDeps,
} from './consent.service.js';
import type { ConsentNotifier } from './consent.notifier.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const T0 = new Date('2024-01-15T00:00:00.000Z');
const RANGE = {
  from: new Date('2024-01-01T00:00:00.000Z'),
  to: new Date('2024-06-30T00:00:00.000Z'),
};
const VALID_UNTIL = new Date('2024-07-01T00:00:00.000Z');

function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

async function captureError(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected promise to reject');
}

/** Deterministic uniform [0, 1) source so generated cases are reproducible. */
function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

let clock: ManualClock;
let logger: ReturnType<typeof makeLogger>;
let registry: BridgeRegistry;
let router: CallbackRouter;
let notify: Mock<ConsentNotifier['notify']>;
let deps: ConsentServiceDeps;
let service: ConsentService;

beforeEach(async () => {
  clock = createManualClock(T0);
  logger = makeLogger();
  registry = createBridgeRegistry({
    bridgeRepo: createInMemoryBridgeRepository(),
    clock,
    logger,
  });
  await registry.register('hip-one', BridgeRole.HIP, 'https://hip-one.test/gw', []);
  await registry.register('hip-two', BridgeRole.HIP, 'https://hip-two.test/gw', []);
  await registry.register('hiu-one', BridgeRole.HIU, 'https://hiu-one.test/gw', []);
  await registry.register('hiu-two', BridgeRole.HIU, 'https://hiu-two.test/gw', []);

  router = createCallbackRouter({ clock, logger });
  notify = vi.fn<ConsentNotifier['notify']>().mockResolvedValue(undefined);

  deps = {
    consentRepo: createInMemoryConsentRepository(),
    bridgeRegistry: registry,
    callbackRouter: router,
    notifier: { notify },
    clock,
    logger,
  };
  service = createConsentService(deps);
});

function requestPrescriptionConsent(hiuId = 'hiu-one') {
  return service.requestConsent('P1', hiuId, 'hip-one', RANGE, [RecordType.PRESCRIPTION]);
}

async function grantedConsent(
  recordTypes: RecordType[] = [RecordType.PRESCRIPTION],
  validUntil: Date = VALID_UNTIL,
) {
  const artefact = await service.requestConsent('P1', 'hiu-one', 'hip-one', RANGE, recordTypes);
  await router.handleCallback(artefact.consentId, CallbackKind.CONSENT_GRANTED, {
    validUntil: validUntil.toISOString(),
  });
  return artefact.consentId;
}

// ---------------------------------------------------------------------------
// requestConsent
// ---------------------------------------------------------------------------

describe('ConsentService.requestConsent', () => {
  it('creates a REQUESTED artefact and notifies the approval channel', async () => {
    const artefact = await service.requestConsent('P1', 'hiu-one', 'hip-one', RANGE, [
      RecordType.PRESCRIPTION,
      RecordType.LAB_REPORT,
      RecordType.PRESCRIPTION,
    ]);

    expect(artefact.status).toBe(ConsentStatus.REQUESTED);
    expect(artefact.recordTypes).toEqual(['PRESCRIPTION', 'LAB_REPORT']);
    expect(artefact.dateFrom).toEqual(RANGE.from);
    expect(artefact.dateTo).toEqual(RANGE.to);
    expect(artefact.validUntil).toBeNull();
    expect(router.lookup(artefact.consentId)?.owner).toBe(CallbackOwner.CONSENT);
    expect(notify).toHaveBeenCalledWith({
      consentId: artefact.consentId,
      patientId: 'P1',
      hiuId: 'hiu-one',
      hipId: 'hip-one',
      dateRange: { from: RANGE.from, to: RANGE.to },
      recordTypes: ['PRESCRIPTION', 'LAB_REPORT'],
    });
  });

  it('accepts a single-day range', async () => {
    const artefact = await service.requestConsent(
      'P1',
      'hiu-one',
      'hip-one',
      { from: RANGE.from, to: RANGE.from },
      [RecordType.PRESCRIPTION],
    );

    expect(artefact.status).toBe(ConsentStatus.REQUESTED);
  });

  it('rejects from after to with INVALID_RANGE', async () => {
    const err = await captureError(
      service.requestConsent('P1', 'hiu-one', 'hip-one', { from: RANGE.to, to: RANGE.from }, [
        RecordType.PRESCRIPTION,
      ]),
    );

    expect(err.statusCode).toBe(400);
    expect(err.code).toBe(GatewayErrorCode.INVALID_RANGE);
    expect(notify).not.toHaveBeenCalled();
  });

  it('rejects an empty scope with INVALID_SCOPE', async () => {
    const err = await captureError(
      service.requestConsent('P1', 'hiu-one', 'hip-one', RANGE, []),
    );

    expect(err.statusCode).toBe(400);
    expect(err.code).toBe(GatewayErrorCode.INVALID_SCOPE);
    expect(router.pendingCount()).toBe(0);
  });

  it('requires the HIU and HIP to be active bridges of the right role', async () => {
    const unknown = await captureError(
      service.requestConsent('P1', 'hiu-ghost', 'hip-one', RANGE, [RecordType.PRESCRIPTION]),
    );
    expect(unknown.code).toBe(GatewayErrorCode.UNKNOWN_BRIDGE);

    const swapped = await captureError(
      service.requestConsent('P1', 'hip-one', 'hiu-one', RANGE, [RecordType.PRESCRIPTION]),
    );
    expect(swapped.code).toBe(GatewayErrorCode.BRIDGE_ROLE_MISMATCH);

    await registry.suspend('hip-one');
    const suspended = await captureError(requestPrescriptionConsent());
    expect(suspended.statusCode).toBe(403);
    expect(suspended.code).toBe(GatewayErrorCode.BRIDGE_SUSPENDED);
  });

  it('logs a failed notification and keeps the artefact REQUESTED', async () => {
    notify.mockRejectedValueOnce(new Error('push service down'));

    const artefact = await requestPrescriptionConsent();

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect((await service.getStatus(artefact.consentId)).status).toBe(ConsentStatus.REQUESTED);
  });
});

// ---------------------------------------------------------------------------
// Grant / deny callbacks
// ---------------------------------------------------------------------------

describe('ConsentService grant and deny', () => {
  it('grants through the callback router and closes the correlation', async () => {
    const artefact = await requestPrescriptionConsent();
    clock.advance(3_600_000);

    await router.handleCallback(artefact.consentId, CallbackKind.CONSENT_GRANTED, {
      validUntil: '2024-07-01T00:00:00Z',
    });

    expect(await service.getStatus(artefact.consentId)).toEqual({
      consentId: artefact.consentId,
      status: ConsentStatus.GRANTED,
      validUntil: VALID_UNTIL,
    });
    expect(router.lookup(artefact.consentId)).toBeNull();
  });

  it('drops a duplicate grant as an unknown correlation', async () => {
    const consentId = await grantedConsent();

    const err = await captureError(
      router.handleCallback(consentId, CallbackKind.CONSENT_GRANTED, {
        validUntil: '2025-01-01T00:00:00Z',
      }),
    );

    expect(err.code).toBe(GatewayErrorCode.UNKNOWN_CORRELATION);
    expect((await service.getStatus(consentId)).validUntil).toEqual(VALID_UNTIL);
  });

  it('rejects a grant on a non-REQUESTED consent with INVALID_TRANSITION', async () => {
    const consentId = await grantedConsent();

    const err = await captureError(service.onGrantCallback(consentId, VALID_UNTIL));

    expect(err.statusCode).toBe(409);
    expect(err.code).toBe(GatewayErrorCode.INVALID_TRANSITION);
  });

  it('denies, after which grant is refused', async () => {
    const artefact = await requestPrescriptionConsent();

    await router.handleCallback(artefact.consentId, CallbackKind.CONSENT_DENIED, {
      reason: 'not my doctor',
    });
    const err = await captureError(service.onGrantCallback(artefact.consentId, VALID_UNTIL));

    expect((await service.getStatus(artefact.consentId)).status).toBe(ConsentStatus.DENIED);
    expect(err.code).toBe(GatewayErrorCode.INVALID_TRANSITION);
  });

  it('fails with UNKNOWN_CONSENT for an unknown id', async () => {
    const err = await captureError(
      service.onDenyCallback('0f4d1f0e-0000-4000-8000-000000000000'),
    );

    expect(err.statusCode).toBe(404);
    expect(err.code).toBe(GatewayErrorCode.UNKNOWN_CONSENT);
  });

  it('refuses a callback kind the correlation does not expect', async () => {
    const artefact = await requestPrescriptionConsent();

    const err = await captureError(
      router.handleCallback(artefact.consentId, CallbackKind.DATA_DELIVERED, { payload: 'AAAA' }),
    );

    expect(err.code).toBe(GatewayErrorCode.UNEXPECTED_CALLBACK);
    expect(router.lookup(artefact.consentId)).not.toBeNull();
  });
});

// ---------------------------------------------------------------------------
// revoke
// ---------------------------------------------------------------------------

describe('ConsentService.revoke', () => {
  it('revokes a GRANTED consent irreversibly', async () => {
    const consentId = await grantedConsent();
    clock.advance(1_000);

    const revoked = await service.revoke(consentId);

    expect(revoked.status).toBe(ConsentStatus.REVOKED);
    expect(revoked.revokedAt).toEqual(new Date(T0.getTime() + 1_000));
    const again = await captureError(service.revoke(consentId));
    expect(again.code).toBe(GatewayErrorCode.INVALID_TRANSITION);
    expect(await service.checkActive(consentId, 'hip-one', RecordType.PRESCRIPTION, clock.now())).toBe(false);
  });

  it('refuses to revoke a REQUESTED consent', async () => {
    const artefact = await requestPrescriptionConsent();

    const err = await captureError(service.revoke(artefact.consentId));

    expect(err.code).toBe(GatewayErrorCode.INVALID_TRANSITION);
  });

  it('expires a lapsed consent instead of revoking it', async () => {
    const consentId = await grantedConsent();
    clock.set(new Date('2024-07-02T00:00:00.000Z'));

    const err = await captureError(service.revoke(consentId));

    expect(err.code).toBe(GatewayErrorCode.INVALID_TRANSITION);
    expect((await service.getStatus(consentId)).status).toBe(ConsentStatus.EXPIRED);
  });
});

// ---------------------------------------------------------------------------
// checkActive
// ---------------------------------------------------------------------------

describe('ConsentService.checkActive', () => {
  it('is true inside every scope dimension', async () => {
    const consentId = await grantedConsent();

    const active = await service.checkActive(
      consentId,
      'hip-one',
      RecordType.PRESCRIPTION,
      new Date('2024-03-01T00:00:00.000Z'),
    );

    expect(active).toBe(true);
  });

  it('is false for an unknown consent', async () => {
    const active = await service.checkActive(
      '5b2b0b3e-0000-4000-8000-000000000000',
      'hip-one',
      RecordType.PRESCRIPTION,
      T0,
    );

    expect(active).toBe(false);
  });

  it('is false for another HIP, another record type or a date outside the range', async () => {
    const consentId = await grantedConsent();
    const at = new Date('2024-03-01T00:00:00.000Z');

    expect(await service.checkActive(consentId, 'hip-two', RecordType.PRESCRIPTION, at)).toBe(false);
    expect(await service.checkActive(consentId, 'hip-one', RecordType.LAB_REPORT, at)).toBe(false);
    expect(
      await service.checkActive(
        consentId,
        'hip-one',
        RecordType.PRESCRIPTION,
        at,
        new Date('2023-12-31T23:59:59.999Z'),
      ),
    ).toBe(false);
  });

  it('is false while REQUESTED', async () => {
    const artefact = await requestPrescriptionConsent();

    expect(
      await service.checkActive(artefact.consentId, 'hip-one', RecordType.PRESCRIPTION, T0),
    ).toBe(false);
  });

  it('holds at validUntil and flips the consent to EXPIRED just after', async () => {
    const consentId = await grantedConsent();
    const inRange = new Date('2024-06-30T00:00:00.000Z');

    expect(
      await service.checkActive(consentId, 'hip-one', RecordType.PRESCRIPTION, VALID_UNTIL, inRange),
    ).toBe(true);
    expect((await service.getStatus(consentId)).status).toBe(ConsentStatus.GRANTED);

    const later = new Date(VALID_UNTIL.getTime() + 1);
    expect(
      await service.checkActive(consentId, 'hip-one', RecordType.PRESCRIPTION, later, inRange),
    ).toBe(false);
    expect((await service.getStatus(consentId)).status).toBe(ConsentStatus.EXPIRED);

    expect(
      await service.checkActive(consentId, 'hip-one', RecordType.PRESCRIPTION, VALID_UNTIL, inRange),
    ).toBe(false);
  });

  it('matches an oracle over generated scope combinations', async () => {
    const random = seededRandom(20240115);
    const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length)];
    const DAY = 86_400_000;
    const hips = ['hip-one', 'hip-two'];

    for (let round = 0; round < 40; round++) {
      const scope = RECORD_TYPES.filter(() => random() < 0.4);
      const recordTypes = scope.length > 0 ? scope : [pick(RECORD_TYPES)];
      const validUntil = new Date(VALID_UNTIL.getTime() + Math.floor(random() * 30 - 15) * DAY);
      const decision = pick(['grant', 'deny', 'none', 'revoke'] as const);

      const artefact = await service.requestConsent('P1', 'hiu-one', 'hip-one', RANGE, recordTypes);
      let modelStatus: ConsentStatus = ConsentStatus.REQUESTED;
      if (decision !== 'none' && decision !== 'deny') {
        await service.onGrantCallback(artefact.consentId, validUntil);
        modelStatus = ConsentStatus.GRANTED;
      }
      if (decision === 'deny') {
        await service.onDenyCallback(artefact.consentId);
        modelStatus = ConsentStatus.DENIED;
      }
      if (decision === 'revoke') {
        await service.revoke(artefact.consentId);
        modelStatus = ConsentStatus.REVOKED;
      }

      for (let query = 0; query < 10; query++) {
        const hipId = pick(hips);
        const recordType = pick(RECORD_TYPES);
        const at = new Date(VALID_UNTIL.getTime() + Math.floor(random() * 60 - 40) * DAY);
        const date = new Date(RANGE.from.getTime() + Math.floor(random() * 220 - 20) * DAY);

        if (modelStatus === ConsentStatus.GRANTED && at.getTime() > validUntil.getTime()) {
          modelStatus = ConsentStatus.EXPIRED;
        }
        const expected =
          modelStatus === ConsentStatus.GRANTED &&
          at.getTime() <= validUntil.getTime() &&
          hipId === 'hip-one' &&
          recordTypes.includes(recordType) &&
          date.getTime() >= RANGE.from.getTime() &&
          date.getTime() <= RANGE.to.getTime();

        const actual = await service.checkActive(artefact.consentId, hipId, recordType, at, date);
        expect(actual).toBe(expected);
      }

      const current = await service.withConsent(artefact.consentId, async (s) => s.artefact?.status);
      expect(current).toBe(modelStatus);
    }
  });
});

// ---------------------------------------------------------------------------
// Summary and sweep
// ---------------------------------------------------------------------------

describe('ConsentService.summarize', () => {
  it('counts consents by effective status and by HIU', async () => {
    await grantedConsent([RecordType.PRESCRIPTION], new Date('2024-02-01T00:00:00.000Z'));
    await grantedConsent();
    await requestPrescriptionConsent('hiu-two');
    const denied = await requestPrescriptionConsent('hiu-two');
    await service.onDenyCallback(denied.consentId);
    await service.requestConsent('P2', 'hiu-one', 'hip-one', RANGE, [RecordType.PRESCRIPTION]);
    clock.set(new Date('2024-03-01T00:00:00.000Z'));

    const summary = await service.summarize('P1');

    expect(summary).toEqual({
      patientId: 'P1',
      total: 4,
      byStatus: { REQUESTED: 1, GRANTED: 1, DENIED: 1, EXPIRED: 1, REVOKED: 0 },
      byHiu: { 'hiu-one': 2, 'hiu-two': 2 },
    });
  });
});

describe('ConsentService.sweepExpired', () => {
  it('expires only granted consents whose validUntil passed', async () => {
    const early = await grantedConsent([RecordType.PRESCRIPTION], new Date('2024-02-01T00:00:00.000Z'));
    const late = await grantedConsent();
    clock.set(new Date('2024-03-01T00:00:00.000Z'));

    expect(await service.sweepExpired()).toBe(1);
    expect((await service.getStatus(early)).status).toBe(ConsentStatus.EXPIRED);
    expect((await service.getStatus(late)).status).toBe(ConsentStatus.GRANTED);
    expect(await service.sweepExpired()).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// restorePending
// ---------------------------------------------------------------------------

describe('ConsentService.restorePending', () => {
  it('routes a decision for a consent requested before a restart', async () => {
    const waiting = await requestPrescriptionConsent();
    await grantedConsent();

    const restartedRouter = createCallbackRouter({ clock, logger });
    const restarted = createConsentService({ ...deps, callbackRouter: restartedRouter });

    expect(await restarted.restorePending()).toBe(1);
    expect(restartedRouter.lookup(waiting.consentId)?.owner).toBe(CallbackOwner.CONSENT);

    await restartedRouter.handleCallback(waiting.consentId, CallbackKind.CONSENT_DENIED, {});

    expect((await restarted.getStatus(waiting.consentId)).status).toBe(ConsentStatus.DENIED);
  });
});

// ---------------------------------------------------------------------------
// consent init body
// ---------------------------------------------------------------------------

describe('consentInitSchema dateRange', () => {
  const body = {
    patientId: 'P1',
    hiuId: 'hiu-one',
    hipId: 'hip-one',
    recordTypes: [RecordType.LAB_REPORT],
  };

  it('extends a calendar-date end to the last millisecond of that UTC day', () => {
    const parsed = consentInitSchema.parse({
      ...body,
      dateRange: { from: '2024-01-01', to: '2024-06-30' },
    });

    expect(parsed.dateRange.from).toEqual(new Date('2024-01-01T00:00:00.000Z'));
    expect(parsed.dateRange.to).toEqual(new Date('2024-06-30T23:59:59.999Z'));
  });

  it('keeps an explicit date-time end as given', () => {
    const parsed = consentInitSchema.parse({
      ...body,
      dateRange: { from: '2024-01-01', to: '2024-06-30T12:00:00Z' },
    });

    expect(parsed.dateRange.to).toEqual(new Date('2024-06-30T12:00:00.000Z'));
  });
});
