import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BridgeRole, BridgeService, BridgeStatus } from '@consent-gateway/shared/constants/bridge.constants.js';
import { GatewayErrorCode } from '@consent-gateway/shared/constants/gateway.constants.js';
import { createManualClock, type ManualClock } from '../../lib/clock.js';
import { AppError } from '../../lib/errors.js';
import { createInMemoryBridgeRepository } from './bridge.repository.js';
import { createBridgeRegistry, type BridgeRegistry } from './bridge.service.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const T0 = new Date('2026-03-01T09:00:00.000Z');

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

let clock: ManualClock;
let registry: BridgeRegistry;

beforeEach(() => {
  clock = createManualClock(T0);
  registry = createBridgeRegistry({
    bridgeRepo: createInMemoryBridgeRepository(),
    clock,
    logger: makeLogger(),
  });
});

// ---------------------------------------------------------------------------
// register
// ---------------------------------------------------------------------------

describe('BridgeRegistry.register', () => {
  it('stores a new bridge as ACTIVE', async () => {
    const bridge = await registry.register(
      'hip-alpha',
      BridgeRole.HIP,
      'https://hip-alpha.test/callbacks',
      [BridgeService.DISCOVERY, BridgeService.LINKING],
    );

    expect(bridge).toEqual({
      bridgeId: 'hip-alpha',
      role: 'HIP',
      callbackUrl: 'https://hip-alpha.test/callbacks',
      registeredServices: ['DISCOVERY', 'LINKING'],
      status: BridgeStatus.ACTIVE,
      createdAt: T0,
      updatedAt: T0,
    });
  });

  it('collapses repeated services', async () => {
    const bridge = await registry.register('hiu-one', BridgeRole.HIU, 'https://hiu.test/cb', [
      BridgeService.CONSENT,
      BridgeService.CONSENT,
    ]);

    expect(bridge.registeredServices).toEqual(['CONSENT']);
  });

  it('rejects a duplicate id with DUPLICATE_BRIDGE', async () => {
    await registry.register('hip-alpha', BridgeRole.HIP, 'https://a.test/cb', []);

    const err = await captureError(
      registry.register('hip-alpha', BridgeRole.HIU, 'https://b.test/cb', []),
    );

    expect(err.statusCode).toBe(409);
    expect(err.code).toBe(GatewayErrorCode.DUPLICATE_BRIDGE);
    const stored = await registry.resolve('hip-alpha');
    expect(stored.role).toBe('HIP');
    expect(stored.callbackUrl).toBe('https://a.test/cb');
  });

  it('rejects re-registration of a suspended id', async () => {
    await registry.register('hip-alpha', BridgeRole.HIP, 'https://a.test/cb', []);
    await registry.suspend('hip-alpha');

    const err = await captureError(
      registry.register('hip-alpha', BridgeRole.HIP, 'https://a.test/cb', []),
    );

    expect(err.code).toBe(GatewayErrorCode.DUPLICATE_BRIDGE);
  });
});

// ---------------------------------------------------------------------------
// updateCallback / resolve
// ---------------------------------------------------------------------------

describe('BridgeRegistry.updateCallback', () => {
  it('replaces the url and bumps updatedAt', async () => {
    await registry.register('hip-alpha', BridgeRole.HIP, 'https://old.test/cb', []);
    clock.advance(5_000);

    const updated = await registry.updateCallback('hip-alpha', 'https://new.test/cb');

    expect(updated.callbackUrl).toBe('https://new.test/cb');
    expect(updated.createdAt).toEqual(T0);
    expect(updated.updatedAt).toEqual(new Date(T0.getTime() + 5_000));
  });

  it('fails with UNKNOWN_BRIDGE for an unregistered id', async () => {
    const err = await captureError(registry.updateCallback('ghost', 'https://x.test/cb'));

    expect(err.statusCode).toBe(404);
    expect(err.code).toBe(GatewayErrorCode.UNKNOWN_BRIDGE);
    expect(err.message).toBe('Bridge ghost not found');
  });
});

describe('BridgeRegistry.resolve', () => {
  it('returns the record for a registered id', async () => {
    await registry.register('hiu-one', BridgeRole.HIU, 'https://hiu.test/cb', []);

    const bridge = await registry.resolve('hiu-one');

    expect(bridge.bridgeId).toBe('hiu-one');
    expect(bridge.role).toBe('HIU');
  });

  it('returns a copy that callers cannot mutate', async () => {
    await registry.register('hiu-one', BridgeRole.HIU, 'https://hiu.test/cb', [BridgeService.CONSENT]);

    const first = await registry.resolve('hiu-one');
    first.registeredServices.push(BridgeService.DATA_TRANSFER);

    const second = await registry.resolve('hiu-one');
    expect(second.registeredServices).toEqual(['CONSENT']);
  });

  it('fails with UNKNOWN_BRIDGE for an unregistered id', async () => {
    const err = await captureError(registry.resolve('ghost'));

    expect(err.code).toBe(GatewayErrorCode.UNKNOWN_BRIDGE);
  });
});

// ---------------------------------------------------------------------------
// resolveActive / suspend / activate
// ---------------------------------------------------------------------------

describe('BridgeRegistry.resolveActive', () => {
  beforeEach(async () => {
    await registry.register('hip-alpha', BridgeRole.HIP, 'https://hip.test/cb', []);
  });

  it('returns an active bridge with the expected role', async () => {
    const bridge = await registry.resolveActive('hip-alpha', BridgeRole.HIP);

    expect(bridge.bridgeId).toBe('hip-alpha');
  });

  it('fails with BRIDGE_ROLE_MISMATCH when the role differs', async () => {
    const err = await captureError(registry.resolveActive('hip-alpha', BridgeRole.HIU));

    expect(err.statusCode).toBe(400);
    expect(err.code).toBe(GatewayErrorCode.BRIDGE_ROLE_MISMATCH);
    expect(err.message).toBe('Bridge hip-alpha is registered as HIP, not HIU');
  });

  it('fails with BRIDGE_SUSPENDED after suspension and recovers on activation', async () => {
    const suspended = await registry.suspend('hip-alpha');
    expect(suspended.status).toBe(BridgeStatus.SUSPENDED);

    const err = await captureError(registry.resolveActive('hip-alpha', BridgeRole.HIP));
    expect(err.statusCode).toBe(403);
    expect(err.code).toBe(GatewayErrorCode.BRIDGE_SUSPENDED);

    await registry.activate('hip-alpha');
    const bridge = await registry.resolveActive('hip-alpha', BridgeRole.HIP);
    expect(bridge.status).toBe(BridgeStatus.ACTIVE);
  });

  it('suspend of an unknown id fails with UNKNOWN_BRIDGE', async () => {
    const err = await captureError(registry.suspend('ghost'));

    expect(err.code).toBe(GatewayErrorCode.UNKNOWN_BRIDGE);
  });
});
