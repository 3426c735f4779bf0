import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { type FastifyInstance } from 'fastify';
import { buildApp } from '../../../src/server.js';
import { parseEnv } from '../../../src/lib/env.js';
import { createManualClock, type ManualClock } from '../../../src/lib/clock.js';
import { RemoteCallError } from '../../../src/lib/errors.js';
import type { BridgeClient } from '../../../src/lib/bridge-client.js';
import type { OtpDispatcher } from '../../../src/domains/link/link.otp.js';
import type { ConsentNotifier } from '../../../src/domains/consent/consent.notifier.js';

// ---------------------------------------------------------------------------
// Test Data
// ---------------------------------------------------------------------------

const T0 = new Date('2024-01-15T09:00:00.000Z');
const HIP_ID = 'hip-one';
const HIU_ID = 'hiu-one';

const env = parseEnv({
  NODE_ENV: 'test',
  GATEWAY_TOKEN_SECRET: 'test-secret-for-token-signing',
  GATEWAY_CLIENTS: 'hip-one:test-secret,hiu-one:test-secret',
  LINK_TTL_SECONDS: '300',
  LINK_MAX_OTP_ATTEMPTS: '3',
  DELIVERY_TIMEOUT_SECONDS: '60',
  FORWARD_MAX_ATTEMPTS: '3',
  FORWARD_BACKOFF_MS: '100',
  SWEEP_INTERVAL_SECONDS: '0',
});

// ---------------------------------------------------------------------------
// Harness
// ---------------------------------------------------------------------------

let app: FastifyInstance;
let clock: ManualClock;
let discover: Mock<BridgeClient['discover']>;
let requestHealthInformation: Mock<BridgeClient['requestHealthInformation']>;
let transferHealthInformation: Mock<BridgeClient['transferHealthInformation']>;
let sendOtp: Mock<OtpDispatcher['send']>;
let notify: Mock<ConsentNotifier['notify']>;
let sleep: Mock<(ms: number) => Promise<void>>;
let headers: Record<string, string>;

async function bridgeHeaders(clientId: string): Promise<Record<string, string>> {
  const res = await app.inject({
    method: 'POST',
    url: '/gateway/sessions',
    payload: { clientId, clientSecret: 'test-secret' },
  });
  expect(res.statusCode).toBe(200);
  return {
    authorization: `Bearer ${res.json().data.accessToken}`,
    'request-id': 'req-test',
    timestamp: T0.toISOString(),
    'x-cm-id': 'sbx',
  };
}

function post(url: string, payload: object) {
  return app.inject({ method: 'POST', url, headers, payload });
}

function get(url: string) {
  return app.inject({ method: 'GET', url, headers });
}

function callback(correlationId: string, kind: string, body: Record<string, unknown>) {
  return post(`/callback/${correlationId}`, { kind, body });
}

async function registerBridges(): Promise<void> {
  const hip = await post('/bridge/register', {
    bridgeId: HIP_ID,
    role: 'HIP',
    callbackUrl: 'https://hip-one.example.test/gateway',
    services: ['DISCOVERY', 'LINKING', 'DATA_TRANSFER'],
  });
  expect(hip.statusCode).toBe(201);
  const hiu = await post('/bridge/register', {
    bridgeId: HIU_ID,
    role: 'HIU',
    callbackUrl: 'https://hiu-one.example.test/gateway',
    services: ['CONSENT', 'DATA_TRANSFER'],
  });
  expect(hiu.statusCode).toBe(201);
}

async function grantedConsent(): Promise<string> {
  const init = await post('/consent/init', {
    patientId: 'patient-1',
    hiuId: HIU_ID,
    hipId: HIP_ID,
    dateRange: { from: '2024-01-01', to: '2024-06-30' },
    recordTypes: ['PRESCRIPTION', 'LAB_REPORT'],
  });
  expect(init.statusCode).toBe(202);
  const consentId: string = init.json().data.consentId;

  await callback(consentId, 'CONSENT_GRANTED', { validUntil: '2024-07-01T00:00:00Z' });
  return consentId;
}

function requestData(consentId: string) {
  return post('/data/request', {
    hiuId: HIU_ID,
    consentId,
    queryWindow: { from: '2024-02-01', to: '2024-03-01', recordTypes: ['LAB_REPORT'] },
  });
}

beforeEach(async () => {
  clock = createManualClock(T0);
  discover = vi.fn<BridgeClient['discover']>().mockResolvedValue(undefined);
  requestHealthInformation = vi
    .fn<BridgeClient['requestHealthInformation']>()
    .mockResolvedValue(undefined);
  transferHealthInformation = vi
    .fn<BridgeClient['transferHealthInformation']>()
    .mockResolvedValue(undefined);
  sendOtp = vi.fn<OtpDispatcher['send']>().mockResolvedValue(undefined);
  notify = vi.fn<ConsentNotifier['notify']>().mockResolvedValue(undefined);
  sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);

  app = buildApp({
    env,
    clock,
    logger: false,
    bridgeClient: { discover, requestHealthInformation, transferHealthInformation },
    otpDispatcher: { send: sendOtp },
    notifier: { notify },
    sleep,
  });
  await app.ready();

  headers = await bridgeHeaders(HIP_ID);
  await registerBridges();
});

afterEach(async () => {
  await app.close();
});

// ===========================================================================
// Authentication and error envelope
// ===========================================================================

describe('gateway: authentication and errors', () => {
  it('GET /health needs no token', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('rejects wrong client credentials with 401', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/gateway/sessions',
      payload: { clientId: HIP_ID, clientSecret: 'wrong-secret' },
    });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      error: { code: 'UNAUTHORIZED', message: 'Invalid client credentials' },
    });
  });

  it('rejects a call without a bearer token', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/link/init',
      payload: { patientRef: 'patient-ref-1', hipId: HIP_ID },
    });
    expect(res.statusCode).toBe(401);
    expect(res.json().error.code).toBe('UNAUTHORIZED');
  });

  it('rejects a token once it has expired', async () => {
    clock.advance(env.GATEWAY_TOKEN_TTL_SECONDS * 1000);
    const res = await get(`/bridge/${HIP_ID}`);
    expect(res.statusCode).toBe(401);
    expect(res.json().error.message).toBe('Invalid or expired token');
  });

  it('returns 400 VALIDATION_ERROR for a body that fails the schema', async () => {
    const res = await post('/link/init', { hipId: HIP_ID });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
    expect(res.json().error.message).toBe('Validation failed');
  });

  it('maps a domain error to its status and code', async () => {
    const res = await post('/link/init', { patientRef: 'patient-ref-1', hipId: 'ghost' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: { code: 'UNKNOWN_BRIDGE', message: 'Bridge ghost not found' },
    });
  });

  it('includes details when the error carries them', async () => {
    const res = await post('/consent/init', {
      patientId: 'patient-1',
      hiuId: HIU_ID,
      hipId: HIP_ID,
      dateRange: { from: '2024-01-01', to: '2024-06-30' },
      recordTypes: [],
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('INVALID_SCOPE');
    expect(res.json().error.details.allowed).toHaveLength(8);
  });
});

// ===========================================================================
// Linking: init -> discovery callback -> OTP -> confirm
// ===========================================================================

describe('gateway: care context linking', () => {
  async function reachOtpSent(): Promise<{ requestId: string; otp: string }> {
    const init = await post('/link/init', { patientRef: 'patient-ref-1', hipId: HIP_ID });
    expect(init.statusCode).toBe(202);
    const requestId: string = init.json().data.requestId;

    const cb = await callback(requestId, 'DISCOVERY_RESULT', {
      careContexts: [{ referenceNumber: 'CC-1' }, { referenceNumber: 'CC-2', display: 'Visit' }],
    });
    expect(cb.statusCode).toBe(200);
    expect(cb.json()).toEqual({ data: { received: true } });

    expect(sendOtp).toHaveBeenCalledTimes(1);
    return { requestId, otp: sendOtp.mock.calls[0][0].otp };
  }

  it('links care contexts after a wrong then a right OTP', async () => {
    const { requestId, otp } = await reachOtpSent();

    expect(discover).toHaveBeenCalledWith(
      expect.objectContaining({ bridgeId: HIP_ID }),
      { requestId, patientRef: 'patient-ref-1' },
    );

    const status = await get(`/link/status/${requestId}`);
    expect(status.json().data.state).toBe('OTP_SENT');
    expect(status.json().data.otpHash).toBeUndefined();

    const wrong = otp === '000000' ? '111111' : '000000';
    const rejected = await post('/link/confirm', { requestId, otp: wrong });
    expect(rejected.statusCode).toBe(400);
    expect(rejected.json().error).toEqual({
      code: 'INVALID_OTP',
      message: 'Invalid OTP',
      details: { attemptsRemaining: 2 },
    });

    const confirmed = await post('/link/confirm', { requestId, otp });
    expect(confirmed.statusCode).toBe(200);
    expect(confirmed.json().data.patientId).toBe('patient-ref-1');
    expect(confirmed.json().data.hipId).toBe(HIP_ID);
    expect(confirmed.json().data.careContextIds).toEqual(['CC-1', 'CC-2']);

    const again = await post('/link/confirm', { requestId, otp });
    expect(again.statusCode).toBe(409);
    expect(again.json().error.code).toBe('ALREADY_CONFIRMED');

    const contexts = await get('/link/contexts/patient-ref-1');
    expect(contexts.json().data).toHaveLength(1);
    expect(contexts.json().data[0].careContextIds).toEqual(['CC-1', 'CC-2']);
  });

  it('expires an unanswered request after the link TTL', async () => {
    const init = await post('/link/init', { patientRef: 'patient-ref-1', hipId: HIP_ID });
    const requestId: string = init.json().data.requestId;

    clock.advance(301_000);

    const status = await get(`/link/status/${requestId}`);
    expect(status.json().data.state).toBe('EXPIRED');

    // The correlation is gone: a late discovery result is acknowledged and dropped.
    const late = await callback(requestId, 'DISCOVERY_RESULT', {
      careContexts: [{ referenceNumber: 'CC-1' }],
    });
    expect(late.statusCode).toBe(200);
    expect(sendOtp).not.toHaveBeenCalled();
  });

  it('acknowledges a callback for an unknown correlation id', async () => {
    const res = await callback('no-such-correlation', 'DISCOVERY_RESULT', {});
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ data: { received: true } });
  });
});

// ===========================================================================
// Consent and data transfer
// ===========================================================================

describe('gateway: consent and data transfer', () => {
  it('delivers data end to end under a granted consent', async () => {
    const consentId = await grantedConsent();
    expect(notify).toHaveBeenCalledTimes(1);

    const consent = await get(`/consent/status/${consentId}`);
    expect(consent.json().data).toEqual({
      consentId,
      status: 'GRANTED',
      validUntil: '2024-07-01T00:00:00.000Z',
    });

    const requested = await requestData(consentId);
    expect(requested.statusCode).toBe(202);
    expect(requested.json().data.state).toBe('FORWARDED');
    const transferId: string = requested.json().data.transferId;

    expect(requestHealthInformation).toHaveBeenCalledWith(
      expect.objectContaining({ bridgeId: HIP_ID }),
      {
        transferId,
        consentId,
        patientId: 'patient-1',
        recordTypes: ['LAB_REPORT'],
        dateRange: { from: '2024-02-01T00:00:00.000Z', to: '2024-03-01T23:59:59.999Z' },
      },
    );

    await callback(transferId, 'DATA_DELIVERED', { payload: 'aGVsbG8=' });

    expect(transferHealthInformation).toHaveBeenCalledWith(
      expect.objectContaining({ bridgeId: HIU_ID }),
      { transferId, consentId, hipId: HIP_ID, payload: 'aGVsbG8=' },
    );

    const status = await get(`/data/status/${transferId}`);
    expect(status.json().data.state).toBe('DELIVERED');
    expect(status.json().data.hasPayload).toBe(true);
    expect(status.json().data.forwardAttempts).toBe(1);
    expect(status.json().data.failureReason).toBeNull();

    const ack = await post(`/data/${transferId}/ack`, {});
    expect(ack.statusCode).toBe(200);
    expect(ack.json().data.hasPayload).toBe(false);
    expect(ack.json().data.acknowledgedAt).toBe(T0.toISOString());
  });

  it('covers the whole last day of a calendar-date consent range', async () => {
    const consentId = await grantedConsent();

    const lastDay = await post('/data/request', {
      hiuId: HIU_ID,
      consentId,
      queryWindow: { from: '2024-06-30T10:00:00Z', recordTypes: ['LAB_REPORT'] },
    });
    expect(lastDay.statusCode).toBe(202);
    expect(lastDay.json().data.state).toBe('FORWARDED');

    const dayAfter = await post('/data/request', {
      hiuId: HIU_ID,
      consentId,
      queryWindow: { from: '2024-07-01T00:00:00Z', recordTypes: ['LAB_REPORT'] },
    });
    expect(dayAfter.statusCode).toBe(403);
    expect(dayAfter.json().error.code).toBe('CONSENT_NOT_ACTIVE');
  });

  it('refuses data once the consent has lapsed and reports it EXPIRED', async () => {
    const consentId = await grantedConsent();
    expect((await requestData(consentId)).statusCode).toBe(202);

    clock.set(new Date('2024-07-02T00:00:00.000Z'));
    // The first session token expired with the clock jump.
    headers = await bridgeHeaders(HIU_ID);

    const res = await requestData(consentId);
    expect(res.statusCode).toBe(403);
    expect(res.json().error.code).toBe('CONSENT_NOT_ACTIVE');

    const consent = await get(`/consent/status/${consentId}`);
    expect(consent.json().data.status).toBe('EXPIRED');
  });

  it('refuses data for a denied consent', async () => {
    const init = await post('/consent/init', {
      patientId: 'patient-1',
      hiuId: HIU_ID,
      hipId: HIP_ID,
      dateRange: { from: '2024-01-01', to: '2024-06-30' },
      recordTypes: ['LAB_REPORT'],
    });
    const consentId: string = init.json().data.consentId;
    await callback(consentId, 'CONSENT_DENIED', { reason: 'not now' });

    const res = await requestData(consentId);
    expect(res.statusCode).toBe(403);
    expect(res.json().error.code).toBe('CONSENT_NOT_ACTIVE');
    expect(requestHealthInformation).not.toHaveBeenCalled();
  });

  it('refuses data after the consent is revoked', async () => {
    const consentId = await grantedConsent();

    const revoked = await post(`/consent/${consentId}/revoke`, {});
    expect(revoked.statusCode).toBe(200);
    expect(revoked.json().data.status).toBe('REVOKED');

    const res = await requestData(consentId);
    expect(res.statusCode).toBe(403);
    expect(res.json().error.code).toBe('CONSENT_NOT_ACTIVE');
  });

  it('fails the job after the HIP is unreachable for every attempt', async () => {
    requestHealthInformation.mockRejectedValue(new RemoteCallError('connect ECONNREFUSED'));
    const consentId = await grantedConsent();

    const res = await requestData(consentId);
    expect(res.statusCode).toBe(202);
    expect(res.json().data.state).toBe('FAILED');
    expect(requestHealthInformation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);

    const transferId: string = res.json().data.transferId;
    const status = await get(`/data/status/${transferId}`);
    expect(status.json().data.failureReason).toBe('FORWARD_FAILED');
    expect(status.json().data.forwardAttempts).toBe(3);

    await callback(transferId, 'DATA_DELIVERED', { payload: 'aGVsbG8=' });
    const after = await get(`/data/status/${transferId}`);
    expect(after.json().data.state).toBe('FAILED');
    expect(transferHealthInformation).not.toHaveBeenCalled();
  });

  it('times out a forwarded job the HIP never answers', async () => {
    const consentId = await grantedConsent();
    const res = await requestData(consentId);
    const transferId: string = res.json().data.transferId;

    clock.advance(61_000);

    const status = await get(`/data/status/${transferId}`);
    expect(status.json().data.state).toBe('FAILED');
    expect(status.json().data.failureReason).toBe('TIMEOUT');

    const summary = await get(`/data/summary/${HIU_ID}`);
    expect(summary.json().data).toEqual({
      hiuId: HIU_ID,
      total: 1,
      byState: { PENDING: 0, FORWARDED: 0, DELIVERED: 0, FAILED: 1 },
      byHip: { [HIP_ID]: 1 },
    });
  });

  it('summarizes a patient consents by status and HIU', async () => {
    await grantedConsent();
    await post('/consent/init', {
      patientId: 'patient-1',
      hiuId: HIU_ID,
      hipId: HIP_ID,
      dateRange: { from: '2024-01-01', to: '2024-06-30' },
      recordTypes: ['PRESCRIPTION'],
    });

    const res = await get('/consent/summary/patient-1');
    expect(res.json().data).toEqual({
      patientId: 'patient-1',
      total: 2,
      byStatus: { REQUESTED: 1, GRANTED: 1, DENIED: 0, EXPIRED: 0, REVOKED: 0 },
      byHiu: { [HIU_ID]: 2 },
    });
  });
});
