import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/app';
import { AccountStore } from '../src/services/accountStore';
import { ConfirmationEngine } from '../src/services/steamService';
import { EnrollmentSession, PendingEnrollments } from '../src/services/steamEnrollmentService';
import { LoginSession } from '../src/services/steamLoginService';
import { VaultStore } from '../src/services/vaultService';
import type { Account } from '../src/types/steam';
import { generateCode, unixNow } from '../src/utils/steamGuard';
import {
  FakeSteam,
  TEST_STEAMID,
  postedPayload,
  steamEnrollmentRoutes,
  steamLoginRoutes
} from './helpers/fakeSteam';

const alice: Account = {
  accountName: 'alice',
  steamid: TEST_STEAMID,
  sharedSecret: Buffer.from('test-shared-secret').toString('base64'),
  identitySecret: Buffer.from('test-identity-secret').toString('base64'),
  deviceId: 'android:test-device',
  revocationCode: 'R12345'
};

let dir: string;
let app: FastifyInstance;
let store: AccountStore;

async function setup(steam: FakeSteam = new FakeSteam(), unlocked = true): Promise<void> {
  store = new AccountStore(new VaultStore(path.join(dir, 'vault.json')));
  if (unlocked) {
    await store.unlock();
    await store.save({ ...alice });
  }

  const transport = steam.transport();
  const login = () => new LoginSession({ transport, pollAttempts: 2, sleep: async () => undefined });
  app = await buildApp({
    logger: false,
    store,
    transport,
    confirmations: new ConfirmationEngine({ transport, http: steam.client(), save: store.save }),
    enrollments: new PendingEnrollments(60_000),
    createLoginSession: login,
    createEnrollmentSession: () =>
      new EnrollmentSession({
        transport,
        loginSession: login(),
        save: store.save,
        deviceId: 'android:enrolled-device',
        sleep: async () => undefined
      })
  });
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'api-'));
});

afterEach(async () => {
  await app.close();
  await fs.rm(dir, { recursive: true, force: true });
});

describe('vault and accounts API', () => {
  it('unlocks an empty vault', async () => {
    await setup(new FakeSteam(), false);

    const locked = await app.inject({ method: 'GET', url: '/api/accounts' });
    expect(locked.statusCode).toBe(401);
    expect(locked.json()).toEqual({
      kind: 'passkey_required',
      message: 'Vault is locked. Unlock it with the passkey first.',
      retryable: false
    });

    const response = await app.inject({ method: 'POST', url: '/api/vault/unlock', payload: {} });
    expect(response.json()).toEqual({ unlocked: true, encrypted: false, count: 0 });
  });

  it('lists accounts without their secrets', async () => {
    await setup();

    const response = await app.inject({ method: 'GET', url: '/api/accounts' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      accounts: [
        {
          accountName: 'alice',
          steamid: TEST_STEAMID,
          hasSession: false,
          tokens: {
            accessTokenValid: false,
            refreshTokenValid: false,
            accessTokenExpiresAt: null,
            refreshTokenExpiresAt: null
          },
          hasRevocationCode: true,
          profile: null
        }
      ]
    });
  });

  it('returns the current code', async () => {
    await setup();
    const before = generateCode(alice.sharedSecret, unixNow());

    const response = await app.inject({ method: 'GET', url: '/api/accounts/alice/code' });

    const after = generateCode(alice.sharedSecret, unixNow());
    const body = response.json();
    expect(body.accountName).toBe('alice');
    expect([before, after]).toContain(body.code);
    expect(body.secondsRemaining).toBeGreaterThanOrEqual(1);
    expect(body.secondsRemaining).toBeLessThanOrEqual(30);
  });

  it('answers 404 for an unknown account', async () => {
    await setup();

    const response = await app.inject({ method: 'GET', url: '/api/accounts/nobody/code' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      kind: 'account_not_found',
      message: 'Account not found: nobody',
      retryable: false
    });
  });

  it('exports and re-imports through an interop folder', async () => {
    await setup();
    const folder = path.join(dir, 'export');

    const exported = await app.inject({
      method: 'POST',
      url: '/api/interop/export',
      payload: { folder, passkey: 'test-passkey' }
    });
    expect(exported.json()).toEqual({ folder, encrypted: true, files: [`${TEST_STEAMID}.maFile`] });

    const checked = await app.inject({
      method: 'POST',
      url: '/api/interop/check',
      payload: { folder, passkey: 'wrong-passkey' }
    });
    expect(checked.json()).toMatchObject({ interop: true });

    const imported = await app.inject({
      method: 'POST',
      url: '/api/interop/import',
      payload: { folder, passkey: 'test-passkey' }
    });
    expect(imported.json()).toEqual({ imported: ['alice'], added: 0, updated: 1, errors: [] });
  });

  it('rejects requests for other host names', async () => {
    await setup();

    const response = await app.inject({ method: 'GET', url: '/health', headers: { host: 'steam-guard.example' } });

    expect(response.statusCode).toBe(421);
  });
});

describe('Steam API', () => {
  it('validates the login body', async () => {
    await setup();

    const response = await app.inject({ method: 'POST', url: '/api/steam/login', payload: {} });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ kind: 'validation', message: 'accountName: Required' });
  });

  it('answers the device challenge for an enrolled account and stores the tokens', async () => {
    const steam = steamLoginRoutes(new FakeSteam(), 3);
    await setup(steam);
    const before = generateCode(alice.sharedSecret, unixNow());

    const response = await app.inject({
      method: 'POST',
      url: '/api/steam/login',
      payload: { accountName: 'alice', password: 'test-password' }
    });

    const after = generateCode(alice.sharedSecret, unixNow());
    expect(response.json()).toEqual({ status: 'success', accountName: 'alice', steamid: TEST_STEAMID, saved: true });
    const code = postedPayload(steam.calls('UpdateAuthSessionWithSteamGuardCode/v1')[0]).getString(3);
    expect([before, after]).toContain(code);
    expect(store.get('alice')?.session).toMatchObject({ accessToken: 'test-access', refreshToken: 'test-refresh' });
  });

  it('returns the pending challenge for an unknown account', async () => {
    await setup(steamLoginRoutes(new FakeSteam(), 3));

    const response = await app.inject({
      method: 'POST',
      url: '/api/steam/login',
      payload: { accountName: 'carol', password: 'test-password' }
    });

    expect(response.json()).toEqual({
      status: 'needs_2fa',
      accountName: 'carol',
      clientId: '111',
      requestId: Buffer.from('test-request-id').toString('base64'),
      steamid: TEST_STEAMID,
      guardType: 'device'
    });
  });

  it('walks an enrollment through guard and activation codes', async () => {
    const sharedSecret = Buffer.from('carol-shared-secret');
    const steam = steamEnrollmentRoutes(
      steamLoginRoutes(new FakeSteam(), 2),
      sharedSecret,
      Buffer.from('carol-identity-secret')
    );
    await setup(steam);

    const started = await app.inject({
      method: 'POST',
      url: '/api/steam/enroll',
      payload: { accountName: 'carol', password: 'test-password' }
    });
    const { pendingId } = started.json();
    expect(started.json()).toEqual({
      status: 'needs_more',
      reason: 'guard_code',
      accountName: 'carol',
      pendingId,
      expiresInSec: 60
    });

    const guarded = await app.inject({
      method: 'POST',
      url: `/api/steam/enroll/${pendingId}/code`,
      payload: { code: 'MAIL1' }
    });
    expect(guarded.json()).toEqual({
      status: 'needs_more',
      reason: 'activation_code',
      accountName: 'carol',
      confirmType: 1,
      pendingId
    });

    const activated = await app.inject({
      method: 'POST',
      url: `/api/steam/enroll/${pendingId}/code`,
      payload: { code: '12345' }
    });
    expect(activated.json()).toEqual({
      status: 'success',
      accountName: 'carol',
      steamid: TEST_STEAMID,
      revocationCode: 'R12345',
      saved: true
    });
    expect(store.get('carol')).toMatchObject({
      sharedSecret: sharedSecret.toString('base64'),
      deviceId: 'android:enrolled-device'
    });

    const gone = await app.inject({
      method: 'POST',
      url: `/api/steam/enroll/${pendingId}/code`,
      payload: { code: '12345' }
    });
    expect(gone.statusCode).toBe(404);
    expect(gone.json()).toEqual({ kind: 'not_found', message: 'Enrollment session not found or expired' });
  });

  it('refuses to enroll while the vault is locked', async () => {
    const steam = steamLoginRoutes(new FakeSteam(), 1);
    await setup(steam, false);

    const response = await app.inject({
      method: 'POST',
      url: '/api/steam/enroll',
      remoteAddress: '127.0.0.2',
      payload: { accountName: 'carol', password: 'test-password' }
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      kind: 'passkey_required',
      message: 'Unlock the vault before enrolling an authenticator.',
      retryable: false
    });
    expect(steam.requests).toHaveLength(0);
  });

  it('keeps an activated authenticator pending until the vault accepts it', async () => {
    const sharedSecret = Buffer.from('carol-shared-secret');
    const steam = steamEnrollmentRoutes(
      steamLoginRoutes(new FakeSteam(), 1),
      sharedSecret,
      Buffer.from('carol-identity-secret')
    );
    await setup(steam);
    const vaultPath = path.join(dir, 'vault.json');

    const started = await app.inject({
      method: 'POST',
      url: '/api/steam/enroll',
      remoteAddress: '127.0.0.2',
      payload: { accountName: 'carol', password: 'test-password' }
    });
    const { pendingId } = started.json();
    expect(started.json()).toMatchObject({ status: 'needs_more', reason: 'activation_code' });

    const early = await app.inject({ method: 'POST', url: `/api/steam/enroll/${pendingId}/save` });
    expect(early.json()).toMatchObject({ kind: 'enrollment_incomplete' });

    // a directory in the vault's place makes the write fail
    await fs.rm(vaultPath);
    await fs.mkdir(vaultPath);

    const activated = await app.inject({
      method: 'POST',
      url: `/api/steam/enroll/${pendingId}/code`,
      remoteAddress: '127.0.0.2',
      payload: { code: '12345' }
    });
    expect(activated.json()).toEqual({
      status: 'success',
      accountName: 'carol',
      steamid: TEST_STEAMID,
      revocationCode: 'R12345',
      saved: false,
      pendingId
    });

    await fs.rm(vaultPath, { recursive: true });

    const saved = await app.inject({ method: 'POST', url: `/api/steam/enroll/${pendingId}/save` });
    expect(saved.json()).toEqual({
      status: 'success',
      accountName: 'carol',
      steamid: TEST_STEAMID,
      revocationCode: 'R12345',
      saved: true
    });
    expect(steam.calls('FinalizeAddAuthenticator/v1')).toHaveLength(1);

    const reopened = new AccountStore(new VaultStore(vaultPath));
    const accounts = await reopened.unlock();
    expect(accounts.find((account) => account.accountName === 'carol')).toMatchObject({
      sharedSecret: sharedSecret.toString('base64'),
      revocationCode: 'R12345'
    });

    const gone = await app.inject({ method: 'POST', url: `/api/steam/enroll/${pendingId}/save` });
    expect(gone.statusCode).toBe(404);
  });

  it('rate limits activation code attempts per address', async () => {
    await setup();

    const statuses: number[] = [];
    for (let attempt = 0; attempt < 11; attempt += 1) {
      const response = await app.inject({
        method: 'POST',
        url: '/api/steam/enroll/unknown-pending-id/code',
        remoteAddress: '127.0.0.3',
        payload: { code: '12345' }
      });
      statuses.push(response.statusCode);
    }

    expect(statuses.slice(0, 10)).toEqual(Array(10).fill(404));
    expect(statuses[10]).toBe(429);
  });

  it('refuses to enroll an account that already has an authenticator', async () => {
    await setup(steamLoginRoutes(new FakeSteam(), 3));

    const response = await app.inject({
      method: 'POST',
      url: '/api/steam/enroll',
      payload: { accountName: 'alice', password: 'test-password' }
    });

    expect(response.statusCode).toBe(409);
    expect(response.json().kind).toBe('already_enrolled');
  });
});
