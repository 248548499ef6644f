import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { guardLoginByIp } from '../middleware/rateLimiters';
import type { EnrollResult } from '../services/steamEnrollmentService';
import type { LoginResult, LoginTokens } from '../services/steamLoginService';
import { BadVerificationCodeError, PasskeyRequiredError } from '../utils/errors';
import { getTokenStatus } from '../utils/jwt';
import { generateCode, unixNow } from '../utils/steamGuard';

type NameParams = { Params: { name: string } };
type PendingParams = { Params: { pendingId: string } };

const PENDING_NOT_FOUND = { kind: 'not_found', message: 'Enrollment session not found or expired' };

const loginBodySchema = z.object({
  accountName: z.string().trim().min(1),
  password: z.string().min(1),
  guardCode: z.string().trim().min(1).optional()
});

const twoFactorBodySchema = z.object({
  accountName: z.string().trim().default(''),
  clientId: z.string().regex(/^\d+$/),
  requestId: z.string().min(1),
  steamid: z.string().regex(/^\d{17}$/),
  code: z.string().trim().min(1),
  guardType: z.enum(['device', 'email']).default('device')
});

const codeBodySchema = z.object({
  code: z.string().trim().min(1)
});

const confirmationRefSchema = z.object({
  id: z.string().regex(/^\d+$/),
  key: z.string().min(1)
});

const respondBodySchema = confirmationRefSchema.extend({
  accept: z.boolean()
});

const respondAllBodySchema = z.object({
  items: z.array(confirmationRefSchema).max(250),
  accept: z.boolean()
});

/** Stores fresh tokens on the matching vault account, if there is one. */
async function applyLoginTokens(app: FastifyInstance, tokens: LoginTokens): Promise<boolean> {
  const { store } = app.services;
  if (!store.isUnlocked) {
    return false;
  }

  const account = store.get(tokens.accountName);
  if (!account) {
    return false;
  }

  await store.withAccountLock(account.accountName, async () => {
    account.steamid = account.steamid ?? tokens.steamid;
    account.session = {
      ...account.session,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      tokenTimestamp: unixNow()
    };
    await store.save(account);
  });
  return true;
}

async function loginResponse(app: FastifyInstance, result: LoginResult) {
  if (result.status === 'error') {
    throw result.error;
  }
  if (result.status === 'needs_2fa') {
    return result;
  }

  const saved = await applyLoginTokens(app, result);
  return { status: result.status, accountName: result.accountName, steamid: result.steamid, saved };
}

function enrollResponse(result: EnrollResult, pendingId: string) {
  if (result.status === 'error') {
    throw result.error;
  }
  if (result.status === 'needs_more') {
    return { ...result, pendingId };
  }

  const { account } = result;
  return {
    status: result.status,
    accountName: account.accountName,
    steamid: account.steamid,
    revocationCode: account.revocationCode ?? null,
    saved: result.saved,
    // an unsaved authenticator stays pending until POST .../save succeeds
    ...(result.saved ? {} : { pendingId })
  };
}

/** Whether a pending enrollment is still needed after `result`. */
function keepPending(result: EnrollResult): boolean {
  switch (result.status) {
    case 'needs_more':
      return true;
    case 'success':
      return !result.saved;
    case 'error':
      return result.error instanceof BadVerificationCodeError;
  }
}

const steamRoutes: FastifyPluginAsync = async (app) => {
  const { store, confirmations, enrollments } = app.services;

  app.post('/api/steam/login', async (request) => {
    await guardLoginByIp(request.ip);
    const body = loginBodySchema.parse(request.body);

    const known = store.isUnlocked ? store.get(body.accountName) : undefined;
    const result = await app.services
      .createLoginSession()
      .login(body.accountName, body.password, ({ guardType }) => {
        if (body.guardCode) {
          return body.guardCode;
        }
        // an enrolled account answers its own device-code challenge
        if (guardType === 'device' && known) {
          return generateCode(known.sharedSecret, unixNow());
        }
        return null;
      });

    return loginResponse(app, result);
  });

  app.post('/api/steam/login/2fa', async (request) => {
    await guardLoginByIp(request.ip);
    const body = twoFactorBodySchema.parse(request.body);

    const result = await app.services.createLoginSession().complete2fa(
      {
        accountName: body.accountName,
        clientId: body.clientId,
        requestId: body.requestId,
        steamid: body.steamid,
        guardType: body.guardType
      },
      body.code
    );

    return loginResponse(app, result);
  });

  app.post('/api/steam/enroll', async (request) => {
    await guardLoginByIp(request.ip);
    const body = loginBodySchema.parse(request.body);
    if (!store.isUnlocked) {
      throw new PasskeyRequiredError('Unlock the vault before enrolling an authenticator.');
    }

    const session = app.services.createEnrollmentSession();
    const result = await session.begin(body.accountName, body.password, body.guardCode);
    if (!keepPending(result)) {
      return enrollResponse(result, '');
    }

    const { pendingId, expiresInSec } = enrollments.add(body.accountName, session);
    return { ...enrollResponse(result, pendingId), expiresInSec };
  });

  app.post<PendingParams>('/api/steam/enroll/:pendingId/code', async (request, reply) => {
    await guardLoginByIp(request.ip);
    const { code } = codeBodySchema.parse(request.body);
    const { pendingId } = request.params;

    const session = enrollments.get(pendingId);
    if (!session) {
      return reply.code(404).send(PENDING_NOT_FOUND);
    }

    const result = await session.submitVerificationCode(code);
    if (!keepPending(result)) {
      enrollments.delete(pendingId);
    }

    return enrollResponse(result, pendingId);
  });

  app.post<PendingParams>('/api/steam/enroll/:pendingId/save', async (request, reply) => {
    const { pendingId } = request.params;

    const session = enrollments.get(pendingId);
    if (!session) {
      return reply.code(404).send(PENDING_NOT_FOUND);
    }

    const result = await session.retrySave();
    // a session still waiting for its code stays pending
    if (result.status === 'success' && result.saved) {
      enrollments.delete(pendingId);
    }

    return enrollResponse(result, pendingId);
  });

  app.get<NameParams>('/api/steam/:name/confirmations', async (request) => {
    const account = store.require(request.params.name);
    const items = await store.withAccountLock(account.accountName, () => confirmations.listConfirmations(account));
    return { accountName: account.accountName, confirmations: items };
  });

  app.post<NameParams>('/api/steam/:name/confirmations/respond', async (request) => {
    const account = store.require(request.params.name);
    const { id, key, accept } = respondBodySchema.parse(request.body);

    const success = await store.withAccountLock(account.accountName, () =>
      confirmations.respond(account, { id, key }, accept)
    );
    return { success };
  });

  app.post<NameParams>('/api/steam/:name/confirmations/respond-all', async (request) => {
    const account = store.require(request.params.name);
    const { items, accept } = respondAllBodySchema.parse(request.body);

    const success = await store.withAccountLock(account.accountName, () =>
      confirmations.respondMany(account, items, accept)
    );
    return { success, count: items.length };
  });

  app.post<NameParams>('/api/steam/:name/refresh-session', async (request) => {
    const account = store.require(request.params.name);

    const session = await store.withAccountLock(account.accountName, () => confirmations.refreshSession(account));
    return { accountName: account.accountName, tokens: getTokenStatus(session, unixNow()) };
  });

  app.get<NameParams>('/api/steam/:name/session-status', async (request) => {
    const account = store.require(request.params.name);

    const report = await store.withAccountLock(account.accountName, () => confirmations.checkSessionStatus(account));
    return { accountName: account.accountName, ...report };
  });
};

export default steamRoutes;
