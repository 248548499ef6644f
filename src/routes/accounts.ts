import type { FastifyPluginAsync } from 'fastify';
import { computeCodes } from '../jobs/codeTicker';
import type { Account } from '../types/steam';
import { ProtocolError } from '../utils/errors';
import { getTokenStatus } from '../utils/jwt';
import { currentCode, unixNow } from '../utils/steamGuard';

type NameParams = { Params: { name: string } };

/** Secrets and tokens stay in the vault. */
export function toAccountView(account: Account, nowSec: number = unixNow()) {
  return {
    accountName: account.accountName,
    steamid: account.steamid ?? null,
    hasSession: Boolean(account.session),
    tokens: getTokenStatus(account.session, nowSec),
    hasRevocationCode: Boolean(account.revocationCode),
    profile: account.profile ?? null
  };
}

const accountRoutes: FastifyPluginAsync = async (app) => {
  const { store, profiles } = app.services;

  app.get('/api/accounts', async () => {
    const nowSec = unixNow();
    return { accounts: store.list().map((account) => toAccountView(account, nowSec)) };
  });

  app.get('/api/accounts/live-codes', async () => ({
    codes: computeCodes(store.list())
  }));

  app.get<NameParams>('/api/accounts/:name/code', async (request) => {
    const account = store.require(request.params.name);
    return { accountName: account.accountName, ...currentCode(account.sharedSecret) };
  });

  app.delete<NameParams>('/api/accounts/:name', async (request, reply) => {
    await store.remove(request.params.name);
    return reply.code(204).send();
  });

  app.post<NameParams>('/api/accounts/:name/profile', async (request, reply) => {
    const account = store.require(request.params.name);
    if (!account.steamid) {
      throw new ProtocolError(`Account ${account.accountName} has no steamid`);
    }
    if (!profiles.isConfigured) {
      return reply.code(400).send({ kind: 'validation', message: 'STEAM_WEB_API_KEY is not configured' });
    }

    const profile = await profiles.fetchProfile(account.steamid);
    if (profile) {
      await store.withAccountLock(account.accountName, async () => {
        account.profile = profile;
        await store.save(account);
      });
    }

    return { accountName: account.accountName, profile };
  });
};

export default accountRoutes;
