import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { guardUnlockByIp } from '../middleware/rateLimiters';

const passkeyBodySchema = z.object({
  passkey: z.string().optional()
});

const vaultRoutes: FastifyPluginAsync = async (app) => {
  const { store } = app.services;

  app.post('/api/vault/unlock', async (request) => {
    await guardUnlockByIp(request.ip);
    const { passkey } = passkeyBodySchema.parse(request.body ?? {});

    const accounts = await store.unlock(passkey);
    return { unlocked: true, encrypted: store.isEncrypted, count: accounts.length };
  });

  app.post('/api/vault/passkey', async (request) => {
    const { passkey } = passkeyBodySchema.parse(request.body ?? {});

    await store.changePasskey(passkey);
    return { encrypted: store.isEncrypted };
  });
};

export default vaultRoutes;
