import path from 'path';
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import {
  exportInterop,
  importInterop,
  isInteropFolder,
  verifyPasskey,
  writeInteropExport
} from '../services/interopService';

const folderBodySchema = z.object({
  folder: z.string().min(1),
  passkey: z.string().optional()
});

const interopRoutes: FastifyPluginAsync = async (app) => {
  const { store } = app.services;

  app.post('/api/interop/check', async (request) => {
    const { folder, passkey } = folderBodySchema.parse(request.body);
    const resolved = path.resolve(folder);

    if (!(await isInteropFolder(resolved))) {
      return { interop: false, passkeyValid: null };
    }
    return { interop: true, passkeyValid: passkey ? await verifyPasskey(resolved, passkey) : null };
  });

  app.post('/api/interop/export', async (request) => {
    const { folder, passkey } = folderBodySchema.parse(request.body);

    const exported = exportInterop(store.list(), passkey || undefined);
    const files = await writeInteropExport(path.resolve(folder), exported);
    return { folder: path.resolve(folder), encrypted: exported.manifest.encrypted, files };
  });

  app.post('/api/interop/import', async (request) => {
    const { folder, passkey } = folderBodySchema.parse(request.body);

    const { accounts, errors } = await importInterop(path.resolve(folder), passkey || undefined);
    const { saved, added, updated, conflicts } = await store.saveMany(accounts);
    return { imported: saved, added, updated, errors: [...errors, ...conflicts] };
  });
};

export default interopRoutes;
