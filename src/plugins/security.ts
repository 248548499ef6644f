import fp from 'fastify-plugin';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import websocket from '@fastify/websocket';
import { env } from '../config/env';

export default fp(async (app) => {
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin) {
        cb(null, true);
        return;
      }

      const allowed = [env.APP_URL, 'http://localhost:3000', 'http://127.0.0.1:3000'];
      cb(null, allowed.includes(origin));
    }
  });

  await app.register(helmet, {
    contentSecurityPolicy: false
  });

  await app.register(websocket);

  // The API only listens on loopback; refuse requests addressed to another host name.
  app.addHook('onRequest', async (request, reply) => {
    const host = request.headers.host?.replace(/:\d+$/, '');
    if (host && !['localhost', '127.0.0.1', '[::1]'].includes(host) && host !== env.HOST) {
      return reply.code(421).send({ kind: 'misdirected', message: 'Unexpected Host header' });
    }
  });
});
