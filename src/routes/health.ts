import type { FastifyPluginAsync } from 'fastify';

const healthRoute: FastifyPluginAsync = async (app) => {
  app.get('/health', async () => ({
    status: 'ok',
    service: 'steam-mobile-guard',
    vault: app.services.store.isUnlocked ? 'unlocked' : 'locked'
  }));
};

export default healthRoute;
