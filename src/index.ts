import { buildApp } from './app';
import { env } from './config/env';
import { CodeTicker } from './jobs/codeTicker';
import { PasskeyRequiredError } from './utils/errors';

async function start() {
  const app = await buildApp();
  const { store, hub } = app.services;
  const ticker = new CodeTicker(store, hub);

  try {
    try {
      await store.unlock();
    } catch (error) {
      if (!(error instanceof PasskeyRequiredError)) {
        throw error;
      }
      app.log.info('Vault is encrypted; waiting for POST /api/vault/unlock');
    }

    await app.listen({
      host: env.HOST,
      port: env.PORT
    });

    ticker.start();

    const close = async () => {
      ticker.stop();
      await app.close();
      process.exit(0);
    };

    process.on('SIGINT', () => {
      void close();
    });

    process.on('SIGTERM', () => {
      void close();
    });
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
}

void start();
