/**
 * EHR API Server
 */

import { createLogger } from '@ehr-backend/core';

import { buildApp } from './app.js';
import { createBackend } from './backend.js';
import { loadConfig } from './config.js';

const logger = createLogger({ name: 'server' });

async function main(): Promise<void> {
  const config = loadConfig();
  const backend = createBackend(config);
  const app = await buildApp({ config, backend });

  // One shutdown even when SIGINT and SIGTERM arrive together
  let isShuttingDown = false;
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  for (const signal of signals) {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.info({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
        return;
      }
      isShuttingDown = true;
      logger.info({ signal }, 'Received shutdown signal');
      app
        .close()
        .then(() => backend.close())
        .then(() => {
          logger.info('Server closed gracefully');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }

  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
    process.exit(1);
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address, env: config.env, store: backend.kind }, 'EHR API server started');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    await backend.close();
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error during startup');
  process.exit(1);
});
