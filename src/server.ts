import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { createPosContext } from './context';
import { logger } from './observability';
import { createBlobStore } from './storage';

const startServer = async (): Promise<void> => {
  try {
    logger.info(getEnvironmentInfo(), 'Starting booth ledger');

    const store = createBlobStore();
    await store.connect();
    logger.info({ driver: store.driver }, 'Blob store connected');

    const context = await createPosContext(store, { exportLocale: config.export.locale });
    const app = createApp(context);

    // Start HTTP server
    const server = app.listen(config.port, () => {
      logger.info(
        { port: config.port, environment: config.nodeEnv },
        `Server running on port ${config.port}`
      );
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');

        store
          .disconnect()
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
