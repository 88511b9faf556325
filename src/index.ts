import { createApp } from './app';
import { appConfig, connectDatabase, connectRedis } from './connections';
import { buildServices } from './services';
import { logger } from './utils/logging';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  logger.info('Initializing connections...');

  logger.info('Connecting to database...');
  await connectDatabase();

  logger.info('Connecting to Redis...');
  await connectRedis();

  const app = createApp(buildServices());

  app.listen(PORT, () => {
    logger.info(`Server is running on port ${PORT}`);
    logger.info(`Environment: ${appConfig.nodeEnv}`);
    logger.info('All services are ready!');
  });
};

startServer().catch((error: unknown) => {
  logger.error('Failed to start server:', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  logger.error('Exiting application...');
  process.exit(1);
});
