import { buildServer } from './app';
import { closeDb } from './database/connection';
import { env } from './config/env';
import { logger } from './utils/logger';
import { APP_NAME } from '../shared/constants';

async function start() {
  const server = await buildServer();

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    try {
      await server.close();
      await closeDb();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.listen({ port: env.API_PORT, host: env.API_HOST });
  logger.info(`${APP_NAME} API running on http://${env.API_HOST}:${env.API_PORT}`);
}

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start');
  process.exit(1);
});
