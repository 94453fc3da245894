import { buildServer } from './app';
import { closeDb } from './database/connection';
import { loadConfig } from './config';
import { logger } from './lib/logger';
import { APP_NAME } from '../shared/constants';

async function start() {
  const { port, host } = loadConfig();
  const server = await buildServer();

  const shutdown = async (signal: string) => {
    logger.info({ signal }, '[Server] Shutting down...');
    try {
      await server.close();
      await closeDb();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, '[Server] Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.listen({ port, host });
  logger.info(`[Server] ${APP_NAME} API running on http://${host}:${port}`);
}

start().catch((err: unknown) => {
  logger.fatal({ err }, '[Server] Failed to start');
  process.exit(1);
});
