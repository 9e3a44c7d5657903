import dotenv from 'dotenv';
import { ConfigError, loadConfig } from '../../config.js';
import { logger } from '../logger.js';
import { createMemoryStorage, createPostgresStorage, type Storage } from '../storage.js';
import { createApp } from './app.js';

dotenv.config();

async function start(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;

  let storage: Storage;
  if (config.databaseUrl) {
    storage = createPostgresStorage(config.databaseUrl);
    // Unreachable database at startup is fatal
    await storage.ping();
    logger.info('Connected to PostgreSQL');
  } else {
    storage = createMemoryStorage();
    logger.warn('DATABASE_URL not set; using the in-memory store (data is lost on restart)');
  }

  const app = createApp({ config, storage, logger });

  const server = app.listen(config.port, () => {
    logger.info(`Server running on http://localhost:${config.port}`);
    logger.info(`API docs: http://localhost:${config.port}/docs`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      storage
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close storage');
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.fatal(error.message);
  } else {
    logger.fatal({ err: error }, 'Failed to start server');
  }
  process.exit(1);
});
