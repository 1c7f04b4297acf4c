import { env } from './config/env.js';
import { createApp } from './app.js';
import { createContainer } from './container.js';
import { getErrorMessage } from './core/errors.js';
import { createLogger, setLogLevel } from './core/logger.js';

setLogLevel(env.LOG_LEVEL);
const logger = createLogger('SERVER');

const container = createContainer(env);
const app = createApp(container, {
  corsOrigins: env.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
  rateLimit: { windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX_REQUESTS }
});

const server = app.listen(env.PORT, () => {
  logger.info('listen', 'READY', `🚀 Server running in ${env.NODE_ENV} mode on port ${env.PORT}`);
});

// Warm the schema catalog
container.catalog.tableNames().catch((error: unknown) => {
  logger.error('warmup', 'SCHEMA_LOAD_FAILED', getErrorMessage(error));
});

const shutdown = (signal: string) => {
  logger.info('shutdown', signal, 'Closing connections');
  server.close(() => {
    container
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('shutdown', 'ERROR', getErrorMessage(error));
        process.exit(1);
      });
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
