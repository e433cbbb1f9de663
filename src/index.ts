import { validateEnv } from './config/env.js';
import { configureLogger, logger } from './config/logger.js';
import { createApp, createServices } from './app.js';
import { Database } from './db/client.js';
import { PgContentStore } from './db/content.store.js';
import { PgUserStore } from './db/user.store.js';

/**
 * Web server entry point
 */
async function startServer() {
  const env = validateEnv();
  configureLogger({
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT ?? (env.NODE_ENV === 'production' ? 'json' : 'pretty'),
  });

  logger.info('Starting catalog server');
  logger.info(`Environment: ${env.NODE_ENV}`);

  const db = new Database({ connectionString: env.DATABASE_URL });
  const services = createServices(
    { content: new PgContentStore(db), users: new PgUserStore(db) },
    env
  );
  const app = createApp(services, env);

  const server = app.listen(env.PORT, () => {
    logger.info(`Server listening on port ${env.PORT}`);
    logger.info(`Health check: http://localhost:${env.PORT}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down gracefully...');

    server.close(() => {
      logger.info('HTTP server closed');
      db.disconnect()
        .then(() => process.exit(0))
        .catch((error) => {
          logger.error('Failed to close database pool', { error });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

startServer().catch((error) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
