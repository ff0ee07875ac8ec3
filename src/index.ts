/**
 * Textbook Assistant API Server
 *
 * - Auth (/api/auth/*)
 * - Profile (/api/profile)
 * - Assistant (/api/ask, /api/chat/history, /api/personalize, /api/translate)
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp, createServices, SERVICE_NAME } from '@/app';
import { ConfigError, loadConfig } from '@/config';
import { createDatabase } from '@/db/client';
import { applyMigrations } from '@/db/migrations';
import { startSessionCleanup } from '@/services/housekeeping.service';
import { configureLogger, logger } from '@/utils/logger';

async function main() {
  const config = loadConfig(process.env);
  configureLogger({ level: config.logLevel });

  const database = createDatabase(config.database);
  if (config.database.autoMigrate) {
    await applyMigrations(database.db);
  }

  const services = createServices(config, database.db);
  const app = createApp(services, config);
  const stopCleanup = startSessionCleanup(services.store, {
    intervalMs: config.session.cleanupIntervalMs,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.port,
  });

  logger.info(`${SERVICE_NAME} running on http://localhost:${config.port}`, {
    env: config.env,
    origins: config.cors.origins,
  });

  function gracefulShutdown(signal: string) {
    logger.info(`${signal} received: shutting down gracefully...`);
    stopCleanup();
    server.close(() => {
      logger.info('HTTP server closed, draining connections');
      database
        .close()
        .then(() => {
          logger.info('Database connections closed');
          process.exit(0);
        })
        .catch((err) => {
          logger.error('Error closing database', { error: String(err) });
          process.exit(1);
        });
    });
    setTimeout(() => {
      logger.error('Forced shutdown after 10s timeout');
      process.exit(1);
    }, 10_000).unref();
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    logger.error('Configuration error', { issues: error.issues });
  } else {
    logger.error('Startup failed', { error: String(error) });
  }
  process.exit(1);
});
