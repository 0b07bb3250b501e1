import type { FastifyInstance } from 'fastify';
import { buildServer } from './app';
import { config } from './config';
import { createServices } from './container';
import type { MirrorReconciler } from './services/mirror-reconciler.service';
import { waitForBackgroundTasks } from './utils/background-task';
import { closeDatabase } from './utils/database';
import { logger } from './utils/logger';
import { redis } from './utils/redis';

// Grace period for background mirror pushes and channel turns during shutdown
const SHUTDOWN_GRACE_PERIOD_MS = 30000;

async function start() {
  let server: FastifyInstance | null = null;
  let reconciler: MirrorReconciler | null = null;
  let isShuttingDown = false;

  // Graceful shutdown handler
  async function gracefulShutdown(signal: string) {
    // Prevent multiple shutdown attempts
    if (isShuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress, ignoring signal');
      return;
    }
    isShuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, starting graceful shutdown...');

    try {
      // Close Fastify server (stop accepting new requests)
      if (server) {
        await server.close();
        logger.info('HTTP server closed, no new requests accepted');
      }

      reconciler?.stop();

      const drained = await waitForBackgroundTasks(SHUTDOWN_GRACE_PERIOD_MS);
      if (!drained) {
        logger.warn({ graceMs: SHUTDOWN_GRACE_PERIOD_MS }, 'Background tasks still running at shutdown');
      }

      await redis.quit();

      await closeDatabase();
      logger.info('Database connection closed');

      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during graceful shutdown');
      process.exit(1);
    }
  }

  // Unhandled rejection handler - log and continue (don't crash)
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection - logging but not crashing');
  });

  // Uncaught exception handler - log, cleanup, and exit
  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception - initiating emergency shutdown');

    const emergencyClose = Promise.race([
      Promise.all([server ? server.close() : Promise.resolve(), closeDatabase()]),
      new Promise((resolve) => setTimeout(resolve, 5000)),
    ]);
    emergencyClose
      .catch((shutdownErr: unknown) => {
        logger.error({ err: shutdownErr }, 'Error during emergency shutdown');
      })
      .finally(() => process.exit(1));
  });

  // Register shutdown handlers
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  try {
    const services = createServices();
    reconciler = services.reconciler;

    server = await buildServer(services, {
      env: config.env,
      adminSecret: config.adminSecret,
      webhookSecret: config.webhookSecret,
      rateLimit: { max: config.rateLimitMax, timeWindowMs: config.rateLimitWindow },
      cors: config.cors,
      logger,
    });

    await server.listen({
      port: config.port,
      host: config.host,
    });

    // Periodic mirror reconciliation (no-op when disabled)
    services.reconciler.start();

    logger.info(
      {
        port: config.port,
        host: config.host,
        env: config.env,
      },
      'Server started'
    );
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

void start();
