import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { ZodError } from 'zod';
import { HEADERS } from '@slotkeeper/shared';
import type { ChannelAdapter } from './channels/channel-adapter';
import type { ProjectCatalogue } from './config/projects';
import { requireSecret } from './middleware/auth';
import { adminRoutes } from './routes/admin.routes';
import { webhookRoutes } from './routes/webhooks.routes';
import type { MessageCoordinator } from './services/message-coordinator.service';
import type { MirrorReconciler } from './services/mirror-reconciler.service';
import type { SlotAllocator } from './services/slot-allocator.service';
import type { TurnRunner } from './services/turn-runner.service';
import type { DialogueStore } from './stores/dialogue.store';
import { getAllTaskMetrics, getBackgroundTaskHealth, getInFlightTaskCount } from './utils/background-task';
import { breakerStats } from './utils/circuit-breaker';
import { isAppError } from './utils/errors';
import { logger } from './utils/logger';
import { Errors, sendError } from './utils/response';
import { getTimeoutStats } from './utils/timeout';

export interface HealthProbe {
  connected: boolean;
  latencyMs?: number;
  error?: string;
}

export interface AppServices {
  coordinator: MessageCoordinator;
  allocator: SlotAllocator;
  reconciler: MirrorReconciler;
  runner: TurnRunner;
  catalogue: ProjectCatalogue;
  dialogues: DialogueStore;
  telegram: ChannelAdapter | null;
  checkDatabase: () => Promise<HealthProbe>;
  checkRedis: () => Promise<HealthProbe>;
}

export interface AppOptions {
  env: 'development' | 'production' | 'test';
  adminSecret: string;
  webhookSecret: string;
  rateLimit: { max: number; timeWindowMs: number };
  cors: { origin: string; credentials: boolean };
  /** Request logging; false in tests */
  logger: FastifyBaseLogger | false;
}

const SLOW_REQUEST_MS = 5000;

/**
 * Build the HTTP app without listening, so tests can drive it with inject()
 */
export async function buildServer(services: AppServices, options: AppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
  });

  await fastify.register(cors, {
    origin: options.cors.origin,
    credentials: options.cors.credentials,
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: options.env === 'production',
  });

  await fastify.register(rateLimit, {
    max: options.rateLimit.max,
    timeWindow: options.rateLimit.timeWindowMs,
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const durationMs = Math.round(reply.elapsedTime);
    if (durationMs > SLOW_REQUEST_MS) {
      logger.warn(
        { requestId: request.id, method: request.method, url: request.url, statusCode: reply.statusCode, durationMs },
        `Slow request: ${request.method} ${request.url} took ${durationMs}ms`
      );
    }
  });

  // Set before routes register so their encapsulated contexts inherit it
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (isAppError(error)) {
      if (error.statusCode >= 500) {
        logger.error({ err: error, requestId: request.id, code: error.code }, 'Request failed');
      } else {
        logger.info({ requestId: request.id, code: error.code, reason: error.message }, 'Request rejected');
      }
      return sendError(reply, error.statusCode, error.message, { code: error.code, details: error.details });
    }
    if (error instanceof ZodError) {
      return Errors.validationFailed(reply, error);
    }

    logger.error(
      {
        err: error,
        requestId: request.id,
        url: request.url,
        method: request.method,
      },
      'Request error'
    );

    // Don't expose internal errors in production
    const statusCode = error.statusCode ?? 500;
    const message = statusCode >= 500 && options.env === 'production' ? 'Internal Server Error' : error.message;
    return sendError(reply, statusCode, message, { code: error.code });
  });

  const adminAuth = requireSecret(HEADERS.ADMIN_SECRET, options.adminSecret);

  // Health check endpoints
  // /health - Basic liveness probe (is process running?)
  fastify.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      env: options.env,
    };
  });

  // /health/ready - Readiness probe. Redis only guards sweeps, so it cannot fail readiness.
  fastify.get('/health/ready', async (_request, reply) => {
    const [database, redis] = await Promise.all([services.checkDatabase(), services.checkRedis()]);
    const checks = {
      database: { ok: database.connected, latencyMs: database.latencyMs, error: database.error },
      redis: { ok: redis.connected, latencyMs: redis.latencyMs, error: redis.error },
    };

    if (!redis.connected) {
      logger.warn('Redis unavailable - sweep locking degraded');
    }

    return reply.status(database.connected ? 200 : 503).send({
      status: database.connected ? 'ready' : 'not_ready',
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  // /health/circuits - Circuit breaker status (auth required)
  fastify.get('/health/circuits', { preHandler: adminAuth }, async () => {
    const circuits = breakerStats();
    const openCircuits = Object.entries(circuits)
      .filter(([, stat]) => stat.state === 'open')
      .map(([name]) => name);

    return {
      status: openCircuits.length > 0 ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      openCircuits,
      circuits,
    };
  });

  // /health/tasks - Background mirror pushes, reconciliations and channel turns (auth required)
  fastify.get('/health/tasks', { preHandler: adminAuth }, async () => {
    const health = getBackgroundTaskHealth();

    return {
      status: health.healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      inFlight: getInFlightTaskCount(),
      tasks: health.tasks,
      timeouts: getTimeoutStats(),
      rawMetrics: getAllTaskMetrics(),
      reconciler: services.reconciler.getStatus(),
    };
  });

  await fastify.register(webhookRoutes, {
    runner: services.runner,
    reconciler: services.reconciler,
    telegram: services.telegram,
    webhookSecret: options.webhookSecret,
  });

  await fastify.register(adminRoutes, {
    coordinator: services.coordinator,
    allocator: services.allocator,
    reconciler: services.reconciler,
    catalogue: services.catalogue,
    dialogues: services.dialogues,
    adminSecret: options.adminSecret,
  });

  return fastify;
}
