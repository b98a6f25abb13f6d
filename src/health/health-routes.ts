import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { logger } from '../observability/logger';
import { getContentType, getMetrics } from '../observability/metrics';

export interface HealthOptions {
  redis?: Redis;
  enableMetrics: boolean;
}

export function registerHealthRoutes(app: FastifyInstance, options: HealthOptions): void {
  /** Liveness probe: 200 while the process is up */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  /** Readiness probe; pings the shared store when one is configured */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    if (options.redis) {
      const start = Date.now();
      try {
        await options.redis.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
      } catch (err) {
        logger.warn({ err }, 'Redis readiness check failed');
        checks.redis = { status: 'error', latencyMs: Date.now() - start };
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok' || c.status === 'skipped');
    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (options.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
