import { FastifyInstance } from 'fastify';
import { env } from '../config/env';
import { getMetrics, getContentType } from '../observability/metrics';
import { ReviewRepository } from '../reviews/types';
import { PersistenceError } from '../reviews/errors';

export function registerHealthRoutes(app: FastifyInstance, store: ReviewRepository, storeBackend: 'redis' | 'memory'): void {
  /** Liveness probe (always 200 if the process is running) */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', service: 'reviews', timestamp: new Date().toISOString() });
  });

  /** Readiness probe: checks the review store */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    if (storeBackend === 'redis') {
      const start = Date.now();
      try {
        await store.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
      } catch (err) {
        if (!(err instanceof PersistenceError)) throw err;
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
  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
