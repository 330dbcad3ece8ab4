import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { logger, requestLogger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { registerHealthRoutes } from './health/health-routes';
import { createReviewStore } from './reviews/review-store';
import { createProductLock } from './reviews/product-lock';
import { ReviewService } from './reviews/review-service';
import { ModerationService } from './reviews/moderation-service';
import { HelpfulnessTracker } from './reviews/helpfulness-tracker';
import { ReviewResponseLedger } from './reviews/response-ledger';
import { registerReviewRoutes } from './reviews/review-routes';
import { ReviewRepository } from './reviews/types';

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  store: ReviewRepository;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.enabled) {
    logger.info('Redis disabled by configuration; using in-memory stores');
    return undefined;
  }

  const redisInstance = new Redis(env.redis.url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      if (times > 5) return null; // stop retrying
      return Math.min(times * 200, 2000);
    },
    lazyConnect: true,
  });
  // Attach error handler BEFORE connect to prevent unhandled error events
  redisInstance.on('error', (err) => {
    logger.debug({ err: err.message }, 'Redis connection error (handled)');
  });

  try {
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    redisInstance.disconnect();
    return undefined;
  }
}

export async function buildApp(): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    if (reply.statusCode >= 500) {
      requestLogger(req.id, { route }).warn({ statusCode: reply.statusCode }, 'Request failed');
    }
    done();
  });

  const redis = await connectRedis();

  // ───── Review core ─────
  const store = createReviewStore(redis, env.redis.keyPrefix);
  const lock = createProductLock(redis, {
    keyPrefix: env.redis.keyPrefix,
    ttlMs: env.moderation.lockTtlMs,
    waitMs: env.moderation.lockWaitMs,
    retryMs: env.moderation.lockRetryMs,
  });

  const reviews = new ReviewService(store, env.pagination);
  const moderation = new ModerationService(store, lock);
  const helpfulness = new HelpfulnessTracker(store);
  const responses = new ReviewResponseLedger(store);

  registerReviewRoutes(app, { reviews, moderation, helpfulness, responses });
  registerHealthRoutes(app, store, redis ? 'redis' : 'memory');

  logger.info({ store: redis ? 'redis' : 'memory' }, 'Review service initialized');

  return { app, redis, store };
}
