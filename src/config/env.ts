import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function required(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required env var: ${key}`);
  return val;
}

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 5003),
  logLevel: optional('LOG_LEVEL', 'info'),

  redis: {
    enabled: optionalBool('REDIS_ENABLED', true),
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'reviews:'),
  },

  security: {
    adminApiKey: required('ADMIN_API_KEY'),
  },

  // ───── Moderation ─────
  // Lease on a product while a transition and its summary recompute run.
  moderation: {
    lockTtlMs: optionalInt('LOCK_TTL_MS', 10_000),
    lockWaitMs: optionalInt('LOCK_WAIT_MS', 5_000),
    lockRetryMs: optionalInt('LOCK_RETRY_MS', 50),
  },

  pagination: {
    defaultPerPage: optionalInt('REVIEWS_PER_PAGE', 10),
    maxPerPage: optionalInt('REVIEWS_MAX_PER_PAGE', 100),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
};

export type Env = typeof env;
