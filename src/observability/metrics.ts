import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

const registry = new Registry();

// The event-loop monitor keeps a handle open, which test runners report as a leak
if (process.env.NODE_ENV !== 'test') {
  collectDefaultMetrics({ register: registry, prefix: 'reviews_' });
}

export const httpRequestDuration = new Histogram({
  name: 'reviews_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

export const moderationTransitions = new Counter({
  name: 'reviews_moderation_transitions_total',
  help: 'Moderation requests by action and outcome',
  labelNames: ['action', 'outcome'] as const,
  registers: [registry],
});

export const summaryRecomputeDuration = new Histogram({
  name: 'reviews_summary_recompute_duration_seconds',
  help: 'Time to reload the approved set and rebuild a product summary',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [registry],
});

export const productLockWait = new Histogram({
  name: 'reviews_product_lock_wait_seconds',
  help: 'Time spent waiting for the per-product moderation lock',
  labelNames: ['backend'] as const,
  buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
