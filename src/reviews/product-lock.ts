/**
 * Per-product moderation lock.
 *
 * Serializes transition + summary recompute for one product. Different
 * products never wait on each other.
 */

import Redis from 'ioredis';
import { v4 as uuid } from 'uuid';
import { ConcurrencyConflictError, PersistenceError } from './errors';
import { logger } from '../observability/logger';
import { productLockWait } from '../observability/metrics';

export interface ProductLock {
  withLock<T>(productId: string, work: () => Promise<T>): Promise<T>;
}

export interface ProductLockOptions {
  keyPrefix: string;
  ttlMs: number;
  waitMs: number;
  retryMs: number;
}

const RELEASE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ───── In-Process Implementation ────────────────────────────────

export class InMemoryProductLock implements ProductLock {
  /** Last queued holder per product; each entry settles when that holder releases */
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(productId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(productId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(productId, tail);

    const waitStart = Date.now();
    await previous;
    productLockWait.observe({ backend: 'memory' }, (Date.now() - waitStart) / 1000);

    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(productId) === tail) this.tails.delete(productId);
    }
  }

  /** Products with a holder or waiters (for debugging) */
  activeCount(): number {
    return this.tails.size;
  }
}

// ───── Redis Lease Implementation ───────────────────────────────

class RedisProductLock implements ProductLock {
  private readonly local = new InMemoryProductLock();
  private readonly log = logger.child({ component: 'product-lock-redis' });

  constructor(
    private readonly redis: Redis,
    private readonly options: ProductLockOptions,
  ) {}

  withLock<T>(productId: string, work: () => Promise<T>): Promise<T> {
    // Queue locally first so one instance never polls against itself
    return this.local.withLock(productId, () => this.withLease(productId, work));
  }

  private async withLease<T>(productId: string, work: () => Promise<T>): Promise<T> {
    const key = `${this.options.keyPrefix}lock:product:${productId}`;
    const token = uuid();
    const waitStart = Date.now();

    await this.acquire(key, token, productId, waitStart);
    productLockWait.observe({ backend: 'redis' }, (Date.now() - waitStart) / 1000);

    try {
      return await work();
    } finally {
      await this.release(key, token);
    }
  }

  private async acquire(key: string, token: string, productId: string, waitStart: number): Promise<void> {
    for (;;) {
      let acquired: 'OK' | null;
      try {
        acquired = await this.redis.set(key, token, 'PX', this.options.ttlMs, 'NX');
      } catch (err) {
        throw new PersistenceError('Failed to acquire product lock', err);
      }
      if (acquired === 'OK') return;

      if (Date.now() - waitStart >= this.options.waitMs) {
        this.log.warn({ productId, waitMs: this.options.waitMs }, 'Timed out waiting for product lock');
        throw new ConcurrencyConflictError(
          `Product ${productId} is busy with another moderation request`,
          { productId },
        );
      }
      await sleep(this.options.retryMs);
    }
  }

  private async release(key: string, token: string): Promise<void> {
    try {
      await this.redis.eval(RELEASE_SCRIPT, 1, key, token);
    } catch (err) {
      // The lease still expires after ttlMs
      this.log.error({ err, key }, 'Product lock release failed');
    }
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createProductLock(redis: Redis | undefined, options: ProductLockOptions): ProductLock {
  if (redis) {
    logger.info({ ttlMs: options.ttlMs }, 'Product lock: Redis lease');
    return new RedisProductLock(redis, options);
  }
  logger.info('Product lock: In-process');
  return new InMemoryProductLock();
}
