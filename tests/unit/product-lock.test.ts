import Redis from 'ioredis';
import { InMemoryProductLock, createProductLock } from '../../src/reviews/product-lock';
import { ConcurrencyConflictError, PersistenceError } from '../../src/reviews/errors';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function createMockRedis(setResults: Array<'OK' | null | Error>) {
  const queue = [...setResults];
  return {
    set: jest.fn(async (..._args: unknown[]) => {
      const next = queue.length > 1 ? queue.shift() : queue[0];
      if (next instanceof Error) throw next;
      return next ?? null;
    }),
    eval: jest.fn(async (..._args: unknown[]) => 1),
  };
}

const LOCK_OPTIONS = { keyPrefix: 'reviews:', ttlMs: 1000, waitMs: 20, retryMs: 1 };

describe('InMemoryProductLock', () => {
  let lock: InMemoryProductLock;

  beforeEach(() => {
    lock = new InMemoryProductLock();
  });

  it('should run work for the same product one at a time', async () => {
    const events: string[] = [];
    const gate = deferred();

    const first = lock.withLock('p1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.withLock('p1', async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should let different products proceed in parallel', async () => {
    const gate = deferred();
    const events: string[] = [];

    const held = lock.withLock('p1', async () => {
      await gate.promise;
      events.push('p1');
    });
    await lock.withLock('p2', async () => {
      events.push('p2');
    });

    expect(events).toEqual(['p2']);
    gate.resolve();
    await held;
    expect(events).toEqual(['p2', 'p1']);
  });

  it('should release the lock when work fails', async () => {
    await expect(lock.withLock('p1', async () => {
      throw new Error('work failed');
    })).rejects.toThrow('work failed');

    await expect(lock.withLock('p1', async () => 'next')).resolves.toBe('next');
  });

  it('should forget products once nobody holds or waits for them', async () => {
    await Promise.all([
      lock.withLock('p1', async () => undefined),
      lock.withLock('p1', async () => undefined),
      lock.withLock('p2', async () => undefined),
    ]);
    expect(lock.activeCount()).toBe(0);
  });
});

describe('Redis product lock', () => {
  it('should fall back to the in-process lock without Redis', () => {
    expect(createProductLock(undefined, LOCK_OPTIONS)).toBeInstanceOf(InMemoryProductLock);
  });

  it('should take a lease, run the work and release with its token', async () => {
    const redis = createMockRedis(['OK']);
    const lock = createProductLock(redis as unknown as Redis, LOCK_OPTIONS);

    const result = await lock.withLock('p1', async () => 'done');

    expect(result).toBe('done');
    expect(redis.set).toHaveBeenCalledWith('reviews:lock:product:p1', expect.any(String), 'PX', 1000, 'NX');
    const [, token] = redis.set.mock.calls[0];
    expect(redis.eval).toHaveBeenCalledWith(expect.any(String), 1, 'reviews:lock:product:p1', token);
  });

  it('should retry until the lease frees up', async () => {
    const redis = createMockRedis([null, null, 'OK']);
    const lock = createProductLock(redis as unknown as Redis, { ...LOCK_OPTIONS, waitMs: 1000 });

    await expect(lock.withLock('p1', async () => 'done')).resolves.toBe('done');
    expect(redis.set).toHaveBeenCalledTimes(3);
  });

  it('should give up with a concurrency conflict after the wait timeout', async () => {
    const redis = createMockRedis([null]);
    const lock = createProductLock(redis as unknown as Redis, LOCK_OPTIONS);
    const work = jest.fn(async () => 'never');

    await expect(lock.withLock('p1', work)).rejects.toBeInstanceOf(ConcurrencyConflictError);
    expect(work).not.toHaveBeenCalled();
    expect(redis.eval).not.toHaveBeenCalled();
  });

  it('should report Redis failures while acquiring as persistence errors', async () => {
    const redis = createMockRedis([new Error('ECONNRESET')]);
    const lock = createProductLock(redis as unknown as Redis, LOCK_OPTIONS);

    await expect(lock.withLock('p1', async () => 'never')).rejects.toBeInstanceOf(PersistenceError);
  });

  it('should still release the lease when work throws', async () => {
    const redis = createMockRedis(['OK']);
    const lock = createProductLock(redis as unknown as Redis, LOCK_OPTIONS);

    await expect(lock.withLock('p1', async () => {
      throw new Error('work failed');
    })).rejects.toThrow('work failed');
    expect(redis.eval).toHaveBeenCalledTimes(1);
  });
});
