import { describe, beforeEach, it, expect } from '@jest/globals';
import { z } from 'zod';
import { CacheService } from '../CacheService';
import { MemoryCacheStore } from '../cache/MemoryCacheStore';
import { RedisCacheStore, RedisClientLike } from '../cache/RedisCacheStore';
import { aggregatedVolumeSchema } from '../schemas';
import { ManualClock } from './helpers';

class FakeRedis implements RedisClientLike {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  quitCalls = 0;

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, _mode: 'PX', milliseconds: number): Promise<unknown> {
    this.values.set(key, value);
    this.ttls.set(key, milliseconds);
    return 'OK';
  }

  async del(key: string): Promise<number> {
    return this.values.delete(key) ? 1 : 0;
  }

  async quit(): Promise<unknown> {
    this.quitCalls++;
    return 'OK';
  }
}

const counterSchema = z.object({ count: z.number() });

describe('MemoryCacheStore', () => {
  let time: ManualClock;
  let store: MemoryCacheStore;

  beforeEach(() => {
    time = new ManualClock(0);
    store = new MemoryCacheStore({ maxSize: 2, clock: time.clock });
  });

  it('should expire entries once their TTL has elapsed', async () => {
    await store.set('a', '1', 10);

    time.advance(9_999);
    expect(await store.get('a')).toBe('1');

    time.advance(1);
    expect(await store.get('a')).toBeNull();
    expect(store.size).toBe(0);
  });

  it('should evict the least recently used key when full', async () => {
    await store.set('a', '1', 60);
    await store.set('b', '2', 60);
    await store.get('a');
    await store.set('c', '3', 60);

    expect(await store.get('b')).toBeNull();
    expect(await store.get('a')).toBe('1');
    expect(await store.get('c')).toBe('3');
    expect(store.evictionCount).toBe(1);
  });

  it('should overwrite an existing key without evicting', async () => {
    await store.set('a', '1', 60);
    await store.set('b', '2', 60);
    await store.set('a', '3', 60);

    expect(store.evictionCount).toBe(0);
    expect(await store.get('a')).toBe('3');
  });
});

describe('CacheService', () => {
  let time: ManualClock;
  let store: MemoryCacheStore;
  let cache: CacheService;

  beforeEach(() => {
    time = new ManualClock(0);
    store = new MemoryCacheStore({ maxSize: 100, clock: time.clock });
    cache = new CacheService(store, { ttl: { current: 300, historical: 3600, price: 300 } });
  });

  it('should round-trip values through JSON', async () => {
    await cache.set('counter', { count: 3 }, 60);

    expect(await cache.get('counter', counterSchema)).toEqual({ count: 3 });
    expect(cache.getStats()).toEqual({ hitRate: 100, totalHits: 1, totalMisses: 0, sets: 1, invalid: 0 });
  });

  it('should revive dates through the aggregate schema', async () => {
    const lastUpdated = new Date('2024-01-01T00:00:00.000Z');
    await cache.set('agg', { totalVolume24hUsd: 300, lastUpdated, platforms: [] }, 60);

    const cached = await cache.get('agg', aggregatedVolumeSchema);

    expect(cached?.lastUpdated).toEqual(lastUpdated);
  });

  it('should discard entries that no longer match the schema', async () => {
    await store.set('counter', JSON.stringify({ count: 'three' }), 60);

    expect(await cache.get('counter', counterSchema)).toBeNull();
    expect(await store.get('counter')).toBeNull();
    expect(cache.getStats().invalid).toBe(1);
  });

  it('should discard entries that are not JSON', async () => {
    await store.set('counter', '{broken', 60);

    expect(await cache.get('counter', counterSchema)).toBeNull();
    expect(cache.getStats()).toEqual({ hitRate: 0, totalHits: 0, totalMisses: 1, sets: 0, invalid: 1 });
  });

  it('should compute once and then serve from cache', async () => {
    let computed = 0;
    const compute = async () => {
      computed++;
      return { count: computed };
    };

    expect(await cache.getOrSet('counter', counterSchema, 60, compute)).toEqual({ count: 1 });
    expect(await cache.getOrSet('counter', counterSchema, 60, compute)).toEqual({ count: 1 });
    expect(computed).toBe(1);

    time.advance(60_000);
    expect(await cache.getOrSet('counter', counterSchema, 60, compute)).toEqual({ count: 2 });
  });

  it('should not cache a failed computation', async () => {
    await expect(
      cache.getOrSet('counter', counterSchema, 60, async () => {
        throw new Error('upstream down');
      })
    ).rejects.toThrow('upstream down');

    expect(store.size).toBe(0);
  });
});

describe('RedisCacheStore', () => {
  it('should prefix keys and store TTLs in milliseconds', async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore(redis);

    await store.set('price:usd:BTC', '{"price":1}', 300);

    expect(redis.values.get('volume:price:usd:BTC')).toBe('{"price":1}');
    expect(redis.ttls.get('volume:price:usd:BTC')).toBe(300_000);
    expect(await store.get('price:usd:BTC')).toBe('{"price":1}');
  });

  it('should report whether a delete removed anything', async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore(redis);
    await store.set('a', '1', 1);

    expect(await store.delete('a')).toBe(true);
    expect(await store.delete('a')).toBe(false);
  });

  it('should quit the client on close', async () => {
    const redis = new FakeRedis();
    const cache = new CacheService(new RedisCacheStore(redis), { ttl: { current: 1, historical: 1, price: 1 } });

    await cache.shutdown();

    expect(redis.quitCalls).toBe(1);
  });
});
