import Redis from 'ioredis';
import logger from '../../../utils/logger';
import { CacheStore } from './CacheStore';

/** The slice of the ioredis client this store talks to. */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', milliseconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

export class RedisCacheStore implements CacheStore {
  constructor(private readonly client: RedisClientLike, private readonly keyPrefix = 'volume:') {}

  static fromUrl(url: string): RedisCacheStore {
    const redis = new Redis(url, { maxRetriesPerRequest: 3, lazyConnect: false });
    redis.on('error', (error: Error) => {
      logger.error('Redis connection error:', error);
    });
    return new RedisCacheStore(redis);
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(this.keyPrefix + key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(this.keyPrefix + key, value, 'PX', Math.max(1, Math.round(ttlSeconds * 1000)));
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.client.del(this.keyPrefix + key);
    return removed > 0;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
