import { z } from 'zod';
import logger from '../../utils/logger';
import { CacheStore } from './cache/CacheStore';

export interface CacheStats {
  hitRate: number;
  totalHits: number;
  totalMisses: number;
  sets: number;
  invalid: number;
}

export interface CacheConfig {
  ttl: {
    current: number;
    historical: number;
    price: number;
  };
}

export type CacheSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * JSON memoization over a pluggable store. Reads are validated against a zod
 * schema, so a corrupt or outdated entry is treated as a miss.
 */
export class CacheService {
  private stats = {
    hits: 0,
    misses: 0,
    sets: 0,
    invalid: 0
  };

  constructor(private readonly store: CacheStore, readonly config: CacheConfig) {}

  async get<T>(key: string, schema: CacheSchema<T>): Promise<T | null> {
    const raw = await this.store.get(key);
    if (raw === null) {
      this.stats.misses++;
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      return this.discardInvalid(key, error);
    }

    // Entries written by an older shape are dropped, not returned
    const parsed = schema.safeParse(decoded);
    if (!parsed.success) {
      return this.discardInvalid(key, parsed.error);
    }

    this.stats.hits++;
    return parsed.data;
  }

  async set<T>(key: string, data: T, ttlSeconds: number): Promise<void> {
    await this.store.set(key, JSON.stringify(data), ttlSeconds);
    this.stats.sets++;
  }

  async delete(key: string): Promise<boolean> {
    return this.store.delete(key);
  }

  async getOrSet<T>(
    key: string,
    schema: CacheSchema<T>,
    ttlSeconds: number,
    compute: () => Promise<T>
  ): Promise<T> {
    const cached = await this.get(key, schema);
    if (cached !== null) {
      return cached;
    }

    const value = await compute();
    await this.set(key, value, ttlSeconds);
    return value;
  }

  getStats(): CacheStats {
    const totalRequests = this.stats.hits + this.stats.misses;
    const hitRate = totalRequests > 0 ? (this.stats.hits / totalRequests) * 100 : 0;

    return {
      hitRate: Math.round(hitRate * 100) / 100,
      totalHits: this.stats.hits,
      totalMisses: this.stats.misses,
      sets: this.stats.sets,
      invalid: this.stats.invalid
    };
  }

  async shutdown(): Promise<void> {
    await this.store.close();
    logger.info('CacheService shutdown complete');
  }

  private async discardInvalid(key: string, reason: unknown): Promise<null> {
    logger.warn(`Discarding unreadable cache entry ${key}:`, reason);
    this.stats.invalid++;
    this.stats.misses++;
    await this.store.delete(key);
    return null;
  }
}
