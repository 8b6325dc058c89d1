import { Clock } from '../types';
import { CacheStore } from './CacheStore';

interface CacheEntry {
  value: string;
  expiresAt: number;
  createdAt: number;
}

export interface MemoryCacheStoreOptions {
  maxSize: number;
  clock?: Clock;
}

/**
 * Process-local store. Expired entries are dropped on the next read; when
 * full, the least recently used key makes room.
 */
export class MemoryCacheStore implements CacheStore {
  private cache: Map<string, CacheEntry> = new Map();
  private readonly maxSize: number;
  private readonly clock: Clock;
  private evictions = 0;

  constructor(options: MemoryCacheStoreOptions) {
    this.maxSize = options.maxSize;
    this.clock = options.clock ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.cache.get(key);
    if (!entry) {
      return null;
    }

    if (this.clock() >= entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    // Re-insert to mark as most recently used
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = this.clock();

    if (this.cache.size >= this.maxSize && !this.cache.has(key)) {
      this.evictLeastRecentlyUsed();
    }

    this.cache.delete(key);
    this.cache.set(key, {
      value,
      expiresAt: now + ttlSeconds * 1000,
      createdAt: now
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.cache.delete(key);
  }

  async close(): Promise<void> {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  get evictionCount(): number {
    return this.evictions;
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.cache.keys().next();
    if (!oldest.done) {
      this.cache.delete(oldest.value);
      this.evictions++;
    }
  }
}
