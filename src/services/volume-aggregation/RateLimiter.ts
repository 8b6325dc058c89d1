import logger from '../../utils/logger';
import { Clock, Sleep } from './types';

export interface RateLimitStatus {
  service: string;
  remaining: number;
  resetTime: Date;
  isBlocked: boolean;
}

interface TokenBucket {
  tokens: number;
  maxTokens: number;
  refillRate: number; // tokens per second
  lastRefill: number;
}

export const defaultSleep: Sleep = (ms: number) =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Token bucket per upstream. Buckets refill lazily on access, so the limiter
 * holds no timers and never keeps the process alive.
 */
export class RateLimiter {
  private buckets: Map<string, TokenBucket> = new Map();
  private blocked: Map<string, number> = new Map(); // service -> unblock timestamp
  private stats: Map<string, { requests: number; blocked: number }> = new Map();
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  constructor(options: { clock?: Clock; sleep?: Sleep } = {}) {
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  addLimit(service: string, requestsPerSecond: number, burst?: number): void {
    if (!(requestsPerSecond > 0)) {
      throw new Error(`Rate limit for ${service} must be positive, got ${requestsPerSecond}`);
    }
    const maxTokens = burst ?? Math.max(1, Math.floor(requestsPerSecond));

    this.buckets.set(service, {
      tokens: maxTokens,
      maxTokens,
      refillRate: requestsPerSecond,
      lastRefill: this.clock()
    });
    this.stats.set(service, { requests: 0, blocked: 0 });

    logger.debug(`Rate limiter configured for ${service}: ${requestsPerSecond} req/s, burst: ${maxTokens}`);
  }

  async waitForToken(service: string): Promise<void> {
    const bucket = this.buckets.get(service);
    if (!bucket) {
      return;
    }

    const blockUntil = this.blocked.get(service);
    if (blockUntil !== undefined) {
      const waitTime = blockUntil - this.clock();
      if (waitTime > 0) {
        logger.debug(`Service ${service} is blocked, waiting ${waitTime}ms`);
        await this.sleep(waitTime);
      }
      this.blocked.delete(service);
    }

    this.refill(bucket);
    while (bucket.tokens < 1) {
      const waitTimeMs = Math.ceil(((1 - bucket.tokens) / bucket.refillRate) * 1000);
      logger.debug(`Rate limit reached for ${service}, waiting ${waitTimeMs}ms`);
      this.incrementStats(service, 'blocked');
      await this.sleep(waitTimeMs);
      this.refill(bucket);
    }

    bucket.tokens -= 1;
    this.incrementStats(service, 'requests');
  }

  getRemainingTokens(service: string): number {
    const bucket = this.buckets.get(service);
    if (!bucket) {
      return 0;
    }
    this.refill(bucket);
    return Math.floor(bucket.tokens);
  }

  /** Holds every request for the service until the window passes, e.g. after a 429. */
  blockService(service: string, durationMs: number): void {
    this.blocked.set(service, this.clock() + durationMs);
    logger.warn(`Service ${service} blocked for ${durationMs}ms due to rate limit violation`);
  }

  getStatus(): RateLimitStatus[] {
    const now = this.clock();
    return Array.from(this.buckets.entries()).map(([service, bucket]) => {
      this.refill(bucket);
      const blockUntil = this.blocked.get(service);
      const timeToFill = ((bucket.maxTokens - bucket.tokens) / bucket.refillRate) * 1000;
      return {
        service,
        remaining: Math.floor(bucket.tokens),
        resetTime: new Date(now + timeToFill),
        isBlocked: blockUntil !== undefined && now < blockUntil
      };
    });
  }

  getStats(): Record<string, { requests: number; blocked: number }> {
    return Object.fromEntries(this.stats.entries());
  }

  private refill(bucket: TokenBucket): void {
    const now = this.clock();
    const elapsedSeconds = (now - bucket.lastRefill) / 1000;
    if (elapsedSeconds > 0) {
      bucket.tokens = Math.min(bucket.maxTokens, bucket.tokens + elapsedSeconds * bucket.refillRate);
      bucket.lastRefill = now;
    }
  }

  private incrementStats(service: string, type: 'requests' | 'blocked'): void {
    const stats = this.stats.get(service);
    if (stats) {
      stats[type]++;
    }
  }
}
