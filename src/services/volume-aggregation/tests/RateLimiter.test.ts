import { describe, beforeEach, it, expect } from '@jest/globals';
import { RateLimiter } from '../RateLimiter';
import { ManualClock } from './helpers';

describe('RateLimiter', () => {
  let time: ManualClock;
  let sleeps: number[];
  let limiter: RateLimiter;

  beforeEach(() => {
    time = new ManualClock(1_000_000);
    sleeps = [];
    limiter = new RateLimiter({
      clock: time.clock,
      sleep: async ms => {
        sleeps.push(ms);
        time.advance(ms);
      }
    });
  });

  it('should let a full burst through without waiting', async () => {
    limiter.addLimit('bybit', 5);

    for (let i = 0; i < 5; i++) {
      await limiter.waitForToken('bybit');
    }

    expect(sleeps).toEqual([]);
    expect(limiter.getRemainingTokens('bybit')).toBe(0);
  });

  it('should wait for a refill once the bucket is empty', async () => {
    limiter.addLimit('bybit', 5);

    for (let i = 0; i < 6; i++) {
      await limiter.waitForToken('bybit');
    }

    expect(sleeps).toEqual([200]);
    expect(limiter.getStats()).toEqual({ bybit: { requests: 6, blocked: 1 } });
  });

  it('should refill from elapsed time', async () => {
    limiter.addLimit('woox', 2);
    await limiter.waitForToken('woox');
    await limiter.waitForToken('woox');

    time.advance(500);

    expect(limiter.getRemainingTokens('woox')).toBe(1);
  });

  it('should pass services without a configured limit', async () => {
    await limiter.waitForToken('unknown');

    expect(sleeps).toEqual([]);
    expect(limiter.getRemainingTokens('unknown')).toBe(0);
  });

  it('should hold a blocked service until the block passes', async () => {
    limiter.addLimit('paradex', 10);
    limiter.blockService('paradex', 3000);

    expect(limiter.getStatus()).toEqual([
      { service: 'paradex', remaining: 10, resetTime: new Date(1_000_000), isBlocked: true }
    ]);

    await limiter.waitForToken('paradex');

    expect(sleeps).toEqual([3000]);
    expect(limiter.getStatus()[0].isBlocked).toBe(false);
  });

  it('should reject non-positive rates', () => {
    expect(() => limiter.addLimit('bybit', 0)).toThrow('Rate limit for bybit must be positive, got 0');
  });
});
