/**
 * Gatehouse - Fixed Window Rate Limiter Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { FixedWindowLimiter, parseFixedWindowReply } from '../../src/rate-limiter/algorithms/fixed-window.js';
import { FIXED_WINDOW_SCRIPT } from '../../src/rate-limiter/scripts.js';
import type { RateLimitResult } from '../../src/rate-limiter/types.js';
import { FakeRedis } from '../helpers/fakes.js';

const NOW_SECONDS = 1_700_000_000;

describe('FixedWindowLimiter', () => {
  let redis: FakeRedis;
  let limiter: FixedWindowLimiter;

  beforeEach(() => {
    redis = new FakeRedis();
    limiter = new FixedWindowLimiter(redis, redis.now);
  });

  it('should run the fixed window script with window then limit', async () => {
    await limiter.check({ key: 'k', limit: 3, windowSeconds: 60 });

    expect(redis.evalCalls).toEqual([{ keys: ['k'], args: ['60', '3'] }]);
  });

  it('should report the k-th request as currentCount k', async () => {
    const results: RateLimitResult[] = [];
    for (let i = 0; i < 3; i++) {
      results.push(await limiter.check({ key: 'k', limit: 3, windowSeconds: 60 }));
    }

    expect(results.map((r) => r.currentCount)).toEqual([1, 2, 3]);
    expect(results.map((r) => r.remaining)).toEqual([2, 1, 0]);
    expect(results.every((r) => r.allowed)).toBe(true);
  });

  it('should describe an allowed request', async () => {
    const result = await limiter.check({ key: 'k', limit: 3, windowSeconds: 60 });

    expect(result).toEqual({
      allowed: true,
      currentCount: 1,
      remaining: 2,
      limit: 3,
      ttl: 60,
      resetAt: NOW_SECONDS + 60,
      retryAfter: 0,
    });
  });

  it('should deny the (limit+1)-th request with retryAfter equal to the ttl', async () => {
    await limiter.check({ key: 'k', limit: 2, windowSeconds: 60 });
    await limiter.check({ key: 'k', limit: 2, windowSeconds: 60 });
    redis.advance(15_000);

    const result = await limiter.check({ key: 'k', limit: 2, windowSeconds: 60 });

    expect(result.allowed).toBe(false);
    expect(result.currentCount).toBe(3);
    expect(result.remaining).toBe(0);
    expect(result.ttl).toBe(45);
    expect(result.retryAfter).toBe(45);
  });

  it('should never extend the window on later requests', async () => {
    await limiter.check({ key: 'k', limit: 10, windowSeconds: 60 });
    redis.advance(20_000);
    const second = await limiter.check({ key: 'k', limit: 10, windowSeconds: 60 });
    redis.advance(20_000);
    const third = await limiter.check({ key: 'k', limit: 10, windowSeconds: 60 });

    expect(second.ttl).toBe(40);
    expect(third.ttl).toBe(20);
  });

  it('should start a fresh window after expiry', async () => {
    await limiter.check({ key: 'k', limit: 1, windowSeconds: 60 });
    await limiter.check({ key: 'k', limit: 1, windowSeconds: 60 });
    redis.advance(60_000);

    const result = await limiter.check({ key: 'k', limit: 1, windowSeconds: 60 });

    expect(result.allowed).toBe(true);
    expect(result.currentCount).toBe(1);
    expect(result.ttl).toBe(60);
  });

  it('should give a counter without expiry a fresh window', async () => {
    redis.seedWithoutExpiry('k', 4);

    const result = await limiter.check({ key: 'k', limit: 10, windowSeconds: 30 });

    expect(result.currentCount).toBe(5);
    expect(result.ttl).toBe(30);
    expect(redis.ttl('k')).toBe(30);
  });

  it('should keep separate counters per key', async () => {
    await limiter.check({ key: 'a', limit: 1, windowSeconds: 60 });
    const other = await limiter.check({ key: 'b', limit: 1, windowSeconds: 60 });

    expect(other.allowed).toBe(true);
    expect(other.currentCount).toBe(1);
  });

  it('should propagate store errors', async () => {
    redis.failWith = new Error('connection refused');

    await expect(limiter.check({ key: 'k', limit: 1, windowSeconds: 60 })).rejects.toThrow(
      'connection refused'
    );
  });
});

describe('parseFixedWindowReply', () => {
  it('should accept integer replies as numbers or strings', () => {
    expect(parseFixedWindowReply([1, 2, 3])).toEqual([1, 2, 3]);
    expect(parseFixedWindowReply(['0', '7', '59'])).toEqual([0, 7, 59]);
  });

  it('should reject malformed replies', () => {
    expect(() => parseFixedWindowReply('OK')).toThrow('Unexpected fixed window script reply');
    expect(() => parseFixedWindowReply([1, 2])).toThrow('Unexpected fixed window script reply');
    expect(() => parseFixedWindowReply([1, 'two', 3])).toThrow('Unexpected fixed window script reply');
  });
});

describe('FIXED_WINDOW_SCRIPT', () => {
  it('should set the expiry only on the first increment', () => {
    expect(FIXED_WINDOW_SCRIPT).toContain("redis.call('INCR', counter_key)");
    expect(FIXED_WINDOW_SCRIPT).toContain('if current == 1 then');
  });
});
