/**
 * Gatehouse - Rate Limit Gate Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { RateLimitGate } from '../../src/gatekeeper/rate-limit-gate.js';
import { RateLimiter } from '../../src/rate-limiter/limiter.js';
import type { RateLimiterConfig } from '../../src/rate-limiter/types.js';
import { FakeRedis, buildGateContext } from '../helpers/fakes.js';

const config: RateLimiterConfig = {
  enabled: true,
  failureMode: 'open',
  keyPrefix: 'rl:',
  default: { limit: 1, windowSeconds: 60 },
  routeClasses: [],
  commandTimeoutMs: 50,
};

describe('RateLimitGate', () => {
  let redis: FakeRedis;

  const gateWith = (overrides: Partial<RateLimiterConfig> = {}): RateLimitGate =>
    new RateLimitGate(new RateLimiter(redis, { ...config, ...overrides }, redis.now));

  beforeEach(() => {
    redis = new FakeRedis();
  });

  it('should pass with rate limit headers while under the limit', async () => {
    const decision = await gateWith().evaluate(buildGateContext());

    expect(decision).toEqual({
      outcome: 'pass',
      headers: {
        'X-RateLimit-Limit': '1',
        'X-RateLimit-Remaining': '0',
        'X-RateLimit-Reset': '1700000060',
      },
    });
  });

  it('should reject with 429 once the limit is spent', async () => {
    const gate = gateWith();
    await gate.evaluate(buildGateContext());
    redis.advance(15_000);

    const decision = await gate.evaluate(buildGateContext());

    expect(decision.outcome).toBe('reject');
    if (decision.outcome !== 'reject') return;
    expect(decision.rejection.statusCode).toBe(429);
    expect(decision.rejection.reason).toBe('rate_limited');
    expect(decision.rejection.body).toEqual({ error: 'rate_limited', retry_after: 45 });
    expect(decision.rejection.headers['Retry-After']).toBe('45');
  });

  it('should pass without headers when disabled', async () => {
    await expect(gateWith({ enabled: false }).evaluate(buildGateContext())).resolves.toEqual({
      outcome: 'pass',
    });
    expect(redis.evalCalls).toEqual([]);
  });

  it('should fail open when the store is down', async () => {
    redis.isConnected = false;

    await expect(gateWith().evaluate(buildGateContext())).resolves.toEqual({ outcome: 'pass' });
  });

  it('should reject with the window as retry hint when failing closed', async () => {
    redis.failWith = new Error('READONLY');
    const gate = gateWith({ failureMode: 'closed' });

    const decision = await gate.evaluate(buildGateContext());

    expect(gate.failureMode).toBe('closed');
    expect(decision).toEqual({
      outcome: 'reject',
      rejection: {
        gate: 'rate_limit',
        reason: 'unavailable',
        statusCode: 429,
        body: { error: 'rate_limited', retry_after: 60 },
        headers: { 'Retry-After': '60' },
        audit: { severity: 'ERROR', event: 'rate_limit_store_unavailable', includeBody: false },
      },
    });
  });

  it('should abandon when the client has gone', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(gateWith().evaluate(buildGateContext({ signal: controller.signal }))).resolves.toEqual({
      outcome: 'abandon',
    });
  });
});
