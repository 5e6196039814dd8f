/**
 * Gatehouse - Fixed Window Rate Limiter
 * Redis-based distributed fixed window algorithm implementation
 *
 * Each key holds a counter whose TTL is the window. The window starts at the
 * first request for the key, not on a wall-clock boundary.
 */

import type { RedisClientWrapper } from '../../storage/redis.js';
import { FIXED_WINDOW_SCRIPT } from '../scripts.js';
import type {
  FixedWindowScriptResult,
  RateLimitRequest,
  RateLimitResult,
  RateLimiterInterface,
} from '../types.js';

// =============================================================================
// Script Reply Parsing
// =============================================================================

function toInteger(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

/**
 * Validate the script reply shape. Anything else is a store fault.
 */
export function parseFixedWindowReply(reply: unknown): FixedWindowScriptResult {
  if (!Array.isArray(reply) || reply.length !== 3) {
    throw new Error('Unexpected fixed window script reply');
  }

  const allowed = toInteger(reply[0]);
  const currentCount = toInteger(reply[1]);
  const ttl = toInteger(reply[2]);

  if (allowed === null || currentCount === null || ttl === null) {
    throw new Error('Unexpected fixed window script reply');
  }

  return [allowed, currentCount, ttl];
}

// =============================================================================
// Fixed Window Limiter Class
// =============================================================================

/**
 * Fixed Window Rate Limiter
 *
 * One atomic script per request: increment, set the expiry on the first
 * increment, read the TTL, compare with the limit. Store errors propagate;
 * the caller owns the failure policy.
 */
export class FixedWindowLimiter implements RateLimiterInterface {
  private redis: RedisClientWrapper;
  private now: () => number;

  constructor(redis: RedisClientWrapper, now: () => number = Date.now) {
    this.redis = redis;
    this.now = now;
  }

  /**
   * Get the algorithm name
   */
  public getAlgorithm(): 'fixed-window' {
    return 'fixed-window';
  }

  /**
   * Count this request and decide whether it is within the limit
   */
  public async check(request: RateLimitRequest): Promise<RateLimitResult> {
    const { key, limit, windowSeconds } = request;

    const reply = await this.redis.eval(
      FIXED_WINDOW_SCRIPT,
      [key],
      [windowSeconds.toString(), limit.toString()]
    );

    const [allowed, currentCount, ttl] = parseFixedWindowReply(reply);
    const nowSeconds = Math.floor(this.now() / 1000);

    return {
      allowed: allowed === 1,
      currentCount,
      remaining: Math.max(0, limit - currentCount),
      limit,
      ttl,
      resetAt: nowSeconds + ttl,
      retryAfter: allowed === 1 ? 0 : ttl,
    };
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createFixedWindowLimiter(
  redis: RedisClientWrapper,
  now?: () => number
): FixedWindowLimiter {
  return new FixedWindowLimiter(redis, now);
}

export default FixedWindowLimiter;
