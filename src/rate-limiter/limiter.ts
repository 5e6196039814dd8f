/**
 * Gatehouse - Rate Limiter Service
 * Resolves the route class and key for a request, runs the fixed window
 * check against the shared counter store and applies the failure policy.
 */

import type { RedisClientWrapper } from '../storage/redis.js';
import { withTimeout } from '../utils/helpers.js';
import logger, { logRateLimit } from '../utils/logger.js';
import { createFixedWindowLimiter, type FixedWindowLimiter } from './algorithms/fixed-window.js';
import { buildRateLimitKey, resolveRouteClass } from './rules/matcher.js';
import type {
  RateLimitContext,
  RateLimitErrorBody,
  RateLimitHeaders,
  RateLimitOutcome,
  RateLimitResult,
  RateLimiterConfig,
} from './types.js';

// =============================================================================
// Rate Limiter Service Class
// =============================================================================

export class RateLimiter {
  private config: RateLimiterConfig;
  private redis: RedisClientWrapper;
  private fixedWindowLimiter: FixedWindowLimiter;

  constructor(redis: RedisClientWrapper, config: RateLimiterConfig, now?: () => number) {
    this.redis = redis;
    this.config = config;
    this.fixedWindowLimiter = createFixedWindowLimiter(redis, now);

    logger.info('Rate limiter initialized', {
      enabled: config.enabled,
      failureMode: config.failureMode,
      defaultLimit: config.default.limit,
      defaultWindowSeconds: config.default.windowSeconds,
      routeClasses: config.routeClasses.map((c) => c.name),
    });
  }

  public isEnabled(): boolean {
    return this.config.enabled;
  }

  public getFailureMode(): 'open' | 'closed' {
    return this.config.failureMode;
  }

  public getDefaultWindowSeconds(): number {
    return this.config.default.windowSeconds;
  }

  // ===========================================================================
  // Core Rate Limiting
  // ===========================================================================

  /**
   * Count the request and report the outcome. Never throws: store faults
   * (disconnected, timed out, malformed reply) come back as
   * `store-unavailable` and the caller applies the failure mode.
   */
  public async check(context: RateLimitContext): Promise<RateLimitOutcome> {
    if (!this.config.enabled) {
      return { kind: 'disabled' };
    }

    const routeClass = resolveRouteClass(context.path, this.config.routeClasses, this.config.default);
    const key = buildRateLimitKey(this.config.keyPrefix, context.clientIp, context.path);

    try {
      if (!this.redis.isConnected) {
        throw new Error('Counter store not connected');
      }

      const result = await withTimeout(
        this.fixedWindowLimiter.check({
          key,
          limit: routeClass.limit,
          windowSeconds: routeClass.windowSeconds,
        }),
        this.config.commandTimeoutMs,
        { label: 'Rate limit check', signal: context.signal }
      );

      logRateLimit({
        requestId: context.requestId,
        identifier: context.clientIp,
        endpoint: context.path,
        routeClass: routeClass.name,
        currentCount: result.currentCount,
        limit: result.limit,
        windowSeconds: routeClass.windowSeconds,
        blocked: !result.allowed,
      });

      return {
        kind: 'enforced',
        routeClass: routeClass.name,
        key,
        windowSeconds: routeClass.windowSeconds,
        result,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      logger.warn('Rate limiter degraded: counter store unavailable', {
        requestId: context.requestId,
        ip: context.clientIp,
        path: context.path,
        failureMode: this.config.failureMode,
        error: message,
      });

      return {
        kind: 'store-unavailable',
        routeClass: routeClass.name,
        windowSeconds: routeClass.windowSeconds,
        error: message,
      };
    }
  }

  // ===========================================================================
  // Response Helpers
  // ===========================================================================

  /**
   * Generate rate limit headers
   */
  public generateHeaders(result: RateLimitResult): RateLimitHeaders {
    const headers: RateLimitHeaders = {
      'X-RateLimit-Limit': result.limit.toString(),
      'X-RateLimit-Remaining': result.remaining.toString(),
      'X-RateLimit-Reset': result.resetAt.toString(),
    };

    if (!result.allowed) {
      headers['Retry-After'] = result.retryAfter.toString();
    }

    return headers;
  }

  /**
   * Generate error response body for 429 responses
   */
  public generateErrorBody(retryAfter: number): RateLimitErrorBody {
    return {
      error: 'rate_limited',
      retry_after: retryAfter,
    };
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createRateLimiter(
  redis: RedisClientWrapper,
  config: RateLimiterConfig,
  now?: () => number
): RateLimiter {
  return new RateLimiter(redis, config, now);
}

export default RateLimiter;
