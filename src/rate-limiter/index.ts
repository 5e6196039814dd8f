/**
 * Gatehouse - Rate Limiter Module
 * Distributed fixed window rate limiting backed by one atomic Redis script
 */

export { RateLimiter, createRateLimiter } from './limiter.js';

export { FixedWindowLimiter, createFixedWindowLimiter, parseFixedWindowReply } from './algorithms/index.js';

export { matchGlob, resolveRouteClass, buildRateLimitKey, DEFAULT_ROUTE_CLASS } from './rules/matcher.js';

export { FIXED_WINDOW_SCRIPT } from './scripts.js';

export type {
  RateLimitResult,
  RateLimitRequest,
  FixedWindowScriptResult,
  RouteClass,
  RateLimiterConfig,
  RateLimitContext,
  RateLimitOutcome,
  RateLimitHeaders,
  RateLimitErrorBody,
  RateLimiterInterface,
} from './types.js';
