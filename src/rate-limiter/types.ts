/**
 * Gatehouse - Rate Limiter Type Definitions
 */

// =============================================================================
// Core Rate Limiting Types
// =============================================================================

/**
 * Result of a rate limit check
 */
export interface RateLimitResult {
  /** Whether the request is allowed */
  allowed: boolean;
  /** Counter value after this request's increment */
  currentCount: number;
  /** Number of remaining requests in the current window */
  remaining: number;
  /** Maximum requests allowed in the window */
  limit: number;
  /** Seconds left in the current window */
  ttl: number;
  /** When the rate limit resets (Unix timestamp in seconds) */
  resetAt: number;
  /** Seconds the caller should wait; 0 when allowed */
  retryAfter: number;
}

/**
 * Rate limit check request
 */
export interface RateLimitRequest {
  /** Counter key, without the store's own prefix */
  key: string;
  /** Maximum requests allowed */
  limit: number;
  /** Time window in seconds */
  windowSeconds: number;
}

/**
 * Raw reply of the fixed window script: [allowed, currentCount, ttl]
 */
export type FixedWindowScriptResult = [allowed: number, currentCount: number, ttl: number];

// =============================================================================
// Route Classes
// =============================================================================

export interface RouteClass {
  name: string;
  paths: readonly string[];
  limit: number;
  windowSeconds: number;
}

export interface RateLimiterConfig {
  enabled: boolean;
  failureMode: 'open' | 'closed';
  keyPrefix: string;
  default: { limit: number; windowSeconds: number };
  routeClasses: readonly RouteClass[];
  /** Upper bound on a single counter round trip */
  commandTimeoutMs: number;
}

// =============================================================================
// Check Context & Outcome
// =============================================================================

export interface RateLimitContext {
  requestId: string;
  clientIp: string;
  path: string;
  signal?: AbortSignal;
}

export type RateLimitOutcome =
  | {
      kind: 'enforced';
      routeClass: string;
      key: string;
      windowSeconds: number;
      result: RateLimitResult;
    }
  | { kind: 'disabled' }
  | {
      kind: 'store-unavailable';
      routeClass: string;
      windowSeconds: number;
      error: string;
    };

// =============================================================================
// Response Types
// =============================================================================

export interface RateLimitHeaders {
  'X-RateLimit-Limit': string;
  'X-RateLimit-Remaining': string;
  'X-RateLimit-Reset': string;
  'Retry-After'?: string;
}

export interface RateLimitErrorBody {
  error: 'rate_limited';
  retry_after: number;
}

// =============================================================================
// Limiter Interface
// =============================================================================

export interface RateLimiterInterface {
  check(request: RateLimitRequest): Promise<RateLimitResult>;
}
