/**
 * Gatehouse - Route Class Matcher
 * Maps request paths onto configured rate limit classes
 */

import type { RouteClass } from '../types.js';

export const DEFAULT_ROUTE_CLASS = 'default';

// =============================================================================
// Glob Pattern Matching
// =============================================================================

const globCache = new Map<string, RegExp>();

/**
 * Convert glob pattern to regex
 * Supports:
 * - * matches any single path segment
 * - ** matches any path (including nested)
 * - ? matches single character
 */
function globToRegex(pattern: string): RegExp {
  const cached = globCache.get(pattern);
  if (cached) {
    return cached;
  }

  const regex = pattern
    // Escape special regex characters (except * and ?)
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    // ** matches any path including slashes
    .replace(/\*\*/g, '{{DOUBLE_STAR}}')
    // * matches any characters except /
    .replace(/\*/g, '[^/]*')
    // Restore ** as .*
    .replace(/{{DOUBLE_STAR}}/g, '.*')
    // ? matches single character
    .replace(/\?/g, '.');

  const compiled = new RegExp(`^${regex}$`);
  globCache.set(pattern, compiled);
  return compiled;
}

/**
 * Match a path against a glob pattern
 */
export function matchGlob(pattern: string, path: string): boolean {
  return globToRegex(pattern).test(path);
}

// =============================================================================
// Route Class Resolution
// =============================================================================

/**
 * First class (in configuration order) with a matching pattern wins;
 * otherwise the default limit and window apply.
 */
export function resolveRouteClass(
  path: string,
  routeClasses: readonly RouteClass[],
  fallback: { limit: number; windowSeconds: number }
): RouteClass {
  for (const routeClass of routeClasses) {
    if (routeClass.paths.some((pattern) => matchGlob(pattern, path))) {
      return routeClass;
    }
  }

  return {
    name: DEFAULT_ROUTE_CLASS,
    paths: [],
    limit: fallback.limit,
    windowSeconds: fallback.windowSeconds,
  };
}

// =============================================================================
// Key Generation
// =============================================================================

/**
 * Counter key for (caller, route). The address is base64-encoded so IPv6
 * colons never collide with the key's own separators.
 */
export function buildRateLimitKey(keyPrefix: string, clientIp: string, path: string): string {
  const identity = Buffer.from(clientIp, 'utf8').toString('base64');
  return `${keyPrefix}ip:${identity}:p:${path}`;
}
