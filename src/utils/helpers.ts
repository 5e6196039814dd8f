/**
 * Gatehouse - Utility Helper Functions
 * Common utility functions used throughout the gateway
 */

import { v4 as uuidv4 } from 'uuid';
import logger from './logger.js';
import { ConfigurationError, RequestAbortedError, TimeoutError, type HeaderMap, type HeaderValue } from './types.js';

/**
 * Generate a unique request ID
 */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Bound a pending operation by a deadline and, optionally, an abort signal.
 *
 * The underlying operation is not cancelled; its late result or error is
 * dropped (and logged at debug level) once the race is lost.
 */
export function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  options: { label: string; signal?: AbortSignal }
): Promise<T> {
  const { label, signal } = options;

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const onAbort = (): void => {
      settle(() => reject(new RequestAbortedError(`${label} abandoned: client closed the connection`)));
    };

    const settle = (action: () => void): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer) {
        clearTimeout(timer);
      }
      signal?.removeEventListener('abort', onAbort);
      action();
    };

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
      timer = setTimeout(() => {
        settle(() => reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs)));
      }, timeoutMs);
    }

    operation.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => {
        if (settled) {
          logger.debug('Abandoned operation failed after its deadline', {
            label,
            error: error instanceof Error ? error.message : String(error),
          });
          return;
        }
        settle(() => reject(error));
      }
    );
  });
}

/**
 * Collapse a raw header value into one string (duplicates comma-joined)
 */
export function headerValue(value: HeaderValue): string | undefined {
  if (Array.isArray(value)) {
    return value.length > 0 ? value.join(',') : undefined;
  }
  return value;
}

/**
 * Strip the IPv4-mapped IPv6 prefix Node reports for IPv4 sockets
 */
export function normalizeIp(address: string): string {
  const trimmed = address.trim();
  return trimmed.startsWith('::ffff:') && trimmed.includes('.') ? trimmed.slice(7) : trimmed;
}

/**
 * Resolve the caller's address.
 *
 * Priority: X-Forwarded-For, then X-Real-IP, then the socket address.
 * Without trusted proxies the first forwarded hop is the client; with them
 * the chain is walked right to left and the first untrusted hop wins.
 */
export function resolveClientIp(
  headers: HeaderMap,
  remoteAddress: string | undefined,
  trustedProxies: readonly string[] = []
): string {
  const forwardedFor = headerValue(headers['x-forwarded-for']);
  if (forwardedFor) {
    const hops = forwardedFor
      .split(',')
      .map((hop) => hop.trim())
      .filter((hop) => hop.length > 0);

    if (trustedProxies.length === 0) {
      const first = hops[0];
      if (first) {
        return normalizeIp(first);
      }
    } else {
      for (let i = hops.length - 1; i >= 0; i--) {
        const hop = hops[i];
        if (hop !== undefined && !trustedProxies.includes(hop)) {
          return normalizeIp(hop);
        }
      }
    }
  }

  const realIp = headerValue(headers['x-real-ip'])?.trim();
  if (realIp) {
    return normalizeIp(realIp);
  }

  if (remoteAddress) {
    return normalizeIp(remoteAddress);
  }

  return 'unknown';
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Check if running in production environment
 */
export function isProduction(): boolean {
  return process.env['NODE_ENV'] === 'production';
}

// =============================================================================
// Environment Readers
// Absent variables yield undefined; malformed ones are configuration errors.
// =============================================================================

export function getEnvString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

export function getEnvInt(key: string): number | undefined {
  const value = getEnvString(key);
  if (value === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`Environment variable ${key} must be an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

export function getEnvBool(key: string): boolean | undefined {
  const value = getEnvString(key);
  if (value === undefined) {
    return undefined;
  }
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`Environment variable ${key} must be true/false or 1/0, got "${value}"`);
  }
}

export function getEnvList(key: string): string[] | undefined {
  const value = getEnvString(key);
  return value === undefined ? undefined : parseList(value);
}
