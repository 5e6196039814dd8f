/**
 * Gatehouse - Rate Limit Gate
 * Edge limiter: counts every request before any other check runs
 */

import type { RateLimiter } from '../rate-limiter/limiter.js';
import type { RateLimitHeaders } from '../rate-limiter/types.js';
import type { FailureMode, Gate, GateContext, GateDecision, Rejection } from './types.js';
import { abandon, pass, reject } from './types.js';

function toHeaderRecord(headers: RateLimitHeaders): Record<string, string> {
  const record: Record<string, string> = {
    'X-RateLimit-Limit': headers['X-RateLimit-Limit'],
    'X-RateLimit-Remaining': headers['X-RateLimit-Remaining'],
    'X-RateLimit-Reset': headers['X-RateLimit-Reset'],
  };
  if (headers['Retry-After'] !== undefined) {
    record['Retry-After'] = headers['Retry-After'];
  }
  return record;
}

export class RateLimitGate implements Gate {
  public readonly name = 'rate_limit';
  public readonly completes = 'EDGE_LIMITED';

  private limiter: RateLimiter;

  constructor(limiter: RateLimiter) {
    this.limiter = limiter;
  }

  public get failureMode(): FailureMode {
    return this.limiter.getFailureMode();
  }

  public async evaluate(context: GateContext): Promise<GateDecision> {
    const outcome = await this.limiter.check({
      requestId: context.requestId,
      clientIp: context.clientIp,
      path: context.path,
      signal: context.signal,
    });

    switch (outcome.kind) {
      case 'disabled':
        return pass();

      case 'enforced': {
        const headers = toHeaderRecord(this.limiter.generateHeaders(outcome.result));
        if (outcome.result.allowed) {
          return pass(headers);
        }
        return reject({
          gate: this.name,
          reason: 'rate_limited',
          statusCode: 429,
          body: this.limiter.generateErrorBody(outcome.result.retryAfter),
          headers,
          audit: { severity: 'WARNING', event: 'rate_limited', includeBody: false },
        });
      }

      case 'store-unavailable':
        if (context.signal.aborted) {
          return abandon();
        }
        return this.failureMode === 'open'
          ? pass()
          : reject(this.storeUnavailable(outcome.windowSeconds));
    }
  }

  public unavailable(): Rejection {
    return this.storeUnavailable(this.limiter.getDefaultWindowSeconds());
  }

  private storeUnavailable(windowSeconds: number): Rejection {
    return {
      gate: this.name,
      reason: 'unavailable',
      statusCode: 429,
      body: this.limiter.generateErrorBody(windowSeconds),
      headers: { 'Retry-After': windowSeconds.toString() },
      audit: { severity: 'ERROR', event: 'rate_limit_store_unavailable', includeBody: false },
    };
  }
}

export function createRateLimitGate(limiter: RateLimiter): RateLimitGate {
  return new RateLimitGate(limiter);
}
