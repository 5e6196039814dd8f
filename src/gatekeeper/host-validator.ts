/**
 * Gatehouse - Host Validator
 * Rejects requests whose Host header matches no configured pattern
 */

import { ConfigurationError } from '../utils/types.js';
import type { Gate, GateContext, GateDecision, Rejection } from './types.js';
import { pass, reject } from './types.js';

// =============================================================================
// Patterns
// =============================================================================

export type HostRule = 'exact' | 'domain' | 'wildcard';

export interface HostPattern {
  /** Normalized pattern text */
  value: string;
  /**
   * literal: IP address, exact match only
   * domain: `example.com`, the domain itself or any subdomain
   * wildcard: `.example.com`, any subdomain at any depth, not the apex
   */
  kind: 'literal' | 'domain' | 'wildcard';
}

export type HostMatch = { allowed: true; pattern: string; rule: HostRule } | { allowed: false };

const LABELS = /^\.?[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?(\.[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?)*$/;
const IPV4 = /^\d{1,3}(\.\d{1,3}){3}$/;
const IPV6_LITERAL = /^\[[0-9a-f:.]+\]$/;

export function parseHostPattern(raw: string): HostPattern {
  const value = raw.trim().toLowerCase();

  if (IPV6_LITERAL.test(value) || IPV4.test(value)) {
    return { value, kind: 'literal' };
  }
  if (!LABELS.test(value)) {
    throw new ConfigurationError(`Invalid allowed host pattern: "${raw}"`);
  }
  return { value, kind: value.startsWith('.') ? 'wildcard' : 'domain' };
}

/**
 * Lower-case the Host header and drop its port. Bracketed IPv6 literals keep
 * their brackets; a trailing root dot is removed.
 */
export function normalizeHost(header: string | undefined): string | undefined {
  if (header === undefined) {
    return undefined;
  }

  let host = header.trim().toLowerCase();

  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    host = end > 0 ? host.slice(0, end + 1) : '';
  } else {
    host = host.split(':')[0] ?? '';
  }

  if (host.endsWith('.')) {
    host = host.slice(0, -1);
  }

  return host.length > 0 ? host : undefined;
}

// =============================================================================
// Host Validator Gate
// =============================================================================

export class HostValidator implements Gate {
  public readonly name = 'host';
  public readonly completes = 'HOST_CHECKED';
  public readonly failureMode = 'closed';

  private patterns: readonly HostPattern[];

  constructor(patterns: readonly string[]) {
    if (patterns.length === 0) {
      throw new ConfigurationError('At least one allowed host pattern is required');
    }
    this.patterns = patterns.map(parseHostPattern);
  }

  /**
   * Precedence: exact equality, then bare domain, then wildcard.
   */
  public match(rawHost: string | undefined): HostMatch {
    const host = normalizeHost(rawHost);
    if (host === undefined) {
      return { allowed: false };
    }

    const exact = this.patterns.find((p) => p.value === host);
    if (exact) {
      return { allowed: true, pattern: exact.value, rule: 'exact' };
    }

    const domain = this.patterns.find((p) => p.kind === 'domain' && host.endsWith(`.${p.value}`));
    if (domain) {
      return { allowed: true, pattern: domain.value, rule: 'domain' };
    }

    const wildcard = this.patterns.find((p) => p.kind === 'wildcard' && host.endsWith(p.value));
    if (wildcard) {
      return { allowed: true, pattern: wildcard.value, rule: 'wildcard' };
    }

    return { allowed: false };
  }

  public async evaluate(context: GateContext): Promise<GateDecision> {
    return this.match(context.host).allowed ? pass() : reject(this.denied());
  }

  public unavailable(): Rejection {
    return this.denied();
  }

  private denied(): Rejection {
    return {
      gate: this.name,
      reason: 'invalid_host',
      statusCode: 400,
      body: { error: 'invalid_host', message: 'Bad Request: host not allowed' },
      headers: {},
      audit: { severity: 'WARNING', event: 'disallowed_host', includeBody: false },
    };
  }
}

export function createHostValidator(patterns: readonly string[]): HostValidator {
  return new HostValidator(patterns);
}
