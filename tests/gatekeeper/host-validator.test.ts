/**
 * Gatehouse - Host Validator Tests
 */

import { describe, it, expect } from '@jest/globals';

import { HostValidator, normalizeHost, parseHostPattern } from '../../src/gatekeeper/host-validator.js';
import { ConfigurationError } from '../../src/utils/types.js';
import { buildGateContext } from '../helpers/fakes.js';

describe('parseHostPattern', () => {
  it('should classify patterns by form', () => {
    expect(parseHostPattern(' Example.COM ')).toEqual({ value: 'example.com', kind: 'domain' });
    expect(parseHostPattern('.example.com')).toEqual({ value: '.example.com', kind: 'wildcard' });
    expect(parseHostPattern('127.0.0.1')).toEqual({ value: '127.0.0.1', kind: 'literal' });
    expect(parseHostPattern('[::1]')).toEqual({ value: '[::1]', kind: 'literal' });
  });

  it('should reject globs and ports', () => {
    expect(() => parseHostPattern('*.example.com')).toThrow('Invalid allowed host pattern: "*.example.com"');
    expect(() => parseHostPattern('example.com:8080')).toThrow(ConfigurationError);
  });
});

describe('normalizeHost', () => {
  it('should drop the port and the trailing dot', () => {
    expect(normalizeHost('API.Example.com:8443')).toBe('api.example.com');
    expect(normalizeHost('example.com.')).toBe('example.com');
    expect(normalizeHost('[::1]:8080')).toBe('[::1]');
  });

  it('should report empty hosts as missing', () => {
    expect(normalizeHost(undefined)).toBeUndefined();
    expect(normalizeHost('  ')).toBeUndefined();
    expect(normalizeHost(':8080')).toBeUndefined();
  });
});

describe('HostValidator', () => {
  const validator = new HostValidator(['example.com', '.example.org', 'localhost', '[::1]']);

  it('should refuse an empty allow-list', () => {
    expect(() => new HostValidator([])).toThrow('At least one allowed host pattern is required');
  });

  it('should allow the apex and subdomains of a bare domain', () => {
    expect(validator.match('example.com')).toEqual({ allowed: true, pattern: 'example.com', rule: 'exact' });
    expect(validator.match('a.b.example.com')).toEqual({
      allowed: true,
      pattern: 'example.com',
      rule: 'domain',
    });
  });

  it('should allow only subdomains of a wildcard', () => {
    expect(validator.match('api.example.org')).toEqual({
      allowed: true,
      pattern: '.example.org',
      rule: 'wildcard',
    });
    expect(validator.match('example.org')).toEqual({ allowed: false });
  });

  it('should not match on a suffix that is not a label boundary', () => {
    expect(validator.match('badexample.com')).toEqual({ allowed: false });
    expect(validator.match('example.com.evil.test')).toEqual({ allowed: false });
  });

  it('should prefer exact over domain over wildcard', () => {
    const overlapping = new HostValidator(['.example.com', 'example.com', 'api.example.com']);

    expect(overlapping.match('api.example.com')).toEqual({
      allowed: true,
      pattern: 'api.example.com',
      rule: 'exact',
    });
    expect(overlapping.match('web.example.com')).toEqual({
      allowed: true,
      pattern: 'example.com',
      rule: 'domain',
    });
  });

  it('should match IPv6 literals with a port', () => {
    expect(validator.match('[::1]:8080')).toEqual({ allowed: true, pattern: '[::1]', rule: 'exact' });
  });

  it('should pass allowed hosts through evaluate', async () => {
    await expect(validator.evaluate(buildGateContext({ host: 'localhost:3000' }))).resolves.toEqual({
      outcome: 'pass',
    });
  });

  it('should reject a missing or unknown host with 400', async () => {
    for (const host of [undefined, 'evil.test']) {
      const decision = await validator.evaluate(buildGateContext({ host }));

      expect(decision.outcome).toBe('reject');
      if (decision.outcome !== 'reject') continue;
      expect(decision.rejection.statusCode).toBe(400);
      expect(decision.rejection.reason).toBe('invalid_host');
      expect(decision.rejection.body).toEqual({
        error: 'invalid_host',
        message: 'Bad Request: host not allowed',
      });
      expect(decision.rejection.audit).toEqual({
        severity: 'WARNING',
        event: 'disallowed_host',
        includeBody: false,
      });
    }
  });
});
