/**
 * Gatehouse - Audit Logger and Body Snapshot Tests
 */

import { IncomingMessage } from 'http';
import { Socket } from 'net';

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';

import { AuditLogger, REDACTED, redactHeaders, type AuditSink } from '../../src/gatekeeper/audit.js';
import { TRUNCATED_MARKER, captureBodySnapshot, completePrefixLength } from '../../src/gatekeeper/body-snapshot.js';

describe('redactHeaders', () => {
  it('should mask sensitive names in any case and flatten the rest', () => {
    const headers = {
      authorization: 'Bearer test-token',
      'X-Api-Key': 'test-key',
      accept: ['text/html', 'application/json'],
      'content-length': 12,
      'x-missing': undefined,
    };

    const redacted = redactHeaders(headers, new Set(['authorization', 'x-api-key']));

    expect(redacted).toEqual({
      authorization: REDACTED,
      'X-Api-Key': REDACTED,
      accept: 'text/html,application/json',
      'content-length': '12',
    });
    expect(headers.authorization).toBe('Bearer test-token');
  });
});

describe('AuditLogger', () => {
  let sink: { audit: jest.Mock<AuditSink['audit']>; trace: jest.Mock<AuditSink['trace']> };

  const rejectionInput = {
    severity: 'CRITICAL' as const,
    event: 'unauthorized_api_token_attempt',
    gate: 'token',
    reason: 'unauthorized',
    requestId: 'req-1',
    clientIp: '10.0.0.1',
    route: '/api/items?page=2',
    method: 'POST',
    headers: { authorization: 'Bearer test-token', host: 'localhost' },
  };

  beforeEach(() => {
    sink = { audit: jest.fn<AuditSink['audit']>(), trace: jest.fn<AuditSink['trace']>() };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should write one redacted record per rejection', () => {
    const audit = new AuditLogger({ sensitiveHeaders: ['Authorization'], traceEnabled: false, sink });

    const record = audit.rejection({ ...rejectionInput, body: '{"name":"x"}' });

    expect(sink.audit).toHaveBeenCalledTimes(1);
    expect(sink.audit).toHaveBeenCalledWith(record);
    expect(record).toEqual({
      severity: 'CRITICAL',
      event: 'unauthorized_api_token_attempt',
      gate: 'token',
      reason: 'unauthorized',
      requestId: 'req-1',
      clientIp: '10.0.0.1',
      route: '/api/items?page=2',
      method: 'POST',
      headers: { authorization: REDACTED, host: 'localhost' },
      body: '{"name":"x"}',
      timestamp: expect.any(String),
    });
  });

  it('should leave the body out when none was captured', () => {
    const audit = new AuditLogger({ sensitiveHeaders: [], traceEnabled: false, sink });

    const record = audit.rejection(rejectionInput);

    expect(record).toBeDefined();
    expect(record?.body).toBeUndefined();
  });

  it('should count and report a failing sink without throwing', () => {
    const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    sink.audit.mockImplementation(() => {
      throw new Error('disk full');
    });
    const audit = new AuditLogger({ sensitiveHeaders: [], traceEnabled: false, sink });

    expect(audit.rejection(rejectionInput)).toBeUndefined();
    expect(audit.getDroppedCount()).toBe(1);
    expect(stderr).toHaveBeenCalledWith('audit record dropped: disk full\n');
  });

  it('should only trace when tracing is enabled', () => {
    const trace = { requestId: 'req-1', method: 'GET', path: '/api/items', headers: { cookie: 'a=b' } };

    new AuditLogger({ sensitiveHeaders: ['cookie'], traceEnabled: false, sink }).traceIncoming(trace);
    expect(sink.trace).not.toHaveBeenCalled();

    new AuditLogger({ sensitiveHeaders: ['cookie'], traceEnabled: true, sink }).traceOutgoing({
      ...trace,
      statusCode: 200,
      durationMs: 4,
    });
    expect(sink.trace).toHaveBeenCalledWith({
      direction: 'outgoing',
      requestId: 'req-1',
      method: 'GET',
      path: '/api/items',
      headers: { cookie: REDACTED },
      statusCode: 200,
      durationMs: 4,
    });
  });
});

describe('captureBodySnapshot', () => {
  const request = (headers: Record<string, string>): IncomingMessage => {
    const req = new IncomingMessage(new Socket());
    req.headers = headers;
    return req;
  };

  it('should be disabled by a zero limit', async () => {
    await expect(captureBodySnapshot(request({}), { limit: 0, timeoutMs: 100 })).resolves.toBeUndefined();
  });

  it('should prefer an already parsed body', async () => {
    const req = Object.assign(request({ 'content-length': '7' }), { body: { a: 1 } });

    await expect(captureBodySnapshot(req, { limit: 100, timeoutMs: 100 })).resolves.toBe('{"a":1}');
  });

  it('should clip a parsed body to the limit', async () => {
    const req = Object.assign(request({}), { body: 'abcdef' });

    await expect(captureBodySnapshot(req, { limit: 3, timeoutMs: 100 })).resolves.toBe(
      `abc${TRUNCATED_MARKER}`
    );
  });

  it('should report an empty body without reading', async () => {
    await expect(captureBodySnapshot(request({}), { limit: 100, timeoutMs: 100 })).resolves.toBe('');
  });

  it('should read the raw stream up to the limit', async () => {
    const whole = request({ 'content-length': '11' });
    const clipped = request({ 'content-length': '11' });

    const wholeSnapshot = captureBodySnapshot(whole, { limit: 100, timeoutMs: 1000 });
    const clippedSnapshot = captureBodySnapshot(clipped, { limit: 5, timeoutMs: 1000 });
    for (const req of [whole, clipped]) {
      req.push(Buffer.from('hello world'));
      req.push(null);
    }

    await expect(wholeSnapshot).resolves.toBe('hello world');
    await expect(clippedSnapshot).resolves.toBe(`hello${TRUNCATED_MARKER}`);
  });

  it('should not split a multi-byte character when clipping a parsed body', async () => {
    const req = Object.assign(request({}), { body: 'ab\u20ac' });

    await expect(captureBodySnapshot(req, { limit: 4, timeoutMs: 100 })).resolves.toBe(
      `ab${TRUNCATED_MARKER}`
    );
  });

  it('should not split a multi-byte character when clipping the raw stream', async () => {
    const req = request({ 'content-length': '5' });

    const snapshot = captureBodySnapshot(req, { limit: 3, timeoutMs: 1000 });
    req.push(Buffer.from('a\u00e9\u00e9', 'utf8'));
    req.push(null);

    await expect(snapshot).resolves.toBe(`a\u00e9${TRUNCATED_MARKER}`);
  });
});

describe('completePrefixLength', () => {
  it('should stop before an incomplete sequence', () => {
    const bytes = Buffer.from('a\u00e9\u20ac', 'utf8');

    expect(bytes.length).toBe(6);
    expect(completePrefixLength(bytes, 1)).toBe(1);
    expect(completePrefixLength(bytes, 2)).toBe(1);
    expect(completePrefixLength(bytes, 3)).toBe(3);
    expect(completePrefixLength(bytes, 5)).toBe(3);
    expect(completePrefixLength(bytes, 6)).toBe(6);
    expect(completePrefixLength(bytes, 10)).toBe(6);
  });
});
