/**
 * Gatehouse - Request ID Middleware
 * Assigns a unique identifier to each incoming request for tracing
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

import { generateRequestId, headerValue } from '../../utils/helpers.js';

// =============================================================================
// Constants
// =============================================================================

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_RESPONSE_HEADER = 'X-Request-ID';
const MAX_REQUEST_ID_LENGTH = 128;

// =============================================================================
// Request ID Middleware
// =============================================================================

/**
 * Reuse a caller-supplied X-Request-ID (first value, bounded length) or
 * generate a UUID. The id is echoed on the response and, for the upstream,
 * written back onto the request headers.
 */
export function requestIdMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const existing = headerValue(req.headers[REQUEST_ID_HEADER])?.split(',')[0]?.trim();
    const requestId =
      existing && existing.length <= MAX_REQUEST_ID_LENGTH ? existing : generateRequestId();

    req.requestId = requestId;
    req.startTime = Date.now();

    res.setHeader(REQUEST_ID_RESPONSE_HEADER, requestId);
    req.headers[REQUEST_ID_HEADER] = requestId;

    next();
  };
}

/**
 * Get the request ID from a request object
 */
export function getRequestId(req: Request): string {
  return req.requestId ?? 'unknown';
}

export default requestIdMiddleware;
