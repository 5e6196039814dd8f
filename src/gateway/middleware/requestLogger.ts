/**
 * Gatehouse - Request Logging Middleware
 * Summary line per request, plus redacted incoming/outgoing traces when the
 * audit logger has tracing switched on.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

import type { AuditLogger } from '../../gatekeeper/audit.js';
import { resolveClientIp } from '../../utils/helpers.js';
import { logRequest, type RequestLogData } from '../../utils/logger.js';

// =============================================================================
// Types
// =============================================================================

export interface RequestLoggerOptions {
  auditLogger: AuditLogger;
  trustedProxies?: readonly string[];
  /** Skip the summary line for these paths (traces are still written) */
  skipPaths?: readonly string[];
}

// =============================================================================
// Request Logger Middleware
// =============================================================================

export function requestLogger(options: RequestLoggerOptions): RequestHandler {
  const { auditLogger, trustedProxies = [], skipPaths = ['/healthcheck', '/ready'] } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = req.startTime ?? Date.now();
    const requestId = req.requestId ?? 'unknown';
    const clientIp = resolveClientIp(req.headers, req.socket.remoteAddress, trustedProxies);

    auditLogger.traceIncoming({
      requestId,
      method: req.method,
      path: req.originalUrl,
      clientIp,
      headers: req.headers,
    });

    res.on('finish', () => {
      const durationMs = Date.now() - startTime;

      auditLogger.traceOutgoing({
        requestId,
        method: req.method,
        path: req.originalUrl,
        statusCode: res.statusCode,
        durationMs,
        headers: res.getHeaders(),
      });

      if (skipPaths.includes(req.path)) {
        return;
      }

      const logData: RequestLogData = {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        responseTimeMs: durationMs,
        ipAddress: clientIp,
      };

      const userAgent = req.headers['user-agent'];
      if (userAgent) {
        logData.userAgent = userAgent;
      }
      if (req.admission) {
        logData.admission = req.admission.rejectionReason ?? req.admission.state;
      }

      logRequest(logData);
    });

    next();
  };
}

export default requestLogger;
