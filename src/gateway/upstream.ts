/**
 * Gatehouse - Upstream Forwarder
 * Proxies admitted requests to the protected service
 */

import http from 'http';

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import httpProxy from 'http-proxy';

import { logProxy } from '../utils/logger.js';
import { getRequestId } from './middleware/requestId.js';
import { ProxyError, TimeoutError, type DeepReadonly, type UpstreamConfig } from '../utils/types.js';

// =============================================================================
// Error Mapping
// =============================================================================

interface UpstreamErrorBody {
  error: 'bad_gateway' | 'gateway_timeout';
  message: string;
}

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Map a forwarding failure onto the response the caller gets
 */
export function toUpstreamError(err: Error): { statusCode: number; body: UpstreamErrorBody } {
  const code = errorCode(err);

  if (err instanceof TimeoutError || code === 'ETIMEDOUT' || code === 'ESOCKETTIMEDOUT') {
    return {
      statusCode: 504,
      body: { error: 'gateway_timeout', message: 'Request to upstream service timed out' },
    };
  }

  if (code === 'ECONNREFUSED') {
    return {
      statusCode: 502,
      body: { error: 'bad_gateway', message: 'Upstream service is unavailable' },
    };
  }

  return {
    statusCode: 502,
    body: { error: 'bad_gateway', message: 'Error connecting to upstream service' },
  };
}

// =============================================================================
// Upstream Forwarder Class
// =============================================================================

export class UpstreamForwarder {
  private proxy: httpProxy;
  private target: string;
  private timeoutMs: number;

  constructor(config: DeepReadonly<UpstreamConfig>) {
    this.target = config.url;
    this.timeoutMs = config.timeoutMs;

    this.proxy = httpProxy.createProxyServer({
      target: this.target,
      changeOrigin: true,
      xfwd: true,
    });

    this.proxy.on('proxyReq', (proxyReq, req) => {
      const requestId = req.headers['x-request-id'];
      if (typeof requestId === 'string') {
        proxyReq.setHeader('X-Request-ID', requestId);
      }
      proxyReq.setTimeout(this.timeoutMs, () => {
        proxyReq.destroy(new TimeoutError(`Upstream did not respond within ${this.timeoutMs}ms`, this.timeoutMs));
      });
    });
  }

  public getTarget(): string {
    return this.target;
  }

  public middleware(): RequestHandler {
    return (req: Request, res: Response, _next: NextFunction): void => {
      const requestId = getRequestId(req);
      let failed = false;

      res.once('finish', () => {
        if (failed) {
          return;
        }
        logProxy({
          requestId,
          event: 'proxy_complete',
          target: this.target,
          path: req.path,
          statusCode: res.statusCode,
        });
      });

      this.proxy.web(req, res, {}, (err, _req, response) => {
        const { statusCode, body } = toUpstreamError(err);
        failed = true;

        logProxy({
          requestId,
          event: statusCode === 504 ? 'proxy_timeout' : 'proxy_error',
          target: this.target,
          path: req.path,
          statusCode,
          error: err.message,
        });

        if (response instanceof http.ServerResponse && !response.headersSent) {
          response.writeHead(statusCode, { 'Content-Type': 'application/json' });
          response.end(JSON.stringify(body));
        }
      });
    };
  }

  public close(): void {
    this.proxy.close();
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createUpstreamForwarder(config: DeepReadonly<UpstreamConfig>): UpstreamForwarder {
  if (!config.url) {
    throw new ProxyError('Upstream URL is required');
  }
  return new UpstreamForwarder(config);
}

export default UpstreamForwarder;
