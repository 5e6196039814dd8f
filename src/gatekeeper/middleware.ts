/**
 * Gatehouse - Gatekeeper Middleware
 * Express adapter around the admission pipeline
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { generateRequestId, resolveClientIp } from '../utils/helpers.js';
import { captureBodySnapshot } from './body-snapshot.js';
import type { GatekeeperPipeline } from './pipeline.js';
import type { GateContext } from './types.js';

export interface GatekeeperMiddlewareOptions {
  pipeline: GatekeeperPipeline;
  trustedProxies: readonly string[];
  bodySnapshotLimit: number;
  bodySnapshotTimeoutMs?: number;
}

const DEFAULT_SNAPSHOT_TIMEOUT_MS = 1000;

export function buildGateContext(
  req: Request,
  signal: AbortSignal,
  options: GatekeeperMiddlewareOptions
): GateContext {
  const snapshot = {
    limit: options.bodySnapshotLimit,
    timeoutMs: options.bodySnapshotTimeoutMs ?? DEFAULT_SNAPSHOT_TIMEOUT_MS,
  };

  return {
    requestId: req.requestId ?? generateRequestId(),
    method: req.method,
    path: req.path,
    route: req.originalUrl,
    host: req.headers.host,
    clientIp: resolveClientIp(req.headers, req.socket.remoteAddress, options.trustedProxies),
    headers: req.headers,
    signal,
    readBody: () => captureBodySnapshot(req, snapshot),
  };
}

/**
 * Run every request through the pipeline. Admitted requests continue with
 * the accumulated rate limit headers set; rejected ones get the gate's
 * status and JSON body. When the client disconnects first, nothing is
 * written.
 */
export function createGatekeeperMiddleware(options: GatekeeperMiddlewareOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableEnded) {
        controller.abort();
      }
    };
    res.on('close', onClose);

    const context = buildGateContext(req, controller.signal, options);

    options.pipeline
      .run(context)
      .then((result) => {
        res.removeListener('close', onClose);

        req.admission =
          result.state === 'ADMITTED'
            ? { state: result.state, transitions: result.transitions, clientIp: context.clientIp }
            : {
                state: result.state,
                transitions: result.transitions,
                clientIp: context.clientIp,
                rejectionReason: result.reason,
              };

        if (result.state === 'ADMITTED') {
          res.set(result.headers);
          next();
          return;
        }

        if (result.rejection === undefined || controller.signal.aborted || res.headersSent) {
          return;
        }

        res.status(result.rejection.statusCode).set(result.headers).json(result.rejection.body);
      })
      .catch(next);
  };
}

export default createGatekeeperMiddleware;
