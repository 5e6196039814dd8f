/**
 * Gatehouse - Prometheus Metrics
 *
 * Request counter, latency histogram and in-flight gauge, recorded for every
 * request (rejections included) and served in the Prometheus text format.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { Counter, Gauge, Histogram, Registry } from 'prom-client';

import logger from '../utils/logger.js';

// =============================================================================
// Constants
// =============================================================================

export const METRICS_PATH = '/metrics';

const DURATION_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

// =============================================================================
// Gateway Metrics Class
// =============================================================================

export class GatewayMetrics {
  private registry: Registry;
  private requestsTotal: Counter<'method' | 'path' | 'status'>;
  private requestDuration: Histogram<'method' | 'path'>;
  private requestsInFlight: Gauge;

  constructor() {
    // One registry per instance so several servers can live in one process
    this.registry = new Registry();

    this.requestsTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'path', 'status'],
      registers: [this.registry],
    });

    this.requestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'path'],
      buckets: DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.requestsInFlight = new Gauge({
      name: 'http_requests_in_flight',
      help: 'Number of HTTP requests currently being processed',
      registers: [this.registry],
    });
  }

  /**
   * Count the request when its response finishes or the connection closes,
   * whichever comes first.
   */
  public middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const method = req.method;
      const path = req.path;

      this.requestsInFlight.inc();
      const stopTimer = this.requestDuration.startTimer({ method, path });

      let recorded = false;
      const record = (): void => {
        if (recorded) {
          return;
        }
        recorded = true;

        this.requestsInFlight.dec();
        stopTimer();
        this.requestsTotal.inc({ method, path, status: String(res.statusCode) });
      };

      res.once('finish', record);
      res.once('close', record);
      next();
    };
  }

  /**
   * Serve the registry in the Prometheus text exposition format
   */
  public handler(): RequestHandler {
    return (_req: Request, res: Response, next: NextFunction): void => {
      this.registry
        .metrics()
        .then((body) => {
          res.set('Content-Type', this.registry.contentType).send(body);
        })
        .catch((error: unknown) => {
          logger.error('Failed to render metrics', {
            error: error instanceof Error ? error.message : String(error),
          });
          next(error);
        });
    };
  }

  public render(): Promise<string> {
    return this.registry.metrics();
  }
}

export default GatewayMetrics;
