/**
 * Gatehouse - Gateway Server
 * Express application: edge middleware, the gatekeeper pipeline, health
 * and metrics routes, then the upstream forwarder.
 */

import http from 'http';
import type { AddressInfo } from 'net';

import compression from 'compression';
import cors from 'cors';
import express, { type Application, type Request, type Response } from 'express';
import helmet from 'helmet';

import type { FrozenConfig } from '../config/index.js';
import type { DirectoryService } from '../directory/index.js';
import {
  createAuditLogger,
  createGatekeeperMiddleware,
  createGatekeeperPipeline,
  type AuditLogger,
  type GatekeeperPipeline,
} from '../gatekeeper/index.js';
import type { RateLimiter } from '../rate-limiter/index.js';
import type { DatabaseClient } from '../storage/postgres.js';
import type { RedisClientWrapper } from '../storage/redis.js';
import logger, { logLifecycle } from '../utils/logger.js';

import { GatewayMetrics, METRICS_PATH } from './metrics.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createUpstreamForwarder, type UpstreamForwarder } from './upstream.js';

// =============================================================================
// Types
// =============================================================================

export interface GatehouseServerOptions {
  config: FrozenConfig;
  rateLimiter: RateLimiter;
  directory: DirectoryService;
  /** Reported by the readiness route */
  redis?: Pick<RedisClientWrapper, 'isConnected'>;
  database?: Pick<DatabaseClient, 'isConnected'>;
  auditLogger?: AuditLogger;
}

const UP_AND_RUNNING = { message: 'Application Up And Running' };

// =============================================================================
// Gateway Server Class
// =============================================================================

export class GatehouseServer {
  private app: Application;
  private server: http.Server | null = null;
  private config: FrozenConfig;
  private pipeline: GatekeeperPipeline;
  private auditLogger: AuditLogger;
  private upstream: UpstreamForwarder | null = null;
  private metrics: GatewayMetrics | null = null;
  private options: GatehouseServerOptions;
  private isShuttingDown = false;

  constructor(options: GatehouseServerOptions) {
    this.options = options;
    this.config = options.config;
    this.app = express();

    this.auditLogger =
      options.auditLogger ??
      createAuditLogger({
        sensitiveHeaders: this.config.logging.sensitiveHeaders,
        traceEnabled: this.config.logging.requestLogging,
      });

    this.pipeline = createGatekeeperPipeline({
      rateLimiter: options.rateLimiter,
      directory: options.directory,
      auditLogger: this.auditLogger,
      allowedHosts: this.config.hosts.allowed,
      publicRoutes: this.config.gates.publicRoutes,
      baseUrl: this.config.server.baseUrl,
      ipAuthEnabled: this.config.gates.ipAuth.enabled,
      tokenAuthEnabled: this.config.gates.tokenAuth.enabled,
    });

    if (this.config.metrics.enabled) {
      this.metrics = new GatewayMetrics();
    }

    if (this.config.upstream) {
      this.upstream = createUpstreamForwarder(this.config.upstream);
    }

    this.setupMiddleware();
    this.setupRoutes();

    logLifecycle('startup', 'Gateway server initialized', {
      gates: this.pipeline.getGates().map((g) => g.name),
      upstream: this.upstream?.getTarget() ?? null,
      metrics: this.metrics !== null,
    });
  }

  /**
   * Set up Express middleware
   */
  private setupMiddleware(): void {
    this.app.disable('x-powered-by');

    // First, so rejected requests are counted too
    if (this.metrics !== null) {
      this.app.use(this.metrics.middleware());
    }

    // Security headers; CSP is left to the upstream
    this.app.use(helmet({ contentSecurityPolicy: false }));

    this.app.use(compression());
    this.app.use(requestIdMiddleware());
    this.app.use(
      requestLogger({
        auditLogger: this.auditLogger,
        trustedProxies: this.config.gates.trustedProxies,
      })
    );

    // Nothing past this point runs for a rejected request
    this.app.use(
      createGatekeeperMiddleware({
        pipeline: this.pipeline,
        trustedProxies: this.config.gates.trustedProxies,
        bodySnapshotLimit: this.config.logging.bodySnapshotLimit,
      })
    );

    // After the gates: preflights are admitted or rejected like any request
    const { allowedOrigins, allowCredentials } = this.config.cors;
    this.app.use(
      cors({
        origin: allowedOrigins.length > 0 ? [...allowedOrigins] : false,
        credentials: allowCredentials,
      })
    );
  }

  /**
   * Set up Express routes
   */
  private setupRoutes(): void {
    this.app.get('/', this.healthCheck.bind(this));
    this.app.get('/healthcheck', this.healthCheck.bind(this));
    this.app.get('/ready', this.readinessCheck.bind(this));

    if (this.metrics !== null) {
      this.app.get(METRICS_PATH, this.metrics.handler());
    }

    if (this.upstream !== null) {
      this.app.use(this.upstream.middleware());
    }

    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  private healthCheck(_req: Request, res: Response): void {
    res.status(200).json(UP_AND_RUNNING);
  }

  private readinessCheck(_req: Request, res: Response): void {
    const redisConnected = this.options.redis?.isConnected ?? false;
    const postgresConnected = this.options.database?.isConnected() ?? false;
    const ready = redisConnected && postgresConnected;

    res.status(ready ? 200 : 503).json({
      status: ready ? 'ready' : 'not_ready',
      redis: redisConnected ? 'connected' : 'disconnected',
      postgres: postgresConnected ? 'connected' : 'disconnected',
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Start listening. Resolves with the bound address.
   */
  public start(): Promise<AddressInfo> {
    const { port, host } = this.config.server;

    return new Promise((resolve, reject) => {
      const server = http.createServer(this.app);
      this.server = server;

      server.once('error', (error) => {
        logLifecycle('error', 'Server error', { error: error.message });
        reject(error);
      });

      server.listen(port, host, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }

        logLifecycle('ready', `Gatehouse listening on ${address.address}:${address.port}`, {
          host: address.address,
          port: address.port,
          environment: this.config.server.nodeEnv,
          rateLimiting: this.options.rateLimiter.isEnabled(),
        });

        resolve(address);
      });
    });
  }

  /**
   * Stop accepting connections and close the forwarder. Storage clients
   * belong to the caller.
   */
  public async shutdown(signal?: string): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    logLifecycle('shutdown', `Shutting down gateway${signal ? ` (${signal})` : ''}...`);

    const server = this.server;
    if (server !== null) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeIdleConnections();
      });
    }

    if (this.upstream !== null) {
      this.upstream.close();
    }

    const dropped = this.auditLogger.getDroppedCount();
    if (dropped > 0) {
      logger.warn('Audit records were dropped during this run', { dropped });
    }

    logLifecycle('shutdown', 'Gateway shutdown complete');
  }

  /**
   * Get the Express application (for testing)
   */
  public getApp(): Application {
    return this.app;
  }

  public getPipeline(): GatekeeperPipeline {
    return this.pipeline;
  }

  public getAuditLogger(): AuditLogger {
    return this.auditLogger;
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createGatehouseServer(options: GatehouseServerOptions): GatehouseServer {
  return new GatehouseServer(options);
}

export default GatehouseServer;
