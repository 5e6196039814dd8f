/**
 * Gatehouse - Request Admission Gateway
 *
 * Main Application Entry Point
 */

import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createPostgresDirectory } from './directory/index.js';
import { GatehouseServer, createGatehouseServer } from './gateway/index.js';
import { createRateLimiter } from './rate-limiter/index.js';
import { closeStorage, initializeStorage } from './storage/index.js';
import logger, { configureLogger, logLifecycle } from './utils/logger.js';

// =============================================================================
// Global State
// =============================================================================

let gatehouseServer: GatehouseServer | null = null;
let isShuttingDown = false;

const SHUTDOWN_TIMEOUT_MS = 30000;

// =============================================================================
// Application Startup
// =============================================================================

async function bootstrap(): Promise<void> {
  logLifecycle('startup', 'Gatehouse starting up...');

  try {
    const config = await loadConfig();
    configureLogger(config.logging);

    logLifecycle('startup', 'Configuration loaded', {
      port: config.server.port,
      host: config.server.host,
      environment: config.server.nodeEnv,
      allowedHosts: config.hosts.allowed.length,
    });

    // Neither store is required to start: see initializeStorage
    const storage = await initializeStorage({
      postgres: config.postgres,
      redis: config.redis,
    });

    const rateLimiter = createRateLimiter(storage.redis, {
      ...config.rateLimit,
      commandTimeoutMs: config.redis.commandTimeoutMs,
    });

    const directory = createPostgresDirectory(storage.postgres, {
      timeoutMs: config.directory.timeoutMs,
    });

    gatehouseServer = createGatehouseServer({
      config,
      rateLimiter,
      directory,
      redis: storage.redis,
      database: storage.postgres,
    });

    const address = await gatehouseServer.start();

    logLifecycle('ready', 'Gatehouse is ready to accept connections', {
      url: `http://${address.address}:${address.port}`,
      upstream: config.upstream?.url ?? null,
    });
  } catch (error) {
    logLifecycle('error', 'Failed to start Gatehouse', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring signal', { signal });
    return;
  }

  isShuttingDown = true;
  logLifecycle('shutdown', `Received ${signal}, starting graceful shutdown...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    if (gatehouseServer !== null) {
      await gatehouseServer.shutdown(signal);
    }

    await closeStorage();

    clearTimeout(shutdownTimeout);
    logLifecycle('shutdown', 'Gatehouse shutdown complete');
    process.exit(0);
  } catch (error) {
    clearTimeout(shutdownTimeout);
    logLifecycle('error', 'Error during shutdown', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    error: reason instanceof Error ? reason.message : String(reason),
  });
});

// =============================================================================
// Start Application
// =============================================================================

bootstrap().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Fatal error during bootstrap:', error);
  process.exit(1);
});
