/**
 * Gatehouse - Storage Module
 *
 * Barrel export file for database and counter store clients
 */

import { closePostgres, initializePostgres } from './postgres.js';
import { closeRedis, initializeRedis } from './redis.js';
import type { DeepReadonly, PostgresConfig, RedisConfig } from '../utils/types.js';
import logger from '../utils/logger.js';

// PostgreSQL exports
export { PostgresClient, getPostgresClient, initializePostgres, closePostgres } from './postgres.js';

export type { DatabaseClient, QueryExecutor } from './postgres.js';

// Redis exports
export { RedisClient, getRedisClient, initializeRedis, closeRedis } from './redis.js';

export type { RedisConnectionOptions, RedisClientWrapper } from './redis.js';

export interface StorageConfig {
  postgres: DeepReadonly<PostgresConfig>;
  redis: DeepReadonly<RedisConfig>;
}

export interface StorageConnections {
  postgres: Awaited<ReturnType<typeof initializePostgres>>;
  redis: Awaited<ReturnType<typeof initializeRedis>>;
}

/**
 * Initialize all storage connections. Neither store is required at startup:
 * the rate limiter fails open and the authorizers fail closed without them.
 */
export async function initializeStorage(config: StorageConfig): Promise<StorageConnections> {
  logger.info('Initializing storage connections...');

  const [postgres, redis] = await Promise.all([
    initializePostgres(config.postgres),
    initializeRedis({ config: config.redis }),
  ]);

  logger.info('Storage connections initialized', {
    postgres: postgres.isConnected(),
    redis: redis.isConnected,
  });

  return { postgres, redis };
}

/**
 * Close all storage connections
 */
export async function closeStorage(): Promise<void> {
  logger.info('Closing storage connections...');

  await Promise.all([closePostgres(), closeRedis()]);

  logger.info('All storage connections closed');
}
