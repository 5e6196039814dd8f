/**
 * Gatehouse - Redis Client
 * Connection management for the shared counter store used by the rate limiter
 */

import { createClient, type RedisClientOptions } from 'redis';

import { withTimeout } from '../utils/helpers.js';
import logger, { logLifecycle } from '../utils/logger.js';
import type { DeepReadonly, RedisConfig } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export type NodeRedisClient = ReturnType<typeof createClient>;

export interface RedisConnectionOptions {
  config: DeepReadonly<RedisConfig>;
  maxReconnectDelayMs?: number;
}

/**
 * The slice of Redis the gateway depends on. Counter updates only ever go
 * through `eval` so every decision is one atomic server-side step.
 */
export interface RedisClientWrapper {
  readonly isConnected: boolean;
  connect: () => Promise<void>;
  disconnect: () => Promise<void>;
  ping: () => Promise<boolean>;
  eval: (script: string, keys: string[], args: string[]) => Promise<unknown>;
}

// =============================================================================
// Redis Client Class
// =============================================================================

export class RedisClient implements RedisClientWrapper {
  public client: NodeRedisClient;
  public isConnected = false;
  private config: DeepReadonly<RedisConfig>;
  private keyPrefix: string;
  private reconnectAttempts = 0;
  private reconnectDelay = 1000;
  private maxReconnectDelayMs: number;

  constructor(options: RedisConnectionOptions) {
    this.config = options.config;
    this.keyPrefix = options.config.keyPrefix;
    this.maxReconnectDelayMs = options.maxReconnectDelayMs ?? 30000;

    const baseSocket = {
      host: this.config.host,
      port: this.config.port,
      connectTimeout: this.config.connectTimeoutMs,
      // Keep retrying forever; the limiter fails open while disconnected
      reconnectStrategy: (retries: number): number => {
        const delay = Math.min(retries * this.reconnectDelay, this.maxReconnectDelayMs);
        logger.warn(`Redis reconnecting in ${delay}ms (attempt ${retries})`);
        return delay;
      },
    };

    const socket: RedisClientOptions['socket'] = this.config.tls
      ? { ...baseSocket, tls: true }
      : baseSocket;

    const clientOptions: RedisClientOptions = {
      socket,
      database: this.config.db,
      // Commands issued while disconnected fail immediately instead of queueing
      disableOfflineQueue: true,
    };

    if (this.config.password) {
      clientOptions.password = this.config.password;
    }

    this.client = createClient(clientOptions);

    this.setupEventHandlers();
  }

  /**
   * Set up Redis client event handlers
   */
  private setupEventHandlers(): void {
    this.client.on('connect', () => {
      logger.debug('Redis client connecting...');
    });

    this.client.on('ready', () => {
      this.isConnected = true;
      this.reconnectAttempts = 0;
      logLifecycle('ready', 'Redis client connected', {
        host: this.config.host,
        port: this.config.port,
        db: this.config.db,
      });
    });

    this.client.on('error', (err: Error) => {
      logger.error('Redis client error', { error: err.message });
    });

    this.client.on('end', () => {
      this.isConnected = false;
      logger.warn('Redis client disconnected');
    });

    this.client.on('reconnecting', () => {
      this.isConnected = false;
      this.reconnectAttempts++;
      logger.info('Redis client reconnecting...', {
        attempt: this.reconnectAttempts,
      });
    });
  }

  /**
   * Prepend key prefix
   */
  private prefixKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  /**
   * Connect to Redis
   */
  public async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    try {
      await this.client.connect();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to connect to Redis', { error: message });
      throw error;
    }
  }

  /**
   * Disconnect from Redis
   */
  public async disconnect(): Promise<void> {
    if (!this.client.isOpen) {
      return;
    }

    try {
      if (this.isConnected) {
        await this.client.quit();
      } else {
        await this.client.disconnect();
      }
      this.isConnected = false;
      logLifecycle('shutdown', 'Redis client disconnected');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Error disconnecting from Redis', { error: message });
      throw error;
    }
  }

  /**
   * Ping Redis server
   */
  public async ping(): Promise<boolean> {
    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch (error) {
      logger.debug('Redis ping failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Execute a Lua script
   */
  public async eval(script: string, keys: string[], args: string[]): Promise<unknown> {
    const prefixedKeys = keys.map((k) => this.prefixKey(k));
    return this.client.eval(script, {
      keys: prefixedKeys,
      arguments: args,
    });
  }
}

// =============================================================================
// Singleton Instance
// =============================================================================

let redisClientInstance: RedisClient | null = null;

export function getRedisClient(options?: RedisConnectionOptions): RedisClient {
  if (redisClientInstance === null) {
    if (options === undefined) {
      throw new Error('Redis client not initialized. Provide options on first call.');
    }
    redisClientInstance = new RedisClient(options);
  }
  return redisClientInstance;
}

/**
 * Create the shared client and start connecting. Waits at most the connect
 * timeout: the client keeps reconnecting in the background while Redis is
 * down, and callers see `isConnected === false` until it is up.
 */
export async function initializeRedis(options: RedisConnectionOptions): Promise<RedisClient> {
  const client = getRedisClient(options);

  const connecting = client.connect().then(
    () => true,
    () => false
  );

  try {
    await withTimeout(connecting, options.config.connectTimeoutMs, { label: 'Redis connect' });
  } catch (error) {
    logger.warn('Redis unavailable at startup, rate limiting will fail open until it connects', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return client;
}

export async function closeRedis(): Promise<void> {
  if (redisClientInstance !== null) {
    await redisClientInstance.disconnect();
    redisClientInstance = null;
  }
}

export default RedisClient;
