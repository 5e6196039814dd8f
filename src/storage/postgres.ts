/**
 * Gatehouse - PostgreSQL Database Client
 * Connection pooling and query helpers for the allow-list directory
 */

import pgPromise, { type IDatabase, type IMain, type ITask } from 'pg-promise';

import logger from '../utils/logger.js';
import type { DeepReadonly, PostgresConfig } from '../utils/types.js';
import { DatabaseError } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface QueryExecutor {
  query<T>(sql: string, params?: unknown[]): Promise<T[]>;
  queryOne<T>(sql: string, params?: unknown[]): Promise<T | null>;
  execute(sql: string, params?: unknown[]): Promise<number>;
}

export interface DatabaseClient extends QueryExecutor {
  transaction<T>(callback: (tx: QueryExecutor) => Promise<T>): Promise<T>;
  connect(): Promise<void>;
  close(): Promise<void>;
  isConnected(): boolean;
}

// =============================================================================
// Helpers
// =============================================================================

function wrap(prefix: string, error: unknown): DatabaseError {
  const message = error instanceof Error ? error.message : String(error);
  return new DatabaseError(`${prefix}: ${message}`);
}

function taskExecutor(t: ITask<object>): QueryExecutor {
  return {
    query: <T>(sql: string, params?: unknown[]) => t.any<T>(sql, params),
    queryOne: <T>(sql: string, params?: unknown[]) => t.oneOrNone<T>(sql, params),
    execute: async (sql: string, params?: unknown[]) => (await t.result(sql, params)).rowCount,
  };
}

// =============================================================================
// PostgreSQL Client Class
// =============================================================================

export class PostgresClient implements DatabaseClient {
  private pgp: IMain;
  private db: IDatabase<object>;
  private config: DeepReadonly<PostgresConfig>;
  private connected = false;

  constructor(config: DeepReadonly<PostgresConfig>) {
    this.config = config;

    this.pgp = pgPromise({
      capSQL: true,

      // Query events for logging
      query(e) {
        logger.debug('PostgreSQL query', {
          query: String(e.query).substring(0, 200),
        });
      },

      error(err: Error, e) {
        logger.error('PostgreSQL error', {
          error: err.message,
          query: e.query === undefined ? undefined : String(e.query).substring(0, 200),
        });
      },

      // Connection events
      connect(e) {
        logger.debug('PostgreSQL connection established', {
          useCount: e.useCount,
        });
      },

      disconnect() {
        logger.debug('PostgreSQL connection closed');
      },
    });

    const connectionConfig = {
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.poolMax,
      min: config.poolMin,
      idleTimeoutMillis: config.idleTimeoutMs,
      // Pool acquire and connect share this bound
      connectionTimeoutMillis: config.connectTimeoutMs,
      query_timeout: config.queryTimeoutMs,
      application_name: 'gatehouse',
    };

    this.db = this.pgp(connectionConfig);
  }

  /**
   * Test database connection
   */
  public async connect(): Promise<void> {
    try {
      const connection = await this.db.connect();
      void connection.done(); // Release connection back to pool
      this.connected = true;
      logger.info('PostgreSQL connection pool initialized', {
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
        poolMax: this.config.poolMax,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to connect to PostgreSQL', {
        host: this.config.host,
        port: this.config.port,
        error: message,
      });
      throw new DatabaseError(`Failed to connect to PostgreSQL: ${message}`);
    }
  }

  /**
   * Execute a query and return all results
   */
  public async query<T>(sql: string, params?: unknown[]): Promise<T[]> {
    try {
      return await this.db.any<T>(sql, params);
    } catch (error) {
      throw wrap('Query failed', error);
    }
  }

  /**
   * Execute a query and return a single result or null
   */
  public async queryOne<T>(sql: string, params?: unknown[]): Promise<T | null> {
    try {
      return await this.db.oneOrNone<T>(sql, params);
    } catch (error) {
      throw wrap('Query failed', error);
    }
  }

  /**
   * Execute a statement that returns no rows; resolves to the affected row count
   */
  public async execute(sql: string, params?: unknown[]): Promise<number> {
    try {
      const result = await this.db.result(sql, params);
      return result.rowCount;
    } catch (error) {
      throw wrap('Execute failed', error);
    }
  }

  /**
   * Execute multiple statements in a transaction
   */
  public async transaction<T>(callback: (tx: QueryExecutor) => Promise<T>): Promise<T> {
    try {
      return await this.db.tx((t) => callback(taskExecutor(t)));
    } catch (error) {
      throw wrap('Transaction failed', error);
    }
  }

  /**
   * Check if connected to database
   */
  public isConnected(): boolean {
    return this.connected;
  }

  /**
   * Close all connections
   */
  public async close(): Promise<void> {
    this.pgp.end();
    this.connected = false;
    logger.info('PostgreSQL connection pool closed');
  }
}

// =============================================================================
// Singleton Instance
// =============================================================================

let postgresClientInstance: PostgresClient | null = null;

export function getPostgresClient(config?: DeepReadonly<PostgresConfig>): PostgresClient {
  if (postgresClientInstance === null) {
    if (config === undefined) {
      throw new Error('PostgreSQL client not initialized. Provide config on first call.');
    }
    postgresClientInstance = new PostgresClient(config);
  }
  return postgresClientInstance;
}

/**
 * Create the shared pool and verify one connection. A failure is logged and
 * the pool kept: directory lookups fail closed until the database answers.
 */
export async function initializePostgres(config: DeepReadonly<PostgresConfig>): Promise<PostgresClient> {
  const client = getPostgresClient(config);
  try {
    await client.connect();
  } catch (error) {
    logger.warn('PostgreSQL unavailable at startup, authorization will fail closed until it connects', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return client;
}

export async function closePostgres(): Promise<void> {
  if (postgresClientInstance !== null) {
    await postgresClientInstance.close();
    postgresClientInstance = null;
  }
}

export default PostgresClient;
