/**
 * Gatehouse - PostgreSQL Directory Service
 * Allow-list lookups over the allowed_ip_addresses and api_tokens tables
 */

import { z } from 'zod';

import { withTimeout } from '../utils/helpers.js';
import logger from '../utils/logger.js';
import { DirectoryUnavailableError, RequestAbortedError } from '../utils/types.js';
import type { DirectoryService, DirectoryVerdict } from './types.js';

// =============================================================================
// Queries
// =============================================================================

const IP_LOOKUP_SQL = 'SELECT status FROM allowed_ip_addresses WHERE ip_address = $1 LIMIT 1';
const TOKEN_LOOKUP_SQL = 'SELECT status FROM api_tokens WHERE token = $1 LIMIT 1';

const StatusRowSchema = z.object({ status: z.string() }).nullable();

/**
 * The single read the directory needs. `PostgresClient` satisfies it; rows
 * are checked against `StatusRowSchema` before use.
 */
export interface StatusLookup {
  queryOne(sql: string, params: unknown[]): Promise<unknown>;
}

export interface PostgresDirectoryOptions {
  /** Upper bound on one lookup, pool acquire included */
  timeoutMs: number;
}

export function toVerdict(row: unknown): DirectoryVerdict {
  const parsed = StatusRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new Error('Unexpected directory row shape');
  }
  if (parsed.data === null) {
    return 'not-found';
  }
  return parsed.data.status === 'active' ? 'active' : 'inactive';
}

// =============================================================================
// Directory Service Class
// =============================================================================

export class PostgresDirectoryService implements DirectoryService {
  private db: StatusLookup;
  private timeoutMs: number;

  constructor(db: StatusLookup, options: PostgresDirectoryOptions) {
    this.db = db;
    this.timeoutMs = options.timeoutMs;
  }

  public lookupIp(ip: string, signal?: AbortSignal): Promise<DirectoryVerdict> {
    return this.lookup(IP_LOOKUP_SQL, ip, 'IP', signal);
  }

  public lookupToken(token: string, signal?: AbortSignal): Promise<DirectoryVerdict> {
    return this.lookup(TOKEN_LOOKUP_SQL, token, 'token', signal);
  }

  private async lookup(
    sql: string,
    value: string,
    subject: 'IP' | 'token',
    signal?: AbortSignal
  ): Promise<DirectoryVerdict> {
    try {
      const row = await withTimeout(this.db.queryOne(sql, [value]), this.timeoutMs, {
        label: `Directory ${subject} lookup`,
        signal,
      });
      return toVerdict(row);
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      // Never log the looked-up value: it may be a credential
      logger.error(`Directory ${subject} lookup failed`, { error: message });
      throw new DirectoryUnavailableError(`Directory ${subject} lookup failed: ${message}`);
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createPostgresDirectory(
  db: StatusLookup,
  options: PostgresDirectoryOptions
): PostgresDirectoryService {
  return new PostgresDirectoryService(db, options);
}

export default PostgresDirectoryService;
