/**
 * Gatehouse - Database Migration Runner
 * Applies pending schema migrations, one transaction per migration
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

import { loadConfig } from '../../config/loader.js';
import { createChildLogger } from '../../utils/logger.js';
import { PostgresClient, type DatabaseClient } from '../postgres.js';
import * as directorySchema from './001-directory-schema.js';

// =============================================================================
// Types
// =============================================================================

export interface Migration {
  migrationName: string;
  up: string;
}

export interface AppliedMigration {
  name: string;
  applied_at: Date;
}

/** What the runner needs from a database; `PostgresClient` satisfies it */
export interface MigrationExecutor {
  execute(sql: string, params?: unknown[]): Promise<number>;
}

export interface MigrationStore extends MigrationExecutor {
  query(sql: string, params?: unknown[]): Promise<unknown[]>;
  transaction(callback: (tx: MigrationExecutor) => Promise<void>): Promise<void>;
}

const AppliedNamesSchema = z.array(z.object({ name: z.string() }));

export const MIGRATIONS: readonly Migration[] = [directorySchema];

const logger = createChildLogger({ component: 'migrations' });

const MIGRATIONS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    id SERIAL PRIMARY KEY,
    name VARCHAR(255) NOT NULL UNIQUE,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

// =============================================================================
// Migration Runner
// =============================================================================

/**
 * Apply every migration not yet recorded in schema_migrations.
 * Resolves to the names applied by this run, in order.
 */
export async function runMigrations(
  db: MigrationStore,
  migrations: readonly Migration[] = MIGRATIONS
): Promise<string[]> {
  await db.execute(MIGRATIONS_TABLE_SQL);

  const applied = AppliedNamesSchema.parse(await db.query('SELECT name FROM schema_migrations ORDER BY id'));
  const appliedNames = new Set(applied.map((m) => m.name));
  logger.info(`Found ${appliedNames.size} applied migration(s)`);

  const ran: string[] = [];

  for (const migration of migrations) {
    if (appliedNames.has(migration.migrationName)) {
      logger.debug(`Skipping ${migration.migrationName} (already applied)`);
      continue;
    }

    logger.info(`Running migration: ${migration.migrationName}`);

    await db.transaction(async (tx) => {
      await tx.execute(migration.up);
      await tx.execute('INSERT INTO schema_migrations (name) VALUES ($1)', [migration.migrationName]);
    });

    ran.push(migration.migrationName);
  }

  if (ran.length === 0) {
    logger.info('Database is up to date');
  } else {
    logger.info(`Applied ${ran.length} migration(s)`, { migrations: ran });
  }

  return ran;
}

export async function getMigrationStatus(db: DatabaseClient): Promise<AppliedMigration[]> {
  await db.execute(MIGRATIONS_TABLE_SQL);
  return db.query<AppliedMigration>('SELECT name, applied_at FROM schema_migrations ORDER BY id');
}

// =============================================================================
// CLI Entry Point
// =============================================================================

async function main(): Promise<void> {
  loadEnv();
  const command = process.argv[2] ?? 'run';
  const config = await loadConfig();
  const db = new PostgresClient(config.postgres);

  try {
    await db.connect();

    switch (command) {
      case 'run':
        await runMigrations(db);
        break;

      case 'status': {
        const applied = await getMigrationStatus(db);
        const appliedNames = new Set(applied.map((m) => m.name));
        for (const migration of MIGRATIONS) {
          logger.info(
            `${appliedNames.has(migration.migrationName) ? 'applied' : 'pending'}  ${migration.migrationName}`
          );
        }
        break;
      }

      default:
        logger.info('Usage: npm run db:migrate [run|status]');
        break;
    }
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Migration failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
