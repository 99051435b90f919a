/**
 * Database Client
 * Kysely PostgreSQL connection with connection pooling
 */

import { Kysely, PostgresDialect, sql } from 'kysely';
import pg from 'pg';
import type { Database } from './types.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('Database');

// ═══════════════════════════════════════════════════════════════
// DATABASE INSTANCE
// ═══════════════════════════════════════════════════════════════

let db: Kysely<Database> | null = null;

/**
 * Get the open connection. Throws before initDb().
 */
function getDb(): Kysely<Database> {
  if (!db) {
    throw new Error('Database not initialized. Call initDb() first.');
  }
  return db;
}

export async function initDb(connectionString: string): Promise<Kysely<Database>> {
  if (db) {
    logger.info('Database already initialized');
    return db;
  }

  logger.info('Initializing database connection...');

  const dialect = new PostgresDialect({
    pool: new pg.Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    }),
  });

  const instance = new Kysely<Database>({ dialect });

  try {
    await sql`SELECT 1`.execute(instance);
    logger.info('Database connection established successfully');
  } catch (error) {
    logger.error('Failed to connect to database', { error });
    await instance.destroy();
    throw error;
  }

  db = instance;
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    logger.info('Database connection closed');
  }
}

export async function runMigrations(): Promise<void> {
  const database = getDb();

  logger.info('Running database migrations...');

  await database.schema
    .createTable('trade_outcomes')
    .ifNotExists()
    .addColumn('id', 'uuid', (col) =>
      col.primaryKey().defaultTo(sql`gen_random_uuid()`)
    )
    .addColumn('pattern_name', 'varchar(50)')
    .addColumn('breakout', 'varchar(20)', (col) => col.notNull())
    .addColumn('trend', 'varchar(10)', (col) => col.notNull())
    .addColumn('volume_ratio', 'double precision', (col) => col.notNull())
    .addColumn('payout', 'double precision', (col) => col.notNull())
    .addColumn('win', 'boolean', (col) => col.notNull())
    .addColumn('logged_at', 'timestamptz', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.defaultTo(sql`NOW()`))
    .execute();

  await sql`CREATE INDEX IF NOT EXISTS idx_trade_outcomes_logged ON trade_outcomes(logged_at)`.execute(database);

  logger.info('Database migrations completed successfully');
}
