/**
 * Database Connection
 *
 * PostgreSQL through the `postgres` driver with Drizzle ORM for type-safe queries.
 * The connection is opened on first use; tests install an in-process
 * database with setDatabase() instead.
 */

import { readFile } from 'fs/promises';
import postgres from 'postgres';
import { drizzle } from 'drizzle-orm/postgres-js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import * as schema from './schema';
import { getConfig } from '@/utils/config';
import { logger } from '@/utils/logger';

/**
 * Driver-independent database handle. Transactions satisfy it too, so
 * service helpers accept either.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

let sqlClient: postgres.Sql | null = null;
let database: Database | null = null;

export function getDb(): Database {
  if (database) return database;

  const config = getConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  sqlClient = postgres(config.databaseUrl, {
    max: config.dbPoolSize,
    idle_timeout: 20, // Close idle connections after 20 seconds
    connect_timeout: 10,
    ssl: config.nodeEnv === 'production' ? 'require' : false,
  });
  database = drizzle(sqlClient, { schema });
  return database;
}

/**
 * Replace the active database (tests, scripts)
 */
export function setDatabase(db: Database | null): void {
  database = db;
}

/**
 * Apply the DDL file to the configured database.
 *
 * `exec` must accept several statements in one call; postgres' unsafe()
 * does when no parameters are given.
 */
export async function applySchema(
  exec?: (ddl: string) => Promise<unknown>,
  schemaFile: string = getConfig().schemaFile
): Promise<void> {
  const ddl = await readFile(schemaFile, 'utf8');
  if (exec) {
    await exec(ddl);
  } else {
    getDb();
    if (!sqlClient) {
      throw new Error('applySchema needs an explicit executor for an injected database');
    }
    await sqlClient.unsafe(ddl);
  }
  logger.info('Database schema applied', { schemaFile });
}

/**
 * Close the database connection pool
 * Used during graceful shutdown
 */
export async function closeDatabase(): Promise<void> {
  if (sqlClient) {
    await sqlClient.end();
    sqlClient = null;
  }
  database = null;
}
