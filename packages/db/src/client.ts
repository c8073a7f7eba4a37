import { sql } from 'drizzle-orm';
import { drizzle, type PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import { config } from '@stockroom/config';
import * as schema from './schema/index.js';

// All custom schemas used by the application.
// Required because Drizzle's relational query API (db.query.*) does not
// schema-qualify table names even when tables are defined via pgSchema().
const SEARCH_PATH = 'auth,warehouse,requisitions,audit,public';

// ─── Connection Pool ──────────────────────────────────────────────────
const queryClient = postgres(config.DATABASE_URL, {
  max: config.DB_POOL_MAX,
  idle_timeout: 20,
  connect_timeout: 10,
  connection: { search_path: SEARCH_PATH },
});

// Drizzle instance with full schema for type-safe queries
export const db = drizzle(queryClient, { schema });

export type Database = typeof db;
export type DbTransaction = Parameters<Parameters<Database['transaction']>[0]>[0];

/** Anything that can run queries: the pooled client or an open transaction. */
export type DbOrTransaction = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

// ─── Lock Timeout Helper ──────────────────────────────────────────────
// Bounds how long any statement in the current transaction waits on a
// row lock. Must be called first inside the transaction.
export async function setLockTimeout(tx: DbOrTransaction, timeoutMs: number): Promise<void> {
  await tx.execute(sql`select set_config('lock_timeout', ${`${timeoutMs}ms`}, true)`);
}

// ─── Migration Client ─────────────────────────────────────────────────
// Separate client for running migrations (not pooled, higher timeout)
export function createMigrationClient() {
  const migrationClient = postgres(config.DATABASE_URL, {
    max: 1,
    connect_timeout: 30,
    connection: { search_path: SEARCH_PATH },
  });
  return { db: drizzle(migrationClient, { schema }), close: () => migrationClient.end() };
}

/** Close the pooled connection (graceful shutdown). */
export async function closeDb(): Promise<void> {
  await queryClient.end({ timeout: 5 });
}

export { schema };
