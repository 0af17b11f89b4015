import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management and
 * bootstrap DDL) and the typed `db` instance (for inserts).
 */
export function createDbClient(databaseUrl: string) {
  const sql = postgres(databaseUrl, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type SqlClient = ReturnType<typeof createDbClient>['sql'];

/**
 * Ensures the warehouse table exists.
 *
 * Lightweight bootstrap for local runs; deployments apply the
 * drizzle-kit migrations generated from `schema.ts` instead.
 */
export async function ensureWarehouseTable(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS analytics_events (
      id          UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      event       VARCHAR(255) NOT NULL,
      params      TEXT         NOT NULL,
      timestamp   TIMESTAMPTZ  NOT NULL,
      created_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_analytics_events_event ON analytics_events (event)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_analytics_events_timestamp ON analytics_events (timestamp)`);
}
