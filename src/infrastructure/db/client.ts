import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management)
 * and the typed `db` instance (for queries).
 */
export function createDbClient(databaseUrl: string) {
  const sql = postgres(databaseUrl, {
    // Registry traffic is a handful of CRUD calls; a small pool is plenty
    max: 5,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type SqlClient = ReturnType<typeof createDbClient>['sql'];

/**
 * Ensures the `endpoints` table exists.
 *
 * drizzle-kit migrations are the production path; this keeps a fresh
 * local database usable on first boot.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS endpoints (
      id          UUID PRIMARY KEY,
      name        VARCHAR(255)  NOT NULL,
      url         VARCHAR(2048) NOT NULL,
      is_active   BOOLEAN       NOT NULL DEFAULT false,
      created_at  TIMESTAMPTZ   NOT NULL DEFAULT NOW(),
      updated_at  TIMESTAMPTZ   NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_endpoints_is_active ON endpoints (is_active)`);
}
