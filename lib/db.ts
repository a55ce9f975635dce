/**
 * PostgreSQL connection pool for the farmer context store.
 */

import { Pool } from "pg";

let pool: Pool | null = null;

export function getPool(databaseUrl: string): Pool {
  if (pool) return pool;

  pool = new Pool({
    connectionString: databaseUrl,
    ssl: databaseUrl.includes("sslmode=disable") ? false : { rejectUnauthorized: false },
  });

  return pool;
}

/** Rows come back untyped; callers validate the columns they read. */
export type QueryFn = (text: string, params?: unknown[]) => Promise<{ rows: unknown[]; rowCount: number }>;

export function createQuery(databaseUrl: string): QueryFn {
  return async (text, params) => {
    const result = await getPool(databaseUrl).query(text, params);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  };
}
