import { Pool } from "pg";
import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";
import { sql } from "drizzle-orm";

/**
 * Postgres access for the ingestion jobs.
 *
 * The pool is sized to the worker width so every concurrent worker can hold
 * its own connection without waiting on a sibling.
 */

export function createPool(databaseUrl: string, maxConnections: number): Pool {
  const pool = new Pool({ connectionString: databaseUrl, max: maxConnections });
  pool.on("error", (error) => {
    console.error("[db] Idle client error:", error.message);
  });
  return pool;
}

export function getDb(pool: Pool): NodePgDatabase {
  return drizzle(pool);
}

/**
 * Fails fast when the database cannot be reached.
 */
export async function verifyConnection(pool: Pool): Promise<void> {
  try {
    await getDb(pool).execute(sql`SELECT 1`);
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    throw new Error(`Database not available: ${errorMsg}`, { cause: error });
  }
}
