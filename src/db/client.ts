import { Pool } from "pg";
import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";

let pool: Pool | null = null;
let db: NodePgDatabase | null = null;

function requireDatabaseUrl(): string {
  const url = process.env.DATABASE_URL;
  if (!url) {
    throw new Error("DATABASE_URL is not set in the environment.");
  }
  return url;
}

/** DATABASE_SSL=disable for a local server; hosted Postgres wants TLS. */
function sslOption(): false | { rejectUnauthorized: boolean } {
  return process.env.DATABASE_SSL === "disable" ? false : { rejectUnauthorized: false };
}

export function getPool(): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: requireDatabaseUrl(),
      ssl: sslOption()
    });
  }
  return pool;
}

export function getDb(): NodePgDatabase {
  if (!db) {
    db = drizzle(getPool());
  }
  return db;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}
