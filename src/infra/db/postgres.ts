import pg from "pg";
import type { Pool as PgPool } from "pg";

const { Pool } = pg;

export function createPostgresPool(connectionString: string): PgPool {
  return new Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30_000,
  });
}
