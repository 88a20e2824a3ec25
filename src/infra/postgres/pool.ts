import { Pool } from "pg";
import { config } from "../../config";
import type { LedgerLogger } from "../../common/logger";

let pool: Pool | null = null;

export function getPool(logger?: LedgerLogger) {
  if (!pool) {
    pool = new Pool({
      connectionString: config.DATABASE_URL,
      application_name: "user-ledger",
      max: config.DB_POOL_SIZE,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
      statement_timeout: config.DB_QUERY_TIMEOUT_MS,
      query_timeout: config.DB_QUERY_TIMEOUT_MS
    });
    // An idle client dropping its connection must not take the process down.
    pool.on("error", (error) => {
      logger?.error({ err: error }, "Idle Postgres client error");
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
