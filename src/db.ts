import { Pool, type PoolClient, type PoolConfig } from "pg";
import { getDatabaseUrl, getDbPoolMax } from "./config";
import { logError } from "./observability/logger";
import { getDbFailureCategory } from "./dbRuntime";

/** Anything that can run a single statement: the pool itself or a checked-out client. */
export type Queryable = Pick<PoolClient, "query">;

/**
 * The store handle every component receives at construction. `query` checks out a
 * connection per statement; `connect` hands out a dedicated client for a transaction.
 */
export type DbPool = Pick<Pool, "query" | "connect" | "end">;

export type DbPoolOptions = {
  connectionString?: string;
  max?: number;
};

function buildPoolConfig(options: DbPoolOptions): PoolConfig {
  return {
    connectionString: options.connectionString ?? getDatabaseUrl(),
    max: options.max ?? getDbPoolMax(),
  };
}

export function createDbPool(options: DbPoolOptions = {}): Pool {
  const pool = new Pool(buildPoolConfig(options));
  pool.on("error", (err) => {
    logError("db_pool_error", {
      error: err.message,
      category: getDbFailureCategory(err),
    });
  });
  return pool;
}
