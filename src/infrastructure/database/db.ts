/**
 * Shared PostgreSQL connection pool.
 *
 * DATABASE_URL wins when present (managed Postgres services hand out a single
 * connection string); otherwise the discrete DB_* settings are used.
 */
import { Pool } from "pg";
import type { PoolConfig } from "pg";

import { config } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";

export function buildPoolConfig(db: typeof config.db): PoolConfig {
  const common: PoolConfig = {
    max: db.max,
    idleTimeoutMillis: db.idleTimeoutMs,
    connectionTimeoutMillis: db.connectionTimeoutMs,
  };

  if (db.connectionString) {
    return { ...common, connectionString: db.connectionString };
  }

  return {
    ...common,
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: db.database,
  };
}

export const pool = new Pool(buildPoolConfig(config.db));

pool.on("error", (err) => {
  logger.log("error", "Unexpected PG pool error", {
    message: err.message,
    name: err.name,
  });
});

export async function pingDatabase(): Promise<void> {
  await pool.query("SELECT 1");
}

export async function closePool(): Promise<void> {
  await pool.end();
}
