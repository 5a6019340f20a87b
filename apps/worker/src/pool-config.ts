import type { PoolConfig } from "pg";
import type { Config } from "./config.js";

export type DatabaseSettings = Pick<
  Config,
  "DATABASE_URL" | "DATABASE_POOL_SIZE" | "DATABASE_CONNECT_TIMEOUT_MS" | "DATABASE_QUERY_TIMEOUT_MS"
>;

// Bounds both the client-side wait and the server-side statement.
export function poolConfig(settings: DatabaseSettings): PoolConfig {
  return {
    connectionString: settings.DATABASE_URL,
    max: settings.DATABASE_POOL_SIZE,
    connectionTimeoutMillis: settings.DATABASE_CONNECT_TIMEOUT_MS,
    query_timeout: settings.DATABASE_QUERY_TIMEOUT_MS,
    statement_timeout: settings.DATABASE_QUERY_TIMEOUT_MS
  };
}
