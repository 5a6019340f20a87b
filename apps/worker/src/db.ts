import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Pool } from "pg";
import { config } from "./config.js";
import { poolConfig } from "./pool-config.js";
import { PgAlertStore } from "./stores/alerts.js";
import { PgMarketStore } from "./stores/markets.js";
import { PgPriceHistoryStore } from "./stores/price-history.js";
import { PgResolutionStore } from "./stores/resolutions.js";
import { PgSignalStore } from "./stores/signals.js";
import { PgThresholdRepository } from "./stores/thresholds.js";
import type { Stores } from "./stores/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const pool = new Pool(poolConfig(config));

export function createPgStores(db: Pool = pool): Stores {
  return {
    markets: new PgMarketStore(db),
    history: new PgPriceHistoryStore(db),
    signals: new PgSignalStore(db),
    thresholds: new PgThresholdRepository(db),
    resolutions: new PgResolutionStore(db),
    alerts: new PgAlertStore(db)
  };
}

export async function runMigrations(): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `);

  const sqlDir = path.resolve(__dirname, "../sql");
  const entries = await readdir(sqlDir, { withFileTypes: true });
  const migrations = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(".sql"))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));

  for (const name of migrations) {
    const existing = await pool.query(`SELECT 1 FROM schema_migrations WHERE name = $1`, [name]);
    if (existing.rowCount && existing.rowCount > 0) continue;

    const sql = await readFile(path.join(sqlDir, name), "utf-8");

    // A pooled client keeps BEGIN/COMMIT on one connection.
    const client = await pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(sql);
      await client.query(`INSERT INTO schema_migrations (name) VALUES ($1)`, [name]);
      await client.query("COMMIT");
      console.info(`[migrations] applied ${name}`);
    } catch (error) {
      await client.query("ROLLBACK").catch((rollbackError: unknown) => {
        console.error(`[migrations] rollback failed for ${name}`, rollbackError);
      });
      throw error;
    } finally {
      client.release();
    }
  }
}
