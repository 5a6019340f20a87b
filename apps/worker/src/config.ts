import { existsSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { z } from "zod";

/** Loads the nearest `.env` walking up from this module, then falls back to the cwd lookup. */
function loadEnvUpwards(moduleUrl: string, maxDepth = 8): string | null {
  let dir = path.dirname(fileURLToPath(moduleUrl));

  for (let i = 0; i < maxDepth; i += 1) {
    const envPath = path.join(dir, ".env");
    if (existsSync(envPath)) {
      dotenv.config({ path: envPath });
      return envPath;
    }

    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  dotenv.config();
  return null;
}

loadEnvUpwards(import.meta.url);

const flag = z
  .string()
  .optional()
  .transform((value) => value === "true");

const hoursList = z
  .string()
  .default("1,6,24")
  .transform((value) =>
    value
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .map(Number)
  )
  .pipe(z.array(z.number().positive()).min(1));

const configSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(12),
  DATABASE_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DATABASE_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  WORKER_LOOP_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
  RESOLUTION_INTERVAL_MS: z.coerce.number().int().positive().default(3_600_000),

  FEED_PAGE_SIZE: z.coerce.number().int().positive().default(100),
  FEED_MAX_PAGES: z.coerce.number().int().positive().default(50),
  MIN_LIQUIDITY_USD: z.coerce.number().nonnegative().default(1_000),
  MIN_VOLUME_USD: z.coerce.number().nonnegative().default(10_000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  HTTP_ATTEMPTS: z.coerce.number().int().positive().default(3),

  ANALYSIS_WINDOWS_HOURS: hoursList,
  HISTORY_CONCURRENCY: z.coerce.number().int().positive().default(10),
  HISTORY_BATCH_SIZE: z.coerce.number().int().positive().default(25),

  THRESHOLD_MIN_SAMPLES: z.coerce.number().int().positive().default(5),
  RESOLUTION_LOOKBACK_MIN_DAYS: z.coerce.number().int().nonnegative().default(1),
  RESOLUTION_LOOKBACK_MAX_DAYS: z.coerce.number().int().positive().default(14),

  ALERT_MARKET_COOLDOWN_HOURS: z.coerce.number().positive().default(6),
  ALERT_MIN_SPACING_MINUTES: z.coerce.number().nonnegative().default(15),
  ALERT_MAX_PER_DAY: z.coerce.number().int().positive().default(100),

  TELEGRAM_ENABLED: flag,
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  TELEGRAM_MODE: z.enum(["bot", "user"]).optional(),
  TELEGRAM_API_ID: z.coerce.number().int().positive().optional(),
  TELEGRAM_API_HASH: z.string().optional(),
  TELEGRAM_SESSION: z.string().optional(),
  TELEGRAM_TARGET: z.string().optional()
});

export type Config = z.infer<typeof configSchema>;

// Blank lines in .env mean "unset".
const presentEnv = Object.fromEntries(Object.entries(process.env).filter(([, value]) => value !== ""));

export const config: Config = configSchema.parse(presentEnv);
