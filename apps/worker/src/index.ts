import { SignalClassifier } from "./analysis/classifier.js";
import { config } from "./config.js";
import { createPgStores, pool, runMigrations } from "./db.js";
import { TelegramAlertSink } from "./integrations/telegram.js";
import { PolymarketFeed } from "./providers/polymarket.js";
import { expirableStores } from "./stores/index.js";
import { AdaptiveThresholdStore } from "./stores/thresholds.js";
import { ConsoleAlertSink, runAlerts, type AlertSink } from "./tasks/alerts.js";
import { runAnalysisPass } from "./tasks/analyze.js";
import { runCollection } from "./tasks/collect.js";
import { runResolutionPass } from "./tasks/resolutions.js";
import { runRetention } from "./tasks/retention.js";
import { getDefaultCategoryClassifier } from "./utils/categories.js";
import { EngineError, isFatal } from "./utils/result.js";

const stores = createPgStores();
const thresholds = new AdaptiveThresholdStore(stores.thresholds, {
  minSamples: config.THRESHOLD_MIN_SAMPLES
});
const classifier = new SignalClassifier(thresholds, stores.signals);
const categories = getDefaultCategoryClassifier();
const classify = (question: string, description: string) => categories.classify(question, description);

const feed = new PolymarketFeed({
  pageSize: config.FEED_PAGE_SIZE,
  maxPages: config.FEED_MAX_PAGES,
  minLiquidityUsd: config.MIN_LIQUIDITY_USD,
  minVolumeUsd: config.MIN_VOLUME_USD,
  retry: { attempts: config.HTTP_ATTEMPTS, timeoutMs: config.HTTP_TIMEOUT_MS }
});

const telegram = new TelegramAlertSink({
  enabled: config.TELEGRAM_ENABLED,
  mode: config.TELEGRAM_MODE,
  botToken: config.TELEGRAM_BOT_TOKEN,
  chatId: config.TELEGRAM_CHAT_ID,
  apiId: config.TELEGRAM_API_ID,
  apiHash: config.TELEGRAM_API_HASH,
  session: config.TELEGRAM_SESSION,
  target: config.TELEGRAM_TARGET,
  timeoutMs: config.HTTP_TIMEOUT_MS
});
const sink: AlertSink = telegram.configured ? telegram : new ConsoleAlertSink();

let running = false;
let resolving = false;

function logFailure(label: string, error: unknown): void {
  if (error instanceof EngineError) {
    console.error(`[worker] ${label} failed kind=${error.kind} fatal=${isFatal(error)}: ${error.message}`, error.cause);
    return;
  }
  console.error(`[worker] ${label} failed`, error);
}

async function cycle(): Promise<boolean> {
  if (running) {
    console.warn("[worker] skipping cycle: previous cycle still running");
    return true;
  }

  running = true;
  const startedAt = Date.now();
  const now = new Date();

  try {
    const collected = await runCollection(
      { feed, markets: stores.markets, history: stores.history, classify },
      { now, minLiquidityUsd: config.MIN_LIQUIDITY_USD }
    );
    const analyzed = await runAnalysisPass(
      { markets: stores.markets, history: stores.history, classifier },
      {
        now,
        windowsHours: config.ANALYSIS_WINDOWS_HOURS,
        concurrency: config.HISTORY_CONCURRENCY,
        batchSize: config.HISTORY_BATCH_SIZE
      }
    );
    const alerted = await runAlerts({ alerts: stores.alerts, sink }, analyzed.signals, {
      now,
      marketCooldownHours: config.ALERT_MARKET_COOLDOWN_HOURS,
      minSpacingMinutes: config.ALERT_MIN_SPACING_MINUTES,
      maxPerDay: config.ALERT_MAX_PER_DAY
    });

    const elapsedMs = Date.now() - startedAt;
    console.info(
      `[worker] ts=${now.toISOString()} stored=${collected.stored} signals=${analyzed.signals.length} alerts=${alerted.sent} elapsed_ms=${elapsedMs}`
    );
    return collected.feedError === null;
  } catch (error) {
    logFailure("cycle", error);
    return false;
  } finally {
    running = false;
  }
}

async function feedbackCycle(): Promise<boolean> {
  if (resolving) {
    console.warn("[worker] skipping feedback: previous pass still running");
    return true;
  }

  resolving = true;
  const now = new Date();

  try {
    const resolved = await runResolutionPass(
      { feed, signals: stores.signals, resolutions: stores.resolutions, thresholds, classify },
      {
        now,
        lookback: {
          minDaysAgo: config.RESOLUTION_LOOKBACK_MIN_DAYS,
          maxDaysAgo: config.RESOLUTION_LOOKBACK_MAX_DAYS
        }
      }
    );
    const retention = await runRetention(expirableStores(stores), now);
    return resolved.feedError === null && retention.failed.length === 0;
  } catch (error) {
    logFailure("feedback", error);
    return false;
  } finally {
    resolving = false;
  }
}

async function shutdown(code: number): Promise<void> {
  await telegram.close().catch((error: unknown) => {
    console.error("[worker] telegram disconnect failed", error);
  });
  await pool.end().catch((error: unknown) => {
    console.error("[worker] pool shutdown failed", error);
  });
  process.exit(code);
}

async function main(): Promise<void> {
  await runMigrations();
  console.info("[worker] migration complete");

  if (process.argv.includes("--once")) {
    const detected = await cycle();
    const fed = await feedbackCycle();
    await shutdown(detected && fed ? 0 : 1);
    return;
  }

  await cycle();
  await feedbackCycle();
  setInterval(() => void cycle(), config.WORKER_LOOP_INTERVAL_MS);
  setInterval(() => void feedbackCycle(), config.RESOLUTION_INTERVAL_MS);
}

main().catch(async (error: unknown) => {
  logFailure("startup", error);
  await shutdown(1);
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    console.info(`[worker] received ${signal}, shutting down`);
    void shutdown(0);
  });
}
