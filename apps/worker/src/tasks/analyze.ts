import {
  getLiquidityTier,
  hoursBefore,
  isIgnoredTier,
  type Market,
  type PricePoint,
  type Signal
} from "@movewatch/shared";
import type { SignalClassifier } from "../analysis/classifier.js";
import type { MarketStore } from "../stores/markets.js";
import type { PriceHistoryStore } from "../stores/price-history.js";
import { mapInBatches } from "../utils/pool.js";
import { EngineError, isStoreOutage, toEngineError } from "../utils/result.js";

export interface AnalyzeDeps {
  markets: MarketStore;
  history: PriceHistoryStore;
  classifier: SignalClassifier;
}

export interface AnalyzeOptions {
  now: Date;
  windowsHours: readonly number[];
  concurrency: number;
  batchSize: number;
}

export interface AnalyzeSummary {
  markets: number;
  ignored: number;
  windowsAnalyzed: number;
  historyFailures: number;
  thresholdMisses: number;
  saveFailures: number;
  /** Ranked by confidence, then magnitude. */
  signals: Signal[];
}

type MarketHistory = {
  market: Market;
  windows: Array<{ hours: number; points: PricePoint[] }>;
  failures: number;
};

export function rankSignals(signals: readonly Signal[]): Signal[] {
  return [...signals].sort((a, b) => {
    if (b.confidence !== a.confidence) return b.confidence - a.confidence;
    return b.priceChange - a.priceChange;
  });
}

async function loadHistory(
  history: PriceHistoryStore,
  market: Market,
  options: AnalyzeOptions
): Promise<MarketHistory> {
  const windows: MarketHistory["windows"] = [];
  let failures = 0;

  for (const hours of options.windowsHours) {
    try {
      const points = await history.query(market.id, market.outcomeIndex, hoursBefore(options.now, hours));
      windows.push({ hours, points });
    } catch (error) {
      failures += 1;
      console.warn(`[analyze] history unavailable for ${market.id} (${hours}h), treating as empty`, error);
      windows.push({ hours, points: [] });
    }
  }

  return { market, windows, failures };
}

/** One detection pass over every stored market; only a store-wide failure throws. */
export async function runAnalysisPass(deps: AnalyzeDeps, options: AnalyzeOptions): Promise<AnalyzeSummary> {
  let markets: Market[];
  try {
    markets = await deps.markets.list();
  } catch (error) {
    throw toEngineError("store_unavailable", error, "cannot read markets");
  }

  const eligible = markets.filter((market) => !isIgnoredTier(getLiquidityTier(market.liquidityUsd)));
  const histories = await mapInBatches(
    eligible,
    { concurrency: options.concurrency, batchSize: options.batchSize },
    (market) => loadHistory(deps.history, market, options)
  );

  const summary: AnalyzeSummary = {
    markets: markets.length,
    ignored: markets.length - eligible.length,
    windowsAnalyzed: 0,
    historyFailures: 0,
    thresholdMisses: 0,
    saveFailures: 0,
    signals: []
  };
  let lastSaveError: EngineError | null = null;

  for (const { market, windows, failures } of histories) {
    summary.historyFailures += failures;

    for (const window of windows) {
      summary.windowsAnalyzed += 1;
      const detected = await deps.classifier.detect({
        market,
        windowHours: window.hours,
        history: window.points,
        now: options.now
      });

      if (!detected.ok && detected.error.kind === "threshold_miss") {
        summary.thresholdMisses += 1;
        continue;
      }
      if (!detected.ok) {
        summary.saveFailures += 1;
        lastSaveError = detected.error;
        console.warn(`[analyze] ${detected.error.message}`);
        continue;
      }

      const signal = detected.value;
      if (!signal) continue;
      summary.signals.push(signal);
      console.info(
        `[analyze] signal market=${signal.marketId} type=${signal.type} strength=${signal.strength} window=${signal.windowHours}h change=${signal.priceChange.toFixed(3)} confidence=${signal.confidence.toFixed(3)}`
      );
    }
  }

  if (lastSaveError && isStoreOutage(summary.saveFailures, summary.signals.length)) {
    throw lastSaveError;
  }

  summary.signals = rankSignals(summary.signals);
  console.info(
    `[analyze] markets=${summary.markets} ignored=${summary.ignored} windows=${summary.windowsAnalyzed} history_failures=${summary.historyFailures} below_threshold=${summary.thresholdMisses} signals=${summary.signals.length} save_failures=${summary.saveFailures}`
  );
  return summary;
}
