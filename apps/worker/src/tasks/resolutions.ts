import {
  daysAfter,
  type Category,
  type LiquidityTier,
  type Resolution,
  type Signal,
  type ThresholdRecord
} from "@movewatch/shared";
import type { MarketFeed, RawMarket, ResolvedLookback } from "../providers/base.js";
import { isBinaryYesNo, marketIdOf, parseOutcomePrices, toDate, toText } from "../providers/parse.js";
import type { ResolutionStore } from "../stores/resolutions.js";
import type { SignalStore } from "../stores/signals.js";
import type { AdaptiveThresholdStore } from "../stores/thresholds.js";
import { err, isStoreOutage, ok, toEngineError, type Result } from "../utils/result.js";

export const YES_WIN_PRICE = 0.95;
export const NO_WIN_PRICE = 0.05;
export const MULTI_WIN_PRICE = 0.95;
export const RESOLUTION_TTL_DAYS = 365;

export interface ResolutionDeps {
  feed: MarketFeed;
  signals: SignalStore;
  resolutions: ResolutionStore;
  thresholds: AdaptiveThresholdStore;
  classify: (question: string, description: string) => Category[];
}

export interface ResolutionOptions {
  now: Date;
  lookback: ResolvedLookback;
}

export interface ThresholdKey {
  category: Category;
  tier: LiquidityTier;
}

export type MarketResolution =
  | { status: "already_resolved"; marketId: string }
  | {
      status: "resolved";
      marketId: string;
      outcome: string;
      signalsResolved: number;
      affected: ThresholdKey[];
      resolution: Resolution;
    };

export interface ResolutionSummary {
  fetched: number;
  resolved: number;
  alreadyResolved: number;
  ambiguous: number;
  malformed: number;
  failed: number;
  deferred: number;
  signalsResolved: number;
  thresholds: ThresholdRecord[];
  feedError: string | null;
}

/**
 * Winning outcome of a closed market: the explicit resolution field when
 * present, otherwise a final price past the win cutoffs.
 */
export function determineResolutionOutcome(raw: RawMarket): Result<string> {
  const explicit = toText(raw["resolution"]);
  if (explicit) return ok(explicit);

  const parsed = parseOutcomePrices(raw);
  if (!parsed.ok) return err("ambiguous_resolution", `no resolution field and ${parsed.error.message}`);
  const { outcomes, prices } = parsed.value;

  if (isBinaryYesNo(outcomes)) {
    const yesPrice = prices[outcomes.indexOf("Yes")];
    if (yesPrice > YES_WIN_PRICE) return ok("Yes");
    if (yesPrice < NO_WIN_PRICE) return ok("No");
  }

  let best = 0;
  for (let i = 1; i < prices.length; i += 1) {
    if (prices[i] > prices[best]) best = i;
  }
  if (prices[best] > MULTI_WIN_PRICE) return ok(outcomes[best]);

  return err("ambiguous_resolution", `no outcome priced above ${MULTI_WIN_PRICE}`);
}

export function evaluateSignal(signal: Pick<Signal, "type" | "predictedOutcome">, outcome: string): boolean {
  if (signal.predictedOutcome !== null && signal.predictedOutcome === outcome) return true;
  if (signal.type === "PRICE_JUMP" && outcome === "Yes") return true;
  if (signal.type === "PRICE_DROP" && outcome === "No") return true;
  return false;
}

function outcomePriceMap(raw: RawMarket): Record<string, number> {
  const parsed = parseOutcomePrices(raw);
  if (!parsed.ok) return {};
  const map: Record<string, number> = {};
  parsed.value.outcomes.forEach((outcome, index) => {
    map[outcome] = parsed.value.prices[index];
  });
  return map;
}

async function storeCall<T>(label: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw toEngineError("store_unavailable", error, label);
  }
}

/**
 * Marks the signals of one closed market and builds its resolution row,
 * which the caller writes with `commitResolution` once thresholds are fed.
 * Until that row exists the market is picked up again on every pass, and
 * `affected` covers every signal on it, including ones marked by an
 * earlier, interrupted pass.
 * Store failures throw; everything else comes back as a Result.
 */
export async function processResolvedMarket(
  deps: Pick<ResolutionDeps, "signals" | "resolutions" | "classify">,
  raw: RawMarket,
  now: Date
): Promise<Result<MarketResolution>> {
  const marketId = marketIdOf(raw);
  if (!marketId) return err("malformed_market", "resolved market without an id");

  const existing = await storeCall(`cannot read resolution ${marketId}`, () => deps.resolutions.get(marketId));
  if (existing) return ok({ status: "already_resolved", marketId });

  const outcome = determineResolutionOutcome(raw);
  if (!outcome.ok) return err("ambiguous_resolution", `market ${marketId}: ${outcome.error.message}`);

  const signals = await storeCall(`cannot read signals for ${marketId}`, () => deps.signals.listByMarket(marketId));
  const affected = new Map<string, ThresholdKey>();
  let signalsResolved = 0;

  for (const signal of signals) {
    for (const category of signal.categories) {
      const key: ThresholdKey = { category, tier: signal.liquidityTier };
      affected.set(thresholdKeyId(key), key);
    }
    if (signal.resolution) continue;

    const wasCorrect = evaluateSignal(signal, outcome.value);
    const changed = await storeCall(`cannot resolve signal ${signal.signalId}`, () =>
      deps.signals.markResolved(marketId, signal.signalId, {
        actualOutcome: outcome.value,
        wasCorrect,
        resolvedAt: now
      })
    );
    if (changed) signalsResolved += 1;
  }

  const question = toText(raw["question"]) ?? "";
  const resolution: Resolution = {
    marketId,
    question,
    outcome: outcome.value,
    resolvedAt: now,
    endDate: toDate(raw["endDate"]),
    outcomePrices: outcomePriceMap(raw),
    categories: deps.classify(question, toText(raw["description"]) ?? "")
  };

  return ok({
    status: "resolved",
    marketId,
    outcome: outcome.value,
    signalsResolved,
    affected: [...affected.values()],
    resolution
  });
}

export async function commitResolution(
  deps: Pick<ResolutionDeps, "resolutions">,
  resolution: Resolution,
  now: Date
): Promise<void> {
  await storeCall(`cannot save resolution ${resolution.marketId}`, () =>
    deps.resolutions.insert(resolution, daysAfter(now, RESOLUTION_TTL_DAYS))
  );
}

function thresholdKeyId(key: ThresholdKey): string {
  return `${key.category}|${key.tier}`;
}

/** Recomputes accuracy over every resolved signal of the pair and feeds it to the threshold store. */
export async function recalibrate(
  deps: Pick<ResolutionDeps, "signals" | "thresholds">,
  key: ThresholdKey
): Promise<ThresholdRecord | null> {
  const tally = await deps.signals.accuracy(key.category, key.tier);
  if (tally.samples === 0) return null;

  return deps.thresholds.update(key.category, key.tier, {
    accuracy: tally.correct / tally.samples,
    correct: tally.correct,
    samples: tally.samples
  });
}

export async function runResolutionPass(
  deps: ResolutionDeps,
  options: ResolutionOptions
): Promise<ResolutionSummary> {
  const summary: ResolutionSummary = {
    fetched: 0,
    resolved: 0,
    alreadyResolved: 0,
    ambiguous: 0,
    malformed: 0,
    failed: 0,
    deferred: 0,
    signalsResolved: 0,
    thresholds: [],
    feedError: null
  };

  let rawMarkets: RawMarket[];
  try {
    rawMarkets = await deps.feed.fetchResolvedMarkets(options.now, options.lookback);
  } catch (error) {
    const upstream = toEngineError("upstream", error, `${deps.feed.name} resolved markets unavailable`);
    console.error(`[resolutions] ${upstream.message}`);
    summary.feedError = upstream.message;
    return summary;
  }
  summary.fetched = rawMarkets.length;

  const pending: Array<Extract<MarketResolution, { status: "resolved" }>> = [];
  let lastStoreError: unknown = null;

  for (const raw of rawMarkets) {
    let processed: Result<MarketResolution>;
    try {
      processed = await processResolvedMarket(deps, raw, options.now);
    } catch (error) {
      summary.failed += 1;
      lastStoreError = error;
      console.error(`[resolutions] failed for ${marketIdOf(raw) ?? "unknown market"}`, error);
      continue;
    }

    if (!processed.ok) {
      if (processed.error.kind === "ambiguous_resolution") summary.ambiguous += 1;
      else summary.malformed += 1;
      console.warn(`[resolutions] skipped: ${processed.error.message}`);
      continue;
    }

    if (processed.value.status === "already_resolved") {
      summary.alreadyResolved += 1;
      continue;
    }

    summary.signalsResolved += processed.value.signalsResolved;
    pending.push(processed.value);
  }

  // Each pair is recalibrated once per pass from the full tally.
  const affected = new Map<string, ThresholdKey>();
  for (const market of pending) {
    for (const key of market.affected) affected.set(thresholdKeyId(key), key);
  }

  const failedKeys = new Set<string>();
  for (const [id, key] of affected) {
    try {
      const record = await recalibrate(deps, key);
      if (!record) continue;
      summary.thresholds.push(record);
      console.info(
        `[resolutions] threshold ${key.category}/${key.tier} accuracy=${record.metrics.accuracy.toFixed(3)} samples=${record.metrics.samples} base=${record.baseThreshold.toFixed(4)}`
      );
    } catch (error) {
      failedKeys.add(id);
      console.error(`[resolutions] threshold update failed for ${key.category}/${key.tier}`, error);
    }
  }

  // A market is only closed out once every pair it feeds has been updated.
  for (const market of pending) {
    if (market.affected.some((key) => failedKeys.has(thresholdKeyId(key)))) {
      summary.deferred += 1;
      console.warn(`[resolutions] market=${market.marketId} deferred until its thresholds update`);
      continue;
    }

    try {
      await commitResolution(deps, market.resolution, options.now);
    } catch (error) {
      summary.failed += 1;
      lastStoreError = error;
      console.error(`[resolutions] failed for ${market.marketId}`, error);
      continue;
    }

    summary.resolved += 1;
    console.info(
      `[resolutions] market=${market.marketId} outcome=${market.outcome} signals=${market.signalsResolved}`
    );
  }

  if (isStoreOutage(summary.failed, summary.fetched - summary.failed)) {
    throw toEngineError("store_unavailable", lastStoreError, "no resolved market could be processed");
  }

  console.info(
    `[resolutions] fetched=${summary.fetched} resolved=${summary.resolved} already=${summary.alreadyResolved} ambiguous=${summary.ambiguous} malformed=${summary.malformed} failed=${summary.failed} deferred=${summary.deferred} signals=${summary.signalsResolved} thresholds=${summary.thresholds.length}`
  );
  return summary;
}
