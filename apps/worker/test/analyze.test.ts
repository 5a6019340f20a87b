import { daysAfter } from "@movewatch/shared";
import { describe, expect, it } from "vitest";
import { SignalClassifier } from "../src/analysis/classifier.js";
import { AdaptiveThresholdStore } from "../src/stores/thresholds.js";
import { rankSignals, runAnalysisPass } from "../src/tasks/analyze.js";
import { makeMarket, makeSignal, NOW, series } from "./support/fixtures.js";
import { createMemoryStores } from "./support/memory-stores.js";

const options = { now: NOW, windowsHours: [6], concurrency: 2, batchSize: 1 };

async function setup() {
  const stores = createMemoryStores();
  const classifier = new SignalClassifier(new AdaptiveThresholdStore(stores.thresholds), stores.signals);
  const expiresAt = daysAfter(NOW, 30);

  await stores.markets.upsert(makeMarket({ id: "jump", currentPrice: 0.58 }), expiresAt);
  await stores.markets.upsert(makeMarket({ id: "thin", liquidityUsd: 500, currentPrice: 0.58 }), expiresAt);
  await stores.markets.upsert(makeMarket({ id: "offline", currentPrice: 0.58 }), expiresAt);
  for (const id of ["jump", "thin", "offline"]) {
    for (const point of series([0.4, 0.41, 0.58], 6, id)) await stores.history.append(point, expiresAt);
  }
  stores.history.failingMarkets.add("offline");

  return { stores, deps: { markets: stores.markets, history: stores.history, classifier } };
}

describe("runAnalysisPass", () => {
  it("detects signals, skips ignored tiers and treats unreadable history as empty", async () => {
    const { stores, deps } = await setup();

    const summary = await runAnalysisPass(deps, options);

    expect(summary.markets).toBe(3);
    expect(summary.ignored).toBe(1);
    expect(summary.windowsAnalyzed).toBe(2);
    expect(summary.historyFailures).toBe(1);
    expect(summary.thresholdMisses).toBe(0);
    expect(summary.saveFailures).toBe(0);
    expect(summary.signals.map((signal) => [signal.marketId, signal.type])).toEqual([["jump", "PRICE_JUMP"]]);
    expect(stores.signals.rows.size).toBe(1);
  });

  it("counts windows that clear the rules but not the threshold", async () => {
    const stores = createMemoryStores();
    const classifier = new SignalClassifier(new AdaptiveThresholdStore(stores.thresholds), stores.signals);
    const expiresAt = daysAfter(NOW, 30);
    await stores.markets.upsert(makeMarket({ id: "choppy", currentPrice: 0.5 }), expiresAt);
    for (const point of series([0.5, 0.5, 0.8, 0.8, 0.5], 6, "choppy")) await stores.history.append(point, expiresAt);

    const summary = await runAnalysisPass({ markets: stores.markets, history: stores.history, classifier }, options);

    expect(summary.thresholdMisses).toBe(1);
    expect(summary.signals).toEqual([]);
  });

  it("keeps going when a single signal cannot be saved", async () => {
    const { stores, deps } = await setup();
    stores.signals.failWrites = true;

    const summary = await runAnalysisPass(deps, options);

    expect(summary.saveFailures).toBe(1);
    expect(summary.signals).toEqual([]);
  });

  it("fails the run when no signal could be saved", async () => {
    const { stores, deps } = await setup();
    const expiresAt = daysAfter(NOW, 30);
    for (const id of ["jump-2", "jump-3"]) {
      await stores.markets.upsert(makeMarket({ id, currentPrice: 0.58 }), expiresAt);
      for (const point of series([0.4, 0.41, 0.58], 6, id)) await stores.history.append(point, expiresAt);
    }
    stores.signals.failWrites = true;

    await expect(runAnalysisPass(deps, options)).rejects.toMatchObject({ kind: "store_unavailable" });
  });
});

describe("rankSignals", () => {
  it("orders by confidence, then by magnitude", () => {
    const ranked = rankSignals([
      makeSignal({ signalId: "low", confidence: 0.4, priceChange: 0.3 }),
      makeSignal({ signalId: "small", confidence: 0.7, priceChange: 0.1 }),
      makeSignal({ signalId: "big", confidence: 0.7, priceChange: 0.2 })
    ]);
    expect(ranked.map((signal) => signal.signalId)).toEqual(["big", "small", "low"]);
  });
});
