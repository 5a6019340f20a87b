import type { Category } from "@movewatch/shared";
import { describe, expect, it } from "vitest";
import { AdaptiveThresholdStore } from "../src/stores/thresholds.js";
import {
  determineResolutionOutcome,
  evaluateSignal,
  runResolutionPass,
  type ResolutionDeps
} from "../src/tasks/resolutions.js";
import { FakeFeed } from "./support/fake-feed.js";
import { makeSignal, NOW } from "./support/fixtures.js";
import { createMemoryStores } from "./support/memory-stores.js";

describe("determineResolutionOutcome", () => {
  it("prefers the explicit resolution field", () => {
    expect(determineResolutionOutcome({ resolution: "No", outcomes: '["Yes","No"]', outcomePrices: '["0.99","0.01"]' })).toEqual({
      ok: true,
      value: "No"
    });
  });

  it("reads binary winners from the final Yes price", () => {
    expect(determineResolutionOutcome({ outcomes: '["Yes","No"]', outcomePrices: '["0.97","0.03"]' })).toEqual({
      ok: true,
      value: "Yes"
    });
    expect(determineResolutionOutcome({ outcomes: ["Yes", "No"], outcomePrices: ["0.02", "0.98"] })).toEqual({
      ok: true,
      value: "No"
    });
  });

  it("reads multi-outcome winners above 0.95", () => {
    const result = determineResolutionOutcome({
      outcomes: ["Team A", "Team B", "Team C"],
      outcomePrices: ["0.01", "0.96", "0.03"]
    });
    expect(result).toEqual({ ok: true, value: "Team B" });
  });

  it("reports an undecided market as ambiguous", () => {
    const result = determineResolutionOutcome({ outcomes: ["Yes", "No"], outcomePrices: ["0.5", "0.5"] });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("ambiguous_resolution");
  });
});

describe("evaluateSignal", () => {
  it("counts a matching prediction or a move in the winning direction", () => {
    expect(evaluateSignal({ type: "VOLATILITY_SPIKE", predictedOutcome: "Team A" }, "Team A")).toBe(true);
    expect(evaluateSignal({ type: "PRICE_DROP", predictedOutcome: null }, "No")).toBe(true);
    expect(evaluateSignal({ type: "PRICE_JUMP", predictedOutcome: "Yes" }, "No")).toBe(false);
    expect(evaluateSignal({ type: "SUSTAINED_TREND", predictedOutcome: null }, "Yes")).toBe(false);
  });
});

describe("runResolutionPass", () => {
  const lookback = { minDaysAgo: 1, maxDaysAgo: 14 };

  function setup(minSamples: number) {
    const stores = createMemoryStores();
    const feed = new FakeFeed();
    const thresholds = new AdaptiveThresholdStore(stores.thresholds, { minSamples, now: () => NOW });
    const deps: ResolutionDeps = {
      feed,
      signals: stores.signals,
      resolutions: stores.resolutions,
      thresholds,
      classify: (): Category[] => ["Crypto"]
    };
    return { stores, feed, deps };
  }

  const m2Closed = {
    id: "M2",
    question: "Will the test token close above its launch price?",
    outcomes: ["Yes", "No"],
    outcomePrices: ["0.01", "0.99"],
    endDate: "2026-02-28T00:00:00Z"
  };

  it("marks a wrong PRICE_JUMP and holds the threshold on a single sample", async () => {
    const { stores, feed, deps } = setup(5);
    await stores.signals.save(
      makeSignal({ marketId: "M2", signalId: "s1", categories: ["Crypto"], liquidityTier: "medium" }),
      NOW
    );
    feed.resolved = [m2Closed];

    const summary = await runResolutionPass(deps, { now: NOW, lookback });

    expect(summary.resolved).toBe(1);
    expect(summary.signalsResolved).toBe(1);
    const [signal] = await stores.signals.listByMarket("M2");
    expect(signal.resolution).toEqual({ actualOutcome: "No", wasCorrect: false, resolvedAt: NOW });

    expect(summary.thresholds).toHaveLength(1);
    expect(summary.thresholds[0].baseThreshold).toBe(0.08);
    expect(summary.thresholds[0].metrics).toEqual({ accuracy: 0, correct: 0, samples: 1 });

    const stored = await stores.resolutions.get("M2");
    expect(stored?.outcome).toBe("No");
    expect(stored?.outcomePrices).toEqual({ Yes: 0.01, No: 0.99 });
    expect(stored?.categories).toEqual(["Crypto"]);
    expect(feed.lookbacks).toEqual([lookback]);
  });

  it("raises the threshold once the sample minimum is met", async () => {
    const { stores, feed, deps } = setup(1);
    await stores.signals.save(makeSignal({ marketId: "M2", signalId: "s1", categories: ["Crypto"] }), NOW);
    feed.resolved = [m2Closed];

    const summary = await runResolutionPass(deps, { now: NOW, lookback });

    expect(summary.thresholds[0].baseThreshold).toBeCloseTo(0.088, 10);
  });

  it("skips markets that were already resolved", async () => {
    const { stores, feed, deps } = setup(5);
    await stores.signals.save(makeSignal({ marketId: "M2", signalId: "s1" }), NOW);
    feed.resolved = [m2Closed];

    await runResolutionPass(deps, { now: NOW, lookback });
    const second = await runResolutionPass(deps, { now: NOW, lookback });

    expect(second.resolved).toBe(0);
    expect(second.alreadyResolved).toBe(1);
    expect(second.signalsResolved).toBe(0);
    expect(second.thresholds).toHaveLength(0);
  });

  it("feeds thresholds on the retry after the resolution write failed", async () => {
    const { stores, feed, deps } = setup(1);
    await stores.signals.save(makeSignal({ marketId: "M2", signalId: "s1", categories: ["Crypto"] }), NOW);
    feed.resolved = [m2Closed];
    stores.resolutions.failInserts = 1;

    const first = await runResolutionPass(deps, { now: NOW, lookback });

    expect(first.failed).toBe(1);
    expect(first.resolved).toBe(0);
    expect(await stores.resolutions.get("M2")).toBeNull();

    const second = await runResolutionPass(deps, { now: NOW, lookback });

    expect(second.resolved).toBe(1);
    expect(second.signalsResolved).toBe(0);
    expect(second.thresholds).toHaveLength(1);
    expect(second.thresholds[0].baseThreshold).toBeCloseTo(0.088, 10);
    expect((await stores.thresholds.get("Crypto", "medium"))?.baseThreshold).toBeCloseTo(0.088, 10);
    expect((await stores.resolutions.get("M2"))?.outcome).toBe("No");
  });

  it("defers the resolution until the threshold update goes through", async () => {
    const { stores, feed, deps } = setup(1);
    await stores.signals.save(makeSignal({ marketId: "M2", signalId: "s1", categories: ["Crypto"] }), NOW);
    feed.resolved = [m2Closed];
    stores.thresholds.failPuts = 1;

    const first = await runResolutionPass(deps, { now: NOW, lookback });

    expect(first.deferred).toBe(1);
    expect(first.resolved).toBe(0);
    expect(first.thresholds).toEqual([]);
    expect(await stores.resolutions.get("M2")).toBeNull();

    const second = await runResolutionPass(deps, { now: NOW, lookback });

    expect(second.deferred).toBe(0);
    expect(second.resolved).toBe(1);
    expect((await stores.thresholds.get("Crypto", "medium"))?.baseThreshold).toBeCloseTo(0.088, 10);
    expect((await stores.resolutions.get("M2"))?.outcome).toBe("No");
  });

  it("fails the pass once every resolution write is rejected", async () => {
    const { stores, feed, deps } = setup(5);
    feed.resolved = ["M4", "M5", "M6"].map((id) => ({ ...m2Closed, id }));
    stores.resolutions.failInserts = 3;

    await expect(runResolutionPass(deps, { now: NOW, lookback })).rejects.toMatchObject({
      kind: "store_unavailable",
      message: "cannot save resolution M6: connection reset"
    });
  });

  it("leaves ambiguous markets for a later pass", async () => {
    const { stores, feed, deps } = setup(5);
    feed.resolved = [{ id: "M3", question: "Undecided?", outcomes: ["Yes", "No"], outcomePrices: ["0.6", "0.4"] }];

    const summary = await runResolutionPass(deps, { now: NOW, lookback });

    expect(summary.ambiguous).toBe(1);
    expect(await stores.resolutions.get("M3")).toBeNull();
  });

  it("reports a feed failure without throwing", async () => {
    const { feed, deps } = setup(5);
    feed.error = new Error("gateway timeout");

    const summary = await runResolutionPass(deps, { now: NOW, lookback });

    expect(summary.fetched).toBe(0);
    expect(summary.feedError).toBe("fake resolved markets unavailable: gateway timeout");
  });
});
