import type { Market, PricePoint, Signal } from "@movewatch/shared";

export const NOW = new Date("2026-03-01T12:00:00.000Z");

export function hoursAgo(hours: number, from: Date = NOW): Date {
  return new Date(from.getTime() - hours * 3_600_000);
}

export function makeMarket(overrides: Partial<Market> = {}): Market {
  return {
    id: "mkt-1",
    question: "Will the test proposal pass?",
    description: "",
    slug: "test-proposal",
    liquidityUsd: 200_000,
    volume24hUsd: 50_000,
    trackedOutcome: "Yes",
    outcomeIndex: 0,
    categories: ["Politics"],
    currentPrice: 0.5,
    endDate: null,
    updatedAt: NOW,
    ...overrides
  };
}

/** Evenly spaced points ending at `NOW`, oldest first. */
export function series(prices: readonly number[], spanHours: number, marketId = "mkt-1"): PricePoint[] {
  const step = prices.length > 1 ? spanHours / (prices.length - 1) : 0;
  return prices.map((price, index) => ({
    marketId,
    outcomeIndex: 0,
    timestamp: hoursAgo(spanHours - index * step),
    price
  }));
}

export function makeSignal(overrides: Partial<Signal> = {}): Signal {
  return {
    marketId: "mkt-1",
    signalId: "signal-1",
    question: "Will the test proposal pass?",
    slug: "test-proposal",
    type: "PRICE_JUMP",
    strength: "STRONG",
    windowHours: 6,
    priceChange: 0.18,
    currentPrice: 0.58,
    previousPrice: 0.4,
    volatility: 0.05,
    momentum: 0.075,
    thresholdUsed: 0.08,
    confidence: 0.5,
    liquidityUsd: 200_000,
    volume24hUsd: 50_000,
    liquidityTier: "medium",
    categories: ["Politics"],
    trackedOutcome: "Yes",
    predictedOutcome: "Yes",
    detectedAt: NOW,
    resolution: null,
    ...overrides
  };
}
