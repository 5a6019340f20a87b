import { hoursBetween, type PricePoint } from "@movewatch/shared";

export const DEFAULT_MIN_ABSOLUTE_CHANGE = 0.05;
export const MIN_RELATIVE_CHANGE = 0.15;
// Below this reference price relative change is numerically unstable, so only the absolute move counts.
export const LOW_REFERENCE_PRICE = 0.1;
export const DEFAULT_MOMENTUM_WINDOW = 3;
const CHANGE_PRECISION = 1e10;

export type Direction = "up" | "down" | "flat";

export interface SignificantChange {
  significant: boolean;
  /** Value compared against the cutoffs: |Δ| on the absolute path, max(|Δ|, |Δ|/reference) otherwise. */
  change: number;
  absoluteChange: number;
  relativeChange: number;
  basis: "absolute" | "relative";
  direction: Direction;
}

// Probability deltas like 0.09 - 0.04 carry float noise that would flip inclusive cutoffs.
export function roundChange(value: number): number {
  return Math.round(value * CHANGE_PRECISION) / CHANGE_PRECISION;
}

function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const squared = values.reduce((sum, value) => sum + (value - mean) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

export function relativeChanges(prices: readonly number[]): number[] {
  const changes: number[] = [];
  for (let i = 1; i < prices.length; i += 1) {
    const previous = prices[i - 1];
    changes.push(previous > 0 ? Math.abs(prices[i] - previous) / previous : 0);
  }
  return changes;
}

/** Sample standard deviation of successive relative price changes. */
export function calculateVolatility(points: readonly PricePoint[]): number {
  const changes = relativeChanges(points.map((point) => point.price));
  if (changes.length < 2) return 0;
  const value = sampleStdDev(changes);
  return Number.isFinite(value) ? value : 0;
}

/**
 * Mean rate of relative change per hour across every run of `windowSize`
 * consecutive points. Runs with no elapsed time or a zero starting price are skipped.
 */
export function calculateMomentum(
  points: readonly PricePoint[],
  windowSize = DEFAULT_MOMENTUM_WINDOW
): number {
  const size = Math.max(2, Math.floor(windowSize));
  if (points.length < size) return 0;

  const rates: number[] = [];
  for (let i = 0; i + size - 1 < points.length; i += 1) {
    const start = points[i];
    const end = points[i + size - 1];
    const elapsedHours = hoursBetween(start.timestamp, end.timestamp);
    if (elapsedHours <= 0 || start.price <= 0) continue;
    rates.push((end.price - start.price) / start.price / elapsedHours);
  }

  if (rates.length === 0) return 0;
  return rates.reduce((sum, rate) => sum + rate, 0) / rates.length;
}

export function significantChange(
  current: number,
  reference: number,
  minAbsoluteChange = DEFAULT_MIN_ABSOLUTE_CHANGE
): SignificantChange {
  const delta = current - reference;
  const absoluteChange = roundChange(Math.abs(delta));
  const relativeChange = reference > 0 ? roundChange(absoluteChange / reference) : 0;
  const direction: Direction = delta > 0 ? "up" : delta < 0 ? "down" : "flat";

  if (reference < LOW_REFERENCE_PRICE) {
    return {
      significant: absoluteChange >= minAbsoluteChange,
      change: absoluteChange,
      absoluteChange,
      relativeChange,
      basis: "absolute",
      direction
    };
  }

  const useRelative = relativeChange > absoluteChange;
  return {
    significant: absoluteChange >= minAbsoluteChange || relativeChange >= MIN_RELATIVE_CHANGE,
    change: useRelative ? relativeChange : absoluteChange,
    absoluteChange,
    relativeChange,
    basis: useRelative ? "relative" : "absolute",
    direction
  };
}

export function isNonDecreasing(prices: readonly number[]): boolean {
  for (let i = 1; i < prices.length; i += 1) {
    if (prices[i] < prices[i - 1]) return false;
  }
  return true;
}

export function isNonIncreasing(prices: readonly number[]): boolean {
  for (let i = 1; i < prices.length; i += 1) {
    if (prices[i] > prices[i - 1]) return false;
  }
  return true;
}
