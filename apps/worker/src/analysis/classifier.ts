import { randomUUID } from "node:crypto";
import {
  daysAfter,
  getLiquidityTier,
  isIgnoredTier,
  wholeDaysUntil,
  type Category,
  type LiquidityTier,
  type Market,
  type PricePoint,
  type Signal,
  type SignalStrength,
  type SignalType
} from "@movewatch/shared";
import type { SignalStore } from "../stores/signals.js";
import { err, ok, toEngineError, type Result } from "../utils/result.js";
import {
  calculateMomentum,
  calculateVolatility,
  isNonDecreasing,
  isNonIncreasing,
  significantChange,
  type Direction,
  type SignificantChange
} from "./statistics.js";

export const MIN_WINDOW_POINTS = 3;
export const MIN_TREND_POINTS = 5;
export const JUMP_MIN_CHANGE = 0.15;
export const VOLATILITY_SPIKE_MIN = 0.1;
export const TREND_MIN_ABSOLUTE_CHANGE = 0.03;
export const SIGNAL_TTL_DAYS = 365;

export const STRENGTH_BANDS: ReadonlyArray<{ strength: SignalStrength; min: number; max: number }> = [
  { strength: "WEAK", min: 0.03, max: 0.08 },
  { strength: "MODERATE", min: 0.08, max: 0.15 },
  { strength: "STRONG", min: 0.15, max: 0.25 },
  { strength: "VERY_STRONG", min: 0.25, max: Number.POSITIVE_INFINITY }
];

export const CONFIDENCE_WEIGHTS = {
  magnitude: 0.3,
  volume: 0.2,
  liquidity: 0.15,
  historicalAccuracy: 0.25,
  timeToResolution: 0.1
} as const;

const MAGNITUDE_SCALE = 0.5;
const VOLUME_SCALE_USD = 1_000_000;
const LIQUIDITY_SCALE_USD = 1_000_000;
const URGENCY_HORIZON_DAYS = 30;
const DEFAULT_ACCURACY = 0.5;
const DEFAULT_URGENCY = 0.5;
const PREDICTION_PRICE_FLOOR = 0.7;

export interface RuleContext {
  prices: readonly number[];
  volatility: number;
  change: SignificantChange;
  trend: SignificantChange;
}

export interface SignalRule {
  name: string;
  type: SignalType;
  matches: (ctx: RuleContext) => boolean;
}

function isMajorMove(ctx: RuleContext, direction: Direction): boolean {
  return ctx.change.significant && ctx.change.change >= JUMP_MIN_CHANGE && ctx.change.direction === direction;
}

function isSustainedTrend(ctx: RuleContext): boolean {
  if (ctx.prices.length < MIN_TREND_POINTS || !ctx.trend.significant) return false;
  if (ctx.trend.direction === "up") return isNonDecreasing(ctx.prices);
  if (ctx.trend.direction === "down") return isNonIncreasing(ctx.prices);
  return false;
}

// First match wins; order is the tie-break.
export const SIGNAL_RULES: readonly SignalRule[] = [
  { name: "major_rise", type: "PRICE_JUMP", matches: (ctx) => isMajorMove(ctx, "up") },
  { name: "major_fall", type: "PRICE_DROP", matches: (ctx) => isMajorMove(ctx, "down") },
  { name: "volatility", type: "VOLATILITY_SPIKE", matches: (ctx) => ctx.volatility >= VOLATILITY_SPIKE_MIN },
  { name: "monotonic_trend", type: "SUSTAINED_TREND", matches: isSustainedTrend }
];

export function determineSignalType(
  ctx: RuleContext,
  rules: readonly SignalRule[] = SIGNAL_RULES
): SignalType | null {
  return rules.find((rule) => rule.matches(ctx))?.type ?? null;
}

export function strengthFor(change: number): SignalStrength {
  const band = STRENGTH_BANDS.find(({ min, max }) => change >= min && change < max);
  if (band) return band.strength;
  return change >= STRENGTH_BANDS[STRENGTH_BANDS.length - 1].min ? "VERY_STRONG" : "WEAK";
}

function unit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export interface ConfidenceInput {
  change: number;
  volume24hUsd: number;
  liquidityUsd: number;
  historicalAccuracy?: number | null;
  endDate?: Date | null;
  now: Date;
}

export function timeToResolutionScore(endDate: Date | null | undefined, now: Date): number {
  if (!endDate || Number.isNaN(endDate.getTime())) return DEFAULT_URGENCY;
  return unit(1 - wholeDaysUntil(now, endDate) / URGENCY_HORIZON_DAYS);
}

export function confidenceScore(input: ConfidenceInput): number {
  const score =
    CONFIDENCE_WEIGHTS.magnitude * unit(input.change / MAGNITUDE_SCALE) +
    CONFIDENCE_WEIGHTS.volume * unit(input.volume24hUsd / VOLUME_SCALE_USD) +
    CONFIDENCE_WEIGHTS.liquidity * unit(input.liquidityUsd / LIQUIDITY_SCALE_USD) +
    CONFIDENCE_WEIGHTS.historicalAccuracy * unit(input.historicalAccuracy ?? DEFAULT_ACCURACY) +
    CONFIDENCE_WEIGHTS.timeToResolution * timeToResolutionScore(input.endDate, input.now);
  return unit(score);
}

export function predictOutcome(
  type: SignalType,
  direction: Direction,
  currentPrice: number,
  trackedOutcome: string
): string | null {
  if (trackedOutcome === "Yes") {
    if (type === "PRICE_JUMP") return "Yes";
    if (type === "PRICE_DROP") return "No";
    if (type === "SUSTAINED_TREND" && direction === "up" && currentPrice > 0.5) return "Yes";
    if (type === "SUSTAINED_TREND" && direction === "down") return "No";
  }

  return currentPrice > PREDICTION_PRICE_FLOOR ? trackedOutcome : null;
}

export interface WindowEvaluation {
  type: SignalType;
  direction: Direction;
  /** Absolute probability-point move; drives the threshold gate, strength and confidence. */
  magnitude: number;
  previousPrice: number;
  volatility: number;
  momentum: number;
}

/** Steps 1–3 of detection: statistics and type assignment for one window of history. */
export function evaluateWindow(currentPrice: number, history: readonly PricePoint[]): WindowEvaluation | null {
  if (history.length < MIN_WINDOW_POINTS) return null;

  const prices = history.map((point) => point.price);
  const previousPrice = prices[0];
  const volatility = calculateVolatility(history);
  const momentum = calculateMomentum(history);
  const change = significantChange(currentPrice, previousPrice);
  const trend = significantChange(currentPrice, previousPrice, TREND_MIN_ABSOLUTE_CHANGE);

  const type = determineSignalType({ prices, volatility, change, trend });
  if (!type) return null;

  return {
    type,
    direction: change.direction,
    magnitude: change.absoluteChange,
    previousPrice,
    volatility,
    momentum
  };
}

export interface ThresholdLookup {
  threshold: number;
  accuracy: number | null;
  source: "adaptive" | "default";
}

export interface MarketThresholds {
  forMarket(categories: readonly Category[], tier: LiquidityTier): Promise<ThresholdLookup>;
}

export interface DetectionInput {
  market: Market;
  windowHours: number;
  history: readonly PricePoint[];
  now: Date;
}

export class SignalClassifier {
  constructor(
    private readonly thresholds: MarketThresholds,
    private readonly signals: SignalStore,
    private readonly newSignalId: () => string = () => `signal_${randomUUID()}`
  ) {}

  /**
   * Builds the signal for one market window without persisting it. A move
   * that clears the type rules but not the threshold is a `threshold_miss`.
   */
  async evaluate(input: DetectionInput): Promise<Result<Signal | null>> {
    const { market, windowHours, history, now } = input;
    const tier = getLiquidityTier(market.liquidityUsd);
    if (isIgnoredTier(tier)) return ok(null);

    const evaluation = evaluateWindow(market.currentPrice, history);
    if (!evaluation) return ok(null);

    const lookup = await this.thresholds.forMarket(market.categories, tier);
    if (evaluation.magnitude < lookup.threshold) {
      return err(
        "threshold_miss",
        `${market.id} ${evaluation.type} ${evaluation.magnitude.toFixed(3)} below ${lookup.threshold.toFixed(3)} (${lookup.source})`
      );
    }

    const confidence = confidenceScore({
      change: evaluation.magnitude,
      volume24hUsd: market.volume24hUsd,
      liquidityUsd: market.liquidityUsd,
      historicalAccuracy: lookup.accuracy,
      endDate: market.endDate,
      now
    });

    return ok({
      marketId: market.id,
      signalId: this.newSignalId(),
      question: market.question,
      slug: market.slug,
      type: evaluation.type,
      strength: strengthFor(evaluation.magnitude),
      windowHours,
      priceChange: evaluation.magnitude,
      currentPrice: market.currentPrice,
      previousPrice: evaluation.previousPrice,
      volatility: evaluation.volatility,
      momentum: evaluation.momentum,
      thresholdUsed: lookup.threshold,
      confidence,
      liquidityUsd: market.liquidityUsd,
      volume24hUsd: market.volume24hUsd,
      liquidityTier: tier,
      categories: [...market.categories],
      trackedOutcome: market.trackedOutcome,
      predictedOutcome: predictOutcome(
        evaluation.type,
        evaluation.direction,
        market.currentPrice,
        market.trackedOutcome
      ),
      detectedAt: now,
      resolution: null
    });
  }

  /** Evaluates and persists. A failed write comes back as `store_unavailable`. */
  async detect(input: DetectionInput): Promise<Result<Signal | null>> {
    const evaluated = await this.evaluate(input);
    if (!evaluated.ok || !evaluated.value) return evaluated;
    const signal = evaluated.value;

    try {
      await this.signals.save(signal, daysAfter(input.now, SIGNAL_TTL_DAYS));
      return ok(signal);
    } catch (error) {
      return err("store_unavailable", `failed to save signal for ${signal.marketId}`, toEngineError("store_unavailable", error));
    }
  }
}
