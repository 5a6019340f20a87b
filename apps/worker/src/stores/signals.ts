import {
  isCategory,
  isLiquidityTier,
  isSignalStrength,
  isSignalType,
  type Category,
  type LiquidityTier,
  type Signal,
  type SignalResolution
} from "@movewatch/shared";
import type { Db, Expirable } from "./types.js";

export interface AccuracyTally {
  correct: number;
  samples: number;
}

export interface SignalStore extends Expirable {
  save(signal: Signal, expiresAt: Date): Promise<void>;
  listByMarket(marketId: string): Promise<Signal[]>;
  /** Applies the one allowed post-detection mutation; false when the signal was already resolved. */
  markResolved(marketId: string, signalId: string, resolution: SignalResolution): Promise<boolean>;
  accuracy(category: Category, tier: LiquidityTier): Promise<AccuracyTally>;
}

type SignalRow = {
  market_id: string;
  signal_id: string;
  question: string;
  slug: string | null;
  signal_type: string;
  strength: string;
  window_hours: number;
  price_change: number;
  current_price: number;
  previous_price: number;
  volatility: number;
  momentum: number;
  threshold_used: number;
  confidence: number;
  liquidity_usd: number;
  volume_24h_usd: number;
  liquidity_tier: string;
  categories: string[];
  tracked_outcome: string;
  predicted_outcome: string | null;
  detected_at: Date;
  actual_outcome: string | null;
  was_correct: boolean | null;
  resolved_at: Date | null;
};

function fromRow(row: SignalRow): Signal | null {
  const type = row.signal_type;
  const strength = row.strength;
  const tier = row.liquidity_tier;
  if (!isSignalType(type) || !isSignalStrength(strength) || !isLiquidityTier(tier)) return null;

  const resolution: SignalResolution | null =
    row.actual_outcome !== null && row.was_correct !== null && row.resolved_at !== null
      ? { actualOutcome: row.actual_outcome, wasCorrect: row.was_correct, resolvedAt: row.resolved_at }
      : null;

  return {
    marketId: row.market_id,
    signalId: row.signal_id,
    question: row.question,
    slug: row.slug,
    type,
    strength,
    windowHours: row.window_hours,
    priceChange: row.price_change,
    currentPrice: row.current_price,
    previousPrice: row.previous_price,
    volatility: row.volatility,
    momentum: row.momentum,
    thresholdUsed: row.threshold_used,
    confidence: row.confidence,
    liquidityUsd: row.liquidity_usd,
    volume24hUsd: row.volume_24h_usd,
    liquidityTier: tier,
    categories: (row.categories ?? []).filter(isCategory),
    trackedOutcome: row.tracked_outcome,
    predictedOutcome: row.predicted_outcome,
    detectedAt: row.detected_at,
    resolution
  };
}

export class PgSignalStore implements SignalStore {
  readonly collection = "signals";

  constructor(private readonly db: Db) {}

  async save(signal: Signal, expiresAt: Date): Promise<void> {
    await this.db.query(
      `
        INSERT INTO signals (
          market_id, signal_id, question, slug, signal_type, strength, window_hours,
          price_change, current_price, previous_price, volatility, momentum, threshold_used,
          confidence, liquidity_usd, volume_24h_usd, liquidity_tier, categories,
          tracked_outcome, predicted_outcome, detected_at, expires_at
        )
        VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18,$19,$20,$21,$22)
        ON CONFLICT (market_id, signal_id) DO NOTHING
      `,
      [
        signal.marketId,
        signal.signalId,
        signal.question,
        signal.slug,
        signal.type,
        signal.strength,
        signal.windowHours,
        signal.priceChange,
        signal.currentPrice,
        signal.previousPrice,
        signal.volatility,
        signal.momentum,
        signal.thresholdUsed,
        signal.confidence,
        signal.liquidityUsd,
        signal.volume24hUsd,
        signal.liquidityTier,
        signal.categories,
        signal.trackedOutcome,
        signal.predictedOutcome,
        signal.detectedAt,
        expiresAt
      ]
    );
  }

  async listByMarket(marketId: string): Promise<Signal[]> {
    const result = await this.db.query<SignalRow>(
      `SELECT * FROM signals WHERE market_id = $1 ORDER BY detected_at ASC`,
      [marketId]
    );

    const signals: Signal[] = [];
    for (const row of result.rows) {
      const signal = fromRow(row);
      if (signal) signals.push(signal);
      else console.warn(`[signals] skipping unreadable row ${row.market_id}/${row.signal_id}`);
    }
    return signals;
  }

  async markResolved(marketId: string, signalId: string, resolution: SignalResolution): Promise<boolean> {
    const result = await this.db.query(
      `
        UPDATE signals
        SET actual_outcome = $3, was_correct = $4, resolved_at = $5
        WHERE market_id = $1
          AND signal_id = $2
          AND was_correct IS NULL
      `,
      [marketId, signalId, resolution.actualOutcome, resolution.wasCorrect, resolution.resolvedAt]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async accuracy(category: Category, tier: LiquidityTier): Promise<AccuracyTally> {
    const result = await this.db.query<{ correct: number; samples: number }>(
      `
        SELECT
          COUNT(*) FILTER (WHERE was_correct)::int AS correct,
          COUNT(*)::int AS samples
        FROM signals
        WHERE was_correct IS NOT NULL
          AND liquidity_tier = $2
          AND $1 = ANY(categories)
      `,
      [category, tier]
    );
    const row = result.rows[0];
    return { correct: row?.correct ?? 0, samples: row?.samples ?? 0 };
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = await this.db.query(`DELETE FROM signals WHERE expires_at <= $1`, [now]);
    return result.rowCount ?? 0;
  }
}
