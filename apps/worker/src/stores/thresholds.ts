import {
  daysAfter,
  defaultThreshold,
  isCategory,
  isLiquidityTier,
  type Category,
  type LiquidityTier,
  type ThresholdRecord
} from "@movewatch/shared";
import type { MarketThresholds, ThresholdLookup } from "../analysis/classifier.js";
import type { Db, Expirable } from "./types.js";

export const MIN_THRESHOLD = 0.03;
export const MAX_THRESHOLD = 0.3;
export const LOW_ACCURACY = 0.4;
export const HIGH_ACCURACY = 0.7;
export const RAISE_FACTOR = 1.1;
export const LOWER_FACTOR = 0.95;
export const THRESHOLD_TTL_DAYS = 365;

export interface ThresholdRepository extends Expirable {
  get(category: Category, tier: LiquidityTier): Promise<ThresholdRecord | null>;
  put(record: ThresholdRecord, expiresAt: Date): Promise<void>;
}

export interface AccuracyObservation {
  accuracy: number;
  correct: number;
  samples: number;
}

export function clampThreshold(value: number): number {
  if (!Number.isFinite(value)) return MAX_THRESHOLD;
  return Math.max(MIN_THRESHOLD, Math.min(MAX_THRESHOLD, value));
}

/** Raises the bar after poor accuracy, relaxes it after strong accuracy. */
export function adjustThreshold(current: number, accuracy: number): number {
  if (accuracy < LOW_ACCURACY) return clampThreshold(current * RAISE_FACTOR);
  if (accuracy > HIGH_ACCURACY) return clampThreshold(current * LOWER_FACTOR);
  return clampThreshold(current);
}

export class AdaptiveThresholdStore implements MarketThresholds {
  constructor(
    private readonly repository: ThresholdRepository,
    private readonly options: { minSamples: number; now?: () => Date } = { minSamples: 1 }
  ) {}

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  /** Adaptive threshold for the pair, or the static tier default when no record exists. */
  async get(category: Category, tier: LiquidityTier): Promise<number> {
    const record = await this.repository.get(category, tier);
    return record ? record.baseThreshold : defaultThreshold(tier);
  }

  async forMarket(categories: readonly Category[], tier: LiquidityTier): Promise<ThresholdLookup> {
    const thresholds: number[] = [];
    const accuracies: number[] = [];

    for (const category of categories) {
      try {
        const record = await this.repository.get(category, tier);
        if (!record) continue;
        thresholds.push(record.baseThreshold);
        if (record.metrics.samples > 0) accuracies.push(record.metrics.accuracy);
      } catch (error) {
        console.warn(`[thresholds] read failed for ${category}/${tier}, using default`, error);
      }
    }

    if (thresholds.length === 0) {
      return { threshold: defaultThreshold(tier), accuracy: null, source: "default" };
    }

    return {
      threshold: average(thresholds),
      accuracy: accuracies.length > 0 ? average(accuracies) : null,
      source: "adaptive"
    };
  }

  /**
   * Records the observed accuracy and moves the base threshold. Below
   * `minSamples` resolved signals the threshold itself is held. An
   * observation equal to the stored one is already applied and changes
   * nothing.
   */
  async update(
    category: Category,
    tier: LiquidityTier,
    observation: AccuracyObservation
  ): Promise<ThresholdRecord> {
    const current = await this.repository.get(category, tier);
    if (
      current &&
      current.metrics.samples === observation.samples &&
      current.metrics.correct === observation.correct
    ) {
      return current;
    }

    const base = current ? current.baseThreshold : defaultThreshold(tier);
    const nextThreshold =
      observation.samples >= this.options.minSamples
        ? adjustThreshold(base, observation.accuracy)
        : clampThreshold(base);

    const now = this.now();
    const record: ThresholdRecord = {
      category,
      tier,
      baseThreshold: nextThreshold,
      metrics: {
        accuracy: observation.accuracy,
        correct: observation.correct,
        samples: observation.samples
      },
      updatedAt: now
    };

    await this.repository.put(record, daysAfter(now, THRESHOLD_TTL_DAYS));
    return record;
  }
}

function average(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

type ThresholdRow = {
  category: string;
  liquidity_tier: string;
  base_threshold: number;
  accuracy: number;
  correct_count: number;
  sample_count: number;
  updated_at: Date;
};

export class PgThresholdRepository implements ThresholdRepository {
  readonly collection = "thresholds";

  constructor(private readonly db: Db) {}

  async get(category: Category, tier: LiquidityTier): Promise<ThresholdRecord | null> {
    const result = await this.db.query<ThresholdRow>(
      `
        SELECT category, liquidity_tier, base_threshold, accuracy, correct_count, sample_count, updated_at
        FROM thresholds
        WHERE category = $1 AND liquidity_tier = $2
      `,
      [category, tier]
    );
    const row = result.rows[0];
    if (!row || !isCategory(row.category) || !isLiquidityTier(row.liquidity_tier)) return null;

    return {
      category: row.category,
      tier: row.liquidity_tier,
      baseThreshold: row.base_threshold,
      metrics: {
        accuracy: row.accuracy,
        correct: row.correct_count,
        samples: row.sample_count
      },
      updatedAt: row.updated_at
    };
  }

  async put(record: ThresholdRecord, expiresAt: Date): Promise<void> {
    await this.db.query(
      `
        INSERT INTO thresholds (
          category, liquidity_tier, base_threshold, accuracy, correct_count, sample_count, updated_at, expires_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
        ON CONFLICT (category, liquidity_tier)
        DO UPDATE SET
          base_threshold = EXCLUDED.base_threshold,
          accuracy = EXCLUDED.accuracy,
          correct_count = EXCLUDED.correct_count,
          sample_count = EXCLUDED.sample_count,
          updated_at = EXCLUDED.updated_at,
          expires_at = EXCLUDED.expires_at
      `,
      [
        record.category,
        record.tier,
        record.baseThreshold,
        record.metrics.accuracy,
        record.metrics.correct,
        record.metrics.samples,
        record.updatedAt,
        expiresAt
      ]
    );
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = await this.db.query(`DELETE FROM thresholds WHERE expires_at <= $1`, [now]);
    return result.rowCount ?? 0;
  }
}
