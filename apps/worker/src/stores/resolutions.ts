import { isCategory, type Resolution } from "@movewatch/shared";
import type { Db, Expirable } from "./types.js";

export interface ResolutionStore extends Expirable {
  get(marketId: string): Promise<Resolution | null>;
  /** Inserts once per market id; false when a resolution already existed. */
  insert(resolution: Resolution, expiresAt: Date): Promise<boolean>;
}

type ResolutionRow = {
  market_id: string;
  question: string;
  outcome: string;
  resolved_at: Date;
  end_date: Date | null;
  outcome_prices: Record<string, number> | null;
  categories: string[];
};

export class PgResolutionStore implements ResolutionStore {
  readonly collection = "resolutions";

  constructor(private readonly db: Db) {}

  async get(marketId: string): Promise<Resolution | null> {
    const result = await this.db.query<ResolutionRow>(
      `
        SELECT market_id, question, outcome, resolved_at, end_date, outcome_prices, categories
        FROM resolutions
        WHERE market_id = $1
      `,
      [marketId]
    );
    const row = result.rows[0];
    if (!row) return null;

    return {
      marketId: row.market_id,
      question: row.question,
      outcome: row.outcome,
      resolvedAt: row.resolved_at,
      endDate: row.end_date,
      outcomePrices: row.outcome_prices ?? {},
      categories: (row.categories ?? []).filter(isCategory)
    };
  }

  async insert(resolution: Resolution, expiresAt: Date): Promise<boolean> {
    const result = await this.db.query(
      `
        INSERT INTO resolutions (
          market_id, question, outcome, resolved_at, end_date, outcome_prices, categories, expires_at
        )
        VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7, $8)
        ON CONFLICT (market_id) DO NOTHING
      `,
      [
        resolution.marketId,
        resolution.question,
        resolution.outcome,
        resolution.resolvedAt,
        resolution.endDate,
        JSON.stringify(resolution.outcomePrices),
        resolution.categories,
        expiresAt
      ]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = await this.db.query(`DELETE FROM resolutions WHERE expires_at <= $1`, [now]);
    return result.rowCount ?? 0;
  }
}
