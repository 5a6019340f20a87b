import type { PricePoint } from "@movewatch/shared";
import type { Db, Expirable } from "./types.js";

export const PRICE_HISTORY_TTL_DAYS = 90;

export interface PriceHistoryStore extends Expirable {
  append(point: PricePoint, expiresAt: Date): Promise<void>;
  /** Points at or after `since`, oldest first. */
  query(marketId: string, outcomeIndex: number, since: Date): Promise<PricePoint[]>;
}

type PricePointRow = {
  market_id: string;
  outcome_index: number;
  ts: Date;
  price: number;
};

export class PgPriceHistoryStore implements PriceHistoryStore {
  readonly collection = "price_history";

  constructor(private readonly db: Db) {}

  async append(point: PricePoint, expiresAt: Date): Promise<void> {
    await this.db.query(
      `
        INSERT INTO price_history (market_id, outcome_index, ts, price, expires_at)
        VALUES ($1, $2, $3, $4, $5)
        ON CONFLICT (market_id, outcome_index, ts) DO NOTHING
      `,
      [point.marketId, point.outcomeIndex, point.timestamp, point.price, expiresAt]
    );
  }

  async query(marketId: string, outcomeIndex: number, since: Date): Promise<PricePoint[]> {
    const result = await this.db.query<PricePointRow>(
      `
        SELECT market_id, outcome_index, ts, price
        FROM price_history
        WHERE market_id = $1
          AND outcome_index = $2
          AND ts >= $3
        ORDER BY ts ASC
      `,
      [marketId, outcomeIndex, since]
    );

    return result.rows.map((row) => ({
      marketId: row.market_id,
      outcomeIndex: row.outcome_index,
      timestamp: row.ts,
      price: row.price
    }));
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = await this.db.query(`DELETE FROM price_history WHERE expires_at <= $1`, [now]);
    return result.rowCount ?? 0;
  }
}
