import { isCategory, type Market } from "@movewatch/shared";
import type { Db, Expirable } from "./types.js";

export interface MarketStore extends Expirable {
  upsert(market: Market, expiresAt: Date): Promise<void>;
  get(marketId: string): Promise<Market | null>;
  list(): Promise<Market[]>;
}

type MarketRow = {
  market_id: string;
  question: string;
  description: string;
  slug: string | null;
  liquidity_usd: number;
  volume_24h_usd: number;
  tracked_outcome: string;
  outcome_index: number;
  categories: string[];
  current_price: number;
  end_date: Date | null;
  updated_at: Date;
};

const SELECT_COLUMNS = `
  market_id, question, description, slug, liquidity_usd, volume_24h_usd,
  tracked_outcome, outcome_index, categories, current_price, end_date, updated_at
`;

function fromRow(row: MarketRow): Market {
  return {
    id: row.market_id,
    question: row.question,
    description: row.description,
    slug: row.slug,
    liquidityUsd: row.liquidity_usd,
    volume24hUsd: row.volume_24h_usd,
    trackedOutcome: row.tracked_outcome,
    outcomeIndex: row.outcome_index,
    categories: (row.categories ?? []).filter(isCategory),
    currentPrice: row.current_price,
    endDate: row.end_date,
    updatedAt: row.updated_at
  };
}

export class PgMarketStore implements MarketStore {
  readonly collection = "markets";

  constructor(private readonly db: Db) {}

  async upsert(market: Market, expiresAt: Date): Promise<void> {
    await this.db.query(
      `
        INSERT INTO markets (
          market_id, question, description, slug, liquidity_usd, volume_24h_usd,
          tracked_outcome, outcome_index, categories, current_price, end_date, updated_at, expires_at
        )
        VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13)
        ON CONFLICT (market_id)
        DO UPDATE SET
          question = EXCLUDED.question,
          description = EXCLUDED.description,
          slug = EXCLUDED.slug,
          liquidity_usd = EXCLUDED.liquidity_usd,
          volume_24h_usd = EXCLUDED.volume_24h_usd,
          tracked_outcome = EXCLUDED.tracked_outcome,
          outcome_index = EXCLUDED.outcome_index,
          categories = EXCLUDED.categories,
          current_price = EXCLUDED.current_price,
          end_date = EXCLUDED.end_date,
          updated_at = EXCLUDED.updated_at,
          expires_at = EXCLUDED.expires_at
      `,
      [
        market.id,
        market.question,
        market.description,
        market.slug,
        market.liquidityUsd,
        market.volume24hUsd,
        market.trackedOutcome,
        market.outcomeIndex,
        market.categories,
        market.currentPrice,
        market.endDate,
        market.updatedAt,
        expiresAt
      ]
    );
  }

  async get(marketId: string): Promise<Market | null> {
    const result = await this.db.query<MarketRow>(
      `SELECT ${SELECT_COLUMNS} FROM markets WHERE market_id = $1`,
      [marketId]
    );
    const row = result.rows[0];
    return row ? fromRow(row) : null;
  }

  async list(): Promise<Market[]> {
    const result = await this.db.query<MarketRow>(
      `SELECT ${SELECT_COLUMNS} FROM markets WHERE expires_at > now() ORDER BY market_id`
    );
    return result.rows.map(fromRow);
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = await this.db.query(`DELETE FROM markets WHERE expires_at <= $1`, [now]);
    return result.rowCount ?? 0;
  }
}
