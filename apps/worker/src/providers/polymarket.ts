import { fetchJson, type RetryOptions } from "../utils/retry.js";
import type { MarketFeed, RawMarket, ResolvedLookback } from "./base.js";

const POLYMARKET_MARKETS_URL = "https://gamma-api.polymarket.com/markets";
export const POLYMARKET_MARKET_URL = "https://polymarket.com/market";

export interface PolymarketFeedOptions {
  pageSize: number;
  maxPages: number;
  minLiquidityUsd: number;
  minVolumeUsd: number;
  retry: RetryOptions;
  fetchPage?: (url: string, retry: RetryOptions) => Promise<unknown>;
}

function isRecord(value: unknown): value is RawMarket {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function daysAgo(now: Date, days: number): Date {
  return new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
}

export function marketUrl(slug: string | null): string | null {
  return slug ? `${POLYMARKET_MARKET_URL}/${slug}` : null;
}

export class PolymarketFeed implements MarketFeed {
  readonly name = "polymarket";

  private readonly fetchPage: (url: string, retry: RetryOptions) => Promise<unknown>;

  constructor(private readonly options: PolymarketFeedOptions) {
    this.fetchPage = options.fetchPage ?? fetchJson;
  }

  async fetchActiveMarkets(now: Date): Promise<RawMarket[]> {
    return this.paginate({
      active: "true",
      closed: "false",
      ascending: "false",
      end_date_min: isoDay(daysAgo(now, 3)),
      liquidity_num_min: String(this.options.minLiquidityUsd),
      volume_num_min: String(this.options.minVolumeUsd)
    });
  }

  async fetchResolvedMarkets(now: Date, lookback: ResolvedLookback): Promise<RawMarket[]> {
    return this.paginate({
      closed: "true",
      ascending: "false",
      end_date_max: isoDay(daysAgo(now, lookback.minDaysAgo)),
      end_date_min: isoDay(daysAgo(now, lookback.maxDaysAgo))
    });
  }

  private async paginate(params: Record<string, string>): Promise<RawMarket[]> {
    const markets: RawMarket[] = [];
    const limit = this.options.pageSize;

    for (let page = 0; page < this.options.maxPages; page += 1) {
      const url = new URL(POLYMARKET_MARKETS_URL);
      for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value);
      url.searchParams.set("limit", String(limit));
      url.searchParams.set("offset", String(page * limit));

      const body = await this.fetchPage(url.toString(), this.options.retry);
      if (!Array.isArray(body)) {
        throw new Error(`Polymarket returned a non-array page at offset ${page * limit}`);
      }

      markets.push(...body.filter(isRecord));
      if (body.length < limit) break;
    }

    return markets;
  }
}
