import { daysAfter, type Category, type Market } from "@movewatch/shared";
import type { MarketFeed, RawMarket } from "../providers/base.js";
import { toMarket } from "../providers/parse.js";
import type { MarketStore } from "../stores/markets.js";
import { PRICE_HISTORY_TTL_DAYS, type PriceHistoryStore } from "../stores/price-history.js";
import { EngineError, isStoreOutage, toEngineError } from "../utils/result.js";

export const MARKET_TTL_DAYS = 30;

export interface CollectDeps {
  feed: MarketFeed;
  markets: MarketStore;
  history: PriceHistoryStore;
  classify: (question: string, description: string) => Category[];
}

export interface CollectOptions {
  now: Date;
  minLiquidityUsd: number;
}

export interface CollectSummary {
  fetched: number;
  stored: number;
  malformed: number;
  belowLiquidity: number;
  failed: number;
  feedError: EngineError | null;
}

async function storeMarket(deps: CollectDeps, market: Market, now: Date): Promise<void> {
  await deps.markets.upsert(market, daysAfter(now, MARKET_TTL_DAYS));
  await deps.history.append(
    {
      marketId: market.id,
      outcomeIndex: market.outcomeIndex,
      timestamp: now,
      price: market.currentPrice
    },
    daysAfter(now, PRICE_HISTORY_TTL_DAYS)
  );
}

/**
 * Pulls the active market list, supersedes each market row and appends one
 * price point for its tracked outcome.
 */
export async function runCollection(deps: CollectDeps, options: CollectOptions): Promise<CollectSummary> {
  const summary: CollectSummary = {
    fetched: 0,
    stored: 0,
    malformed: 0,
    belowLiquidity: 0,
    failed: 0,
    feedError: null
  };

  let rawMarkets: RawMarket[];
  try {
    rawMarkets = await deps.feed.fetchActiveMarkets(options.now);
  } catch (error) {
    summary.feedError = toEngineError("upstream", error, `${deps.feed.name} feed unavailable`);
    console.error(`[collect] ${summary.feedError.message}`);
    return summary;
  }

  summary.fetched = rawMarkets.length;
  let lastWriteError: unknown = null;

  for (const raw of rawMarkets) {
    const parsed = toMarket(raw, options.now, deps.classify);
    if (!parsed.ok) {
      summary.malformed += 1;
      console.warn(`[collect] skipping ${parsed.error.message}`);
      continue;
    }

    const market = parsed.value;
    if (market.liquidityUsd < options.minLiquidityUsd) {
      summary.belowLiquidity += 1;
      continue;
    }

    try {
      await storeMarket(deps, market, options.now);
      summary.stored += 1;
    } catch (error) {
      summary.failed += 1;
      lastWriteError = error;
      console.warn(`[collect] failed to store market ${market.id}`, error);
    }
  }

  if (isStoreOutage(summary.failed, summary.stored)) {
    throw toEngineError("store_unavailable", lastWriteError, "market store rejected every write");
  }

  console.info(
    `[collect] ${deps.feed.name}: fetched=${summary.fetched} stored=${summary.stored} malformed=${summary.malformed} below_liquidity=${summary.belowLiquidity} failed=${summary.failed}`
  );
  return summary;
}
