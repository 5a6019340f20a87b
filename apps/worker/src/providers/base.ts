export type RawMarket = Record<string, unknown>;

export interface ResolvedLookback {
  /** Closest end date to now, in days back. */
  minDaysAgo: number;
  /** Furthest end date from now, in days back. */
  maxDaysAgo: number;
}

export interface MarketFeed {
  readonly name: string;
  fetchActiveMarkets(now: Date): Promise<RawMarket[]>;
  fetchResolvedMarkets(now: Date, lookback: ResolvedLookback): Promise<RawMarket[]>;
}
