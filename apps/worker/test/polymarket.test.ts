import { describe, expect, it } from "vitest";
import { marketUrl, PolymarketFeed } from "../src/providers/polymarket.js";
import { NOW } from "./support/fixtures.js";

function feedWithPages(pages: unknown[]) {
  const urls: URL[] = [];
  const feed = new PolymarketFeed({
    pageSize: 2,
    maxPages: 5,
    minLiquidityUsd: 1_000,
    minVolumeUsd: 10_000,
    retry: { attempts: 1 },
    fetchPage: async (url) => {
      urls.push(new URL(url));
      return pages[urls.length - 1] ?? [];
    }
  });
  return { feed, urls };
}

describe("PolymarketFeed", () => {
  it("pages until a short page and drops non-object entries", async () => {
    const { feed, urls } = feedWithPages([[{ id: "a" }, "junk"], [{ id: "b" }]]);

    const markets = await feed.fetchActiveMarkets(NOW);

    expect(markets).toEqual([{ id: "a" }, { id: "b" }]);
    expect(urls.map((url) => url.searchParams.get("offset"))).toEqual(["0", "2"]);
    expect(urls[0].searchParams.get("closed")).toBe("false");
    expect(urls[0].searchParams.get("end_date_min")).toBe("2026-02-26");
    expect(urls[0].searchParams.get("liquidity_num_min")).toBe("1000");
  });

  it("asks for closed markets inside the lookback window", async () => {
    const { feed, urls } = feedWithPages([[]]);

    await feed.fetchResolvedMarkets(NOW, { minDaysAgo: 1, maxDaysAgo: 14 });

    expect(urls[0].searchParams.get("closed")).toBe("true");
    expect(urls[0].searchParams.get("end_date_max")).toBe("2026-02-28");
    expect(urls[0].searchParams.get("end_date_min")).toBe("2026-02-15");
  });

  it("rejects a page that is not a list", async () => {
    const { feed } = feedWithPages([{ error: "bad request" }]);
    await expect(feed.fetchActiveMarkets(NOW)).rejects.toThrow("non-array page at offset 0");
  });
});

describe("marketUrl", () => {
  it("links by slug", () => {
    expect(marketUrl("test-market")).toBe("https://polymarket.com/market/test-market");
    expect(marketUrl(null)).toBeNull();
  });
});
