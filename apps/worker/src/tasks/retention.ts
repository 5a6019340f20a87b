import type { Expirable } from "../stores/types.js";

export interface RetentionSummary {
  purged: Record<string, number>;
  failed: string[];
}

/** Deletes expired rows store by store; one failing store does not stop the rest. */
export async function runRetention(stores: readonly Expirable[], now: Date): Promise<RetentionSummary> {
  const summary: RetentionSummary = { purged: {}, failed: [] };

  for (const store of stores) {
    try {
      summary.purged[store.collection] = await store.purgeExpired(now);
    } catch (error) {
      summary.failed.push(store.collection);
      console.error(`[retention] purge failed for ${store.collection}`, error);
    }
  }

  const counts = Object.entries(summary.purged)
    .map(([collection, count]) => `${collection}=${count}`)
    .join(" ");
  console.info(`[retention] ${counts}${summary.failed.length > 0 ? ` failed=${summary.failed.join(",")}` : ""}`);
  return summary;
}
