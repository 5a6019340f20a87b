import { clampProbability, type Category, type Market } from "@movewatch/shared";
import { err, ok, type Result } from "../utils/result.js";
import type { RawMarket } from "./base.js";

export interface OutcomePrices {
  outcomes: string[];
  prices: number[];
}

export interface TrackedOutcome {
  label: string;
  index: number;
  price: number;
}

function asArray(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (typeof value === "string") {
    try {
      const parsed: unknown = JSON.parse(value);
      return Array.isArray(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }
  return null;
}

export function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim().length > 0) {
    const numeric = Number(value);
    return Number.isFinite(numeric) ? numeric : null;
  }
  return null;
}

export function toProbability(value: unknown): number | null {
  const numeric = toNumber(value);
  if (numeric === null) return null;
  return clampProbability(numeric > 1 ? numeric / 100 : numeric);
}

export function toText(value: unknown): string | null {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

export function toDate(value: unknown): Date | null {
  if (typeof value !== "string" || value.trim().length === 0) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function marketIdOf(raw: RawMarket): string | null {
  const id = toText(raw["id"]) ?? toText(raw["conditionId"]);
  return id ? id : null;
}

/** Outcome labels and prices, accepting both JSON-encoded strings and arrays. */
export function parseOutcomePrices(raw: RawMarket): Result<OutcomePrices> {
  const outcomesRaw = asArray(raw["outcomes"]);
  const pricesRaw = asArray(raw["outcomePrices"]);
  if (!outcomesRaw || !pricesRaw || outcomesRaw.length === 0) {
    return err("malformed_market", "missing outcomes or outcome prices");
  }
  if (outcomesRaw.length !== pricesRaw.length) {
    return err(
      "malformed_market",
      `outcome count ${outcomesRaw.length} does not match price count ${pricesRaw.length}`
    );
  }

  const outcomes: string[] = [];
  const prices: number[] = [];
  for (const [index, outcome] of outcomesRaw.entries()) {
    const label = toText(outcome);
    const price = toProbability(pricesRaw[index]);
    if (!label || price === null) {
      return err("malformed_market", `unreadable outcome at index ${index}`);
    }
    outcomes.push(label);
    prices.push(price);
  }

  return ok({ outcomes, prices });
}

export function isBinaryYesNo(outcomes: readonly string[]): boolean {
  return outcomes.length === 2 && outcomes.includes("Yes") && outcomes.includes("No");
}

/** Binary markets track "Yes"; others track the highest-priced outcome. */
export function pickTrackedOutcome({ outcomes, prices }: OutcomePrices): TrackedOutcome {
  if (isBinaryYesNo(outcomes)) {
    const index = outcomes.indexOf("Yes");
    return { label: "Yes", index, price: prices[index] };
  }

  let index = 0;
  for (let i = 1; i < prices.length; i += 1) {
    if (prices[i] > prices[index]) index = i;
  }
  return { label: outcomes[index], index, price: prices[index] };
}

export function toMarket(
  raw: RawMarket,
  now: Date,
  classify: (question: string, description: string) => Category[]
): Result<Market> {
  const id = marketIdOf(raw);
  if (!id) return err("malformed_market", "market without an id");

  const parsed = parseOutcomePrices(raw);
  if (!parsed.ok) {
    return err("malformed_market", `market ${id}: ${parsed.error.message}`);
  }

  const question = toText(raw["question"]) ?? toText(raw["title"]) ?? "";
  if (!question) return err("malformed_market", `market ${id}: missing question`);

  const description = toText(raw["description"]) ?? "";
  const slug = toText(raw["slug"]);
  const tracked = pickTrackedOutcome(parsed.value);

  return ok({
    id,
    question,
    description,
    slug: slug ? slug : null,
    liquidityUsd: Math.max(0, toNumber(raw["liquidityNum"]) ?? toNumber(raw["liquidity"]) ?? 0),
    volume24hUsd: Math.max(0, toNumber(raw["volume24hr"]) ?? toNumber(raw["volume24h"]) ?? 0),
    trackedOutcome: tracked.label,
    outcomeIndex: tracked.index,
    categories: classify(question, description),
    currentPrice: tracked.price,
    endDate: toDate(raw["endDate"]),
    updatedAt: now
  });
}
