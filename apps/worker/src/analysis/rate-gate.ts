import type { Signal } from "@movewatch/shared";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export interface RateGateOptions {
  marketCooldownHours: number;
  minSpacingMinutes: number;
  maxPerDay: number;
}

export const DEFAULT_RATE_GATE: RateGateOptions = {
  marketCooldownHours: 6,
  minSpacingMinutes: 15,
  maxPerDay: 100
};

export type SuppressionReason = "market_cooldown" | "min_spacing" | "daily_cap";

export interface SentAlert {
  marketId: string;
  sentAt: Date;
}

export type GateDecision = { allowed: true } | { allowed: false; reason: SuppressionReason };

/** How far back the gate needs alert history to decide. */
export function gateLookbackMs(options: RateGateOptions): number {
  return Math.max(DAY_MS, options.marketCooldownHours * HOUR_MS, options.minSpacingMinutes * MINUTE_MS);
}

export function evaluateAlert(
  marketId: string,
  sent: readonly SentAlert[],
  now: Date,
  options: RateGateOptions
): GateDecision {
  const nowMs = now.getTime();

  const cooldownStart = nowMs - options.marketCooldownHours * HOUR_MS;
  if (sent.some((alert) => alert.marketId === marketId && alert.sentAt.getTime() > cooldownStart)) {
    return { allowed: false, reason: "market_cooldown" };
  }

  const spacingStart = nowMs - options.minSpacingMinutes * MINUTE_MS;
  if (sent.some((alert) => alert.sentAt.getTime() > spacingStart)) {
    return { allowed: false, reason: "min_spacing" };
  }

  const dayStart = nowMs - DAY_MS;
  const sentToday = sent.filter((alert) => alert.sentAt.getTime() > dayStart).length;
  if (sentToday >= options.maxPerDay) {
    return { allowed: false, reason: "daily_cap" };
  }

  return { allowed: true };
}

export interface GateSelection {
  selected: Signal[];
  suppressed: Array<{ signal: Signal; reason: SuppressionReason | "superseded" }>;
}

/**
 * Walks ranked signals, keeping the best per market and admitting each one
 * the gate allows. Admitted alerts count against the rest of the list.
 */
export function selectAlerts(
  ranked: readonly Signal[],
  sent: readonly SentAlert[],
  now: Date,
  options: RateGateOptions
): GateSelection {
  const history: SentAlert[] = [...sent];
  const seenMarkets = new Set<string>();
  const selection: GateSelection = { selected: [], suppressed: [] };

  for (const signal of ranked) {
    if (seenMarkets.has(signal.marketId)) {
      selection.suppressed.push({ signal, reason: "superseded" });
      continue;
    }
    seenMarkets.add(signal.marketId);

    const decision = evaluateAlert(signal.marketId, history, now, options);
    if (!decision.allowed) {
      selection.suppressed.push({ signal, reason: decision.reason });
      continue;
    }

    selection.selected.push(signal);
    history.push({ marketId: signal.marketId, sentAt: now });
  }

  return selection;
}
