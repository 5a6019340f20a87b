import type { LiquidityTier } from "./types.js";

export const LOW_LIQUIDITY_USD = 5_000;
export const MEDIUM_LIQUIDITY_USD = 100_000;
export const HIGH_LIQUIDITY_USD = 500_000;

export function getLiquidityTier(liquidityUsd: number): LiquidityTier {
  if (!Number.isFinite(liquidityUsd) || liquidityUsd < LOW_LIQUIDITY_USD) return "very_low";
  if (liquidityUsd < MEDIUM_LIQUIDITY_USD) return "low";
  if (liquidityUsd < HIGH_LIQUIDITY_USD) return "medium";
  return "high";
}

export interface TierDefault {
  threshold: number;
  ignore: boolean;
}

// Static movement thresholds used whenever no adaptive record exists for a tier.
export const TIER_DEFAULTS: Record<LiquidityTier, TierDefault> = {
  very_low: { threshold: 0.2, ignore: true },
  low: { threshold: 0.15, ignore: false },
  medium: { threshold: 0.08, ignore: false },
  high: { threshold: 0.05, ignore: false }
};

export function isIgnoredTier(tier: LiquidityTier): boolean {
  return TIER_DEFAULTS[tier].ignore;
}

export function defaultThreshold(tier: LiquidityTier): number {
  return TIER_DEFAULTS[tier].threshold;
}
