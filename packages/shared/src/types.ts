export const CATEGORIES = [
  "Politics",
  "Crypto",
  "Tech",
  "Finance",
  "Sports",
  "Entertainment"
] as const;

export type Category = (typeof CATEGORIES)[number];

export const LIQUIDITY_TIERS = ["very_low", "low", "medium", "high"] as const;

export type LiquidityTier = (typeof LIQUIDITY_TIERS)[number];

export const SIGNAL_TYPES = [
  "PRICE_JUMP",
  "PRICE_DROP",
  "SUSTAINED_TREND",
  "VOLATILITY_SPIKE"
] as const;

export type SignalType = (typeof SIGNAL_TYPES)[number];

export const SIGNAL_STRENGTHS = ["WEAK", "MODERATE", "STRONG", "VERY_STRONG"] as const;

export type SignalStrength = (typeof SIGNAL_STRENGTHS)[number];

export interface Market {
  id: string;
  question: string;
  description: string;
  slug: string | null;
  liquidityUsd: number;
  volume24hUsd: number;
  trackedOutcome: string;
  outcomeIndex: number;
  categories: Category[];
  currentPrice: number;
  endDate: Date | null;
  updatedAt: Date;
}

export interface PricePoint {
  marketId: string;
  outcomeIndex: number;
  timestamp: Date;
  price: number;
}

export interface SignalResolution {
  actualOutcome: string;
  wasCorrect: boolean;
  resolvedAt: Date;
}

export interface Signal {
  marketId: string;
  signalId: string;
  question: string;
  slug: string | null;
  type: SignalType;
  strength: SignalStrength;
  windowHours: number;
  /** Absolute probability-point move between the oldest point in the window and the current price. */
  priceChange: number;
  currentPrice: number;
  previousPrice: number;
  volatility: number;
  momentum: number;
  thresholdUsed: number;
  confidence: number;
  liquidityUsd: number;
  volume24hUsd: number;
  liquidityTier: LiquidityTier;
  categories: Category[];
  trackedOutcome: string;
  predictedOutcome: string | null;
  detectedAt: Date;
  resolution: SignalResolution | null;
}

export interface Resolution {
  marketId: string;
  question: string;
  outcome: string;
  resolvedAt: Date;
  endDate: Date | null;
  outcomePrices: Record<string, number>;
  categories: Category[];
}

export interface PerformanceMetrics {
  accuracy: number;
  correct: number;
  samples: number;
}

export interface ThresholdRecord {
  category: Category;
  tier: LiquidityTier;
  baseThreshold: number;
  metrics: PerformanceMetrics;
  updatedAt: Date;
}

export interface AlertRecord {
  marketId: string;
  signalId: string;
  sentAt: Date;
  text: string;
}

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

export function isLiquidityTier(value: string): value is LiquidityTier {
  return (LIQUIDITY_TIERS as readonly string[]).includes(value);
}

export function isSignalType(value: string): value is SignalType {
  return (SIGNAL_TYPES as readonly string[]).includes(value);
}

export function isSignalStrength(value: string): value is SignalStrength {
  return (SIGNAL_STRENGTHS as readonly string[]).includes(value);
}
