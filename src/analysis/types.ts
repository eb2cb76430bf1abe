/**
 * Shared analysis types
 */

// ============================================================================
// Price data
// ============================================================================

/**
 * One daily close. Series are ordered ascending by timestamp.
 */
export interface PricePoint {
  readonly timestamp: Date;
  readonly close: number;
}

/**
 * Price history for one instrument; may be empty
 */
export type PriceSeries = readonly PricePoint[];

/**
 * Indicator values at the latest close. An absent field means the series
 * was too short for that indicator.
 */
export interface IndicatorSnapshot {
  readonly price: number;
  readonly rsi?: number;
  readonly maLong?: number;
  readonly maShort?: number;
  readonly bias?: number;
}

// ============================================================================
// Signals
// ============================================================================

export enum SignalState {
  NORMAL = "NORMAL",
  CONTRARIAN_BUY = "CONTRARIAN_BUY",
  OVERHEATED = "OVERHEATED",
  THESIS_BROKEN = "THESIS_BROKEN",
}

export enum MarginStatus {
  DETERIORATING = "DETERIORATING",
  STABLE = "STABLE",
  UNAVAILABLE = "UNAVAILABLE",
}

export enum MarketSentiment {
  POSITIVE = "POSITIVE",
  CAUTION = "CAUTION",
}

/**
 * Indicator names reported when a check could not run
 */
export type IndicatorName = "price" | "rsi" | "maLong" | "maShort" | "bias" | "margin";

// ============================================================================
// Timing
// ============================================================================

/**
 * Exchange-timing assessment for one currency pair
 */
export interface TimingVerdict {
  readonly base: string;
  readonly quote: string;
  readonly currentRate: number;
  readonly isRecentHigh: boolean;
  readonly lookbackHigh: number;
  readonly lookbackDays: number;
  readonly consecutiveIncreases: number;
  readonly consecutiveThreshold: number;
  readonly shouldAlert: boolean;
  readonly recommendation: string;
  readonly reasoning: string;
}
