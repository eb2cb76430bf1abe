/**
 * Exchange Timing Classifier
 *
 * Decides whether a currency pair is at a good moment to convert: the rate
 * must sit near its recent high and have risen for enough consecutive
 * sessions. Pure functions; the verdict is recomputed on every check.
 */

import type { PriceSeries, TimingVerdict } from "./types";

// ============================================================================
// Constants
// ============================================================================

/** Default band below the lookback high still counted as "near" (percent) */
export const DEFAULT_HIGH_TOLERANCE_PCT = 2.0;

/**
 * Recommendation labels, one per row of the decision table
 */
export const TimingRecommendation = {
  CONVERT_NOW: "Consider converting now",
  NEAR_HIGH_WEAK_MOMENTUM: "Near high, momentum insufficient - keep watching",
  RISING_BELOW_HIGH: "Rising but not yet at high - may have more room",
  NO_SIGNAL: "No signal",
  INSUFFICIENT_HISTORY: "Insufficient history - no rate data available",
} as const;

export type TimingRecommendation =
  (typeof TimingRecommendation)[keyof typeof TimingRecommendation];

// ============================================================================
// Types
// ============================================================================

/**
 * Result of {@link isRecentHigh}
 */
export interface RecentHighResult {
  nearHigh: boolean;
  /** Highest close within the lookback window (0 for empty history) */
  high: number;
}

/**
 * Inputs for {@link assessTiming}
 */
export interface TimingInput {
  base: string;
  quote: string;
  history: PriceSeries;
  lookbackDays: number;
  consecutiveThreshold: number;
  tolerancePct?: number;
}

// ============================================================================
// Classifier
// ============================================================================

/**
 * Check whether `currentRate` is within `tolerancePct` of the highest close
 * over the last `lookbackDays` points. Uses whatever history exists when it
 * is shorter than the window.
 */
export function isRecentHigh(
  currentRate: number,
  history: PriceSeries,
  lookbackDays: number,
  tolerancePct: number = DEFAULT_HIGH_TOLERANCE_PCT
): RecentHighResult {
  if (history.length === 0 || lookbackDays < 1) {
    return { nearHigh: false, high: 0 };
  }

  const window = history.slice(-Math.min(history.length, lookbackDays));
  const high = Math.max(...window.map((point) => point.close));

  if (high <= 0) {
    return { nearHigh: false, high };
  }

  const threshold = high * (1 - tolerancePct / 100);
  return { nearHigh: currentRate >= threshold, high };
}

/**
 * Count strictly increasing closes walking back from the latest point,
 * stopping at the first flat or falling session.
 */
export function countConsecutiveIncreases(history: PriceSeries): number {
  let count = 0;
  for (let i = history.length - 1; i > 0; i--) {
    const current = history[i];
    const previous = history[i - 1];
    if (!current || !previous || current.close <= previous.close) {
      break;
    }
    count++;
  }
  return count;
}

/**
 * Combine near-high detection and momentum into a timing verdict
 */
export function assessTiming(input: TimingInput): TimingVerdict {
  const { base, quote, history, lookbackDays, consecutiveThreshold } = input;
  const tolerancePct = input.tolerancePct ?? DEFAULT_HIGH_TOLERANCE_PCT;

  const latest = history.at(-1);
  if (!latest) {
    return {
      base,
      quote,
      currentRate: 0,
      isRecentHigh: false,
      lookbackHigh: 0,
      lookbackDays,
      consecutiveIncreases: 0,
      consecutiveThreshold,
      shouldAlert: false,
      recommendation: TimingRecommendation.INSUFFICIENT_HISTORY,
      reasoning: `No ${base}/${quote} rate history was returned`,
    };
  }

  const currentRate = latest.close;
  const { nearHigh, high } = isRecentHigh(currentRate, history, lookbackDays, tolerancePct);
  const consecutive = countConsecutiveIncreases(history);
  const momentum = consecutive >= consecutiveThreshold;

  const nearHighText = nearHigh
    ? `${base}/${quote} at ${currentRate} is near its ${lookbackDays}-day high of ${high}`
    : `${base}/${quote} at ${currentRate} is below its ${lookbackDays}-day high of ${high}`;
  const momentumText = `${consecutive} consecutive increase(s) (threshold ${consecutiveThreshold})`;

  let recommendation: TimingRecommendation;
  if (nearHigh && momentum) {
    recommendation = TimingRecommendation.CONVERT_NOW;
  } else if (nearHigh) {
    recommendation = TimingRecommendation.NEAR_HIGH_WEAK_MOMENTUM;
  } else if (momentum) {
    recommendation = TimingRecommendation.RISING_BELOW_HIGH;
  } else {
    recommendation = TimingRecommendation.NO_SIGNAL;
  }

  return {
    base,
    quote,
    currentRate,
    isRecentHigh: nearHigh,
    lookbackHigh: high,
    lookbackDays,
    consecutiveIncreases: consecutive,
    consecutiveThreshold,
    shouldAlert: nearHigh && momentum,
    recommendation,
    reasoning: `${nearHighText}; ${momentumText}`,
  };
}
