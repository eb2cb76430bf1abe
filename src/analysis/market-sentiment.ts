/**
 * Market sentiment from breadth: the share of tracked instruments trading
 * below their short moving average.
 */

import type { IndicatorSnapshot } from "./types";
import { MarketSentiment } from "./types";

/**
 * Context handed to the signal classifier; computed by the caller once per
 * scan cycle.
 */
export interface SentimentContext {
  sentiment: MarketSentiment;
  /** Instruments below their short MA / instruments with a short MA */
  belowShortMaRatio: number;
  /** Instruments that had a short MA */
  sampleSize: number;
}

/**
 * Derive market sentiment from the universe's snapshots.
 *
 * Snapshots without a short MA are left out of the ratio. Returns undefined
 * when no snapshot has one, so the gate stays off instead of guessing.
 */
export function determineMarketSentiment(
  snapshots: readonly IndicatorSnapshot[],
  cautionRatio: number
): SentimentContext | undefined {
  let sampleSize = 0;
  let below = 0;

  for (const snapshot of snapshots) {
    if (snapshot.maShort === undefined) {
      continue;
    }
    sampleSize++;
    if (snapshot.price < snapshot.maShort) {
      below++;
    }
  }

  if (sampleSize === 0) {
    return undefined;
  }

  const belowShortMaRatio = below / sampleSize;
  return {
    sentiment: belowShortMaRatio > cautionRatio ? MarketSentiment.CAUTION : MarketSentiment.POSITIVE,
    belowShortMaRatio,
    sampleSize,
  };
}
