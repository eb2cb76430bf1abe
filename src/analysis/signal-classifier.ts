/**
 * Per-Category Signal Classifier
 *
 * Each tracked instrument carries a category that decides which checks run
 * and which signals it can reach:
 *
 * - trend_setter: CONTRARIAN_BUY on oversold RSI, THESIS_BROKEN below the
 *   long MA (wins when both fire), OVERHEATED only through the sentiment gate
 * - moat: THESIS_BROKEN when the YoY gross margin shrinks
 * - growth: THESIS_BROKEN below the short MA
 *
 * A missing indicator is listed in `insufficientData` and never counts as a
 * passing or failing check.
 */

import type { MarginComparison } from "./margin-trend";
import type { SentimentContext } from "./market-sentiment";
import { buildSignalStatus } from "./signal-status";
import type { SignalThresholds } from "./thresholds";
import { DEFAULT_SIGNAL_THRESHOLDS } from "./thresholds";
import type { IndicatorName, IndicatorSnapshot } from "./types";
import { MarginStatus, MarketSentiment, SignalState } from "./types";

// ============================================================================
// Instruments
// ============================================================================

export type InstrumentCategory = "trend_setter" | "moat" | "growth";

export interface TrackedInstrument {
  ticker: string;
  category: InstrumentCategory;
}

// ============================================================================
// Classifier inputs
// ============================================================================

export type ClassificationInput =
  | { category: "trend_setter"; ticker: string; snapshot: IndicatorSnapshot }
  | { category: "moat"; ticker: string; margin: MarginComparison }
  | { category: "growth"; ticker: string; snapshot: IndicatorSnapshot };

// ============================================================================
// Classifier results
// ============================================================================

/**
 * Record of the sentiment gate changing a signal
 */
export interface SentimentGateNote {
  action: "suppressed" | "escalated";
  from: SignalState;
  to: SignalState;
  sentiment: MarketSentiment;
  belowShortMaRatio: number;
}

interface ResultBase {
  ticker: string;
  /** One line per check that fired */
  alerts: string[];
  insufficientData: IndicatorName[];
}

export interface TrendSetterResult extends ResultBase {
  category: "trend_setter";
  signal:
    | SignalState.NORMAL
    | SignalState.CONTRARIAN_BUY
    | SignalState.THESIS_BROKEN
    | SignalState.OVERHEATED;
  snapshot: IndicatorSnapshot;
  status: string[];
  gate?: SentimentGateNote;
}

export interface MoatResult extends ResultBase {
  category: "moat";
  signal: SignalState.NORMAL | SignalState.THESIS_BROKEN;
  margin: MarginComparison;
}

export interface GrowthResult extends ResultBase {
  category: "growth";
  signal: SignalState.NORMAL | SignalState.THESIS_BROKEN;
  snapshot: IndicatorSnapshot;
  status: string[];
}

export type ClassificationResult = TrendSetterResult | MoatResult | GrowthResult;

// ============================================================================
// Classifier
// ============================================================================

function classifyTrendSetter(
  ticker: string,
  snapshot: IndicatorSnapshot,
  thresholds: SignalThresholds,
  sentiment: SentimentContext | undefined
): TrendSetterResult {
  const alerts: string[] = [];
  const insufficientData: IndicatorName[] = [];
  const { price, rsi, maLong, bias } = snapshot;

  let oversold = false;
  if (rsi === undefined) {
    insufficientData.push("rsi");
  } else if (rsi < thresholds.rsiOversold) {
    oversold = true;
    alerts.push(`📉 ${ticker} RSI=${rsi} oversold (contrarian opportunity)`);
  }

  let broken = false;
  if (maLong === undefined) {
    insufficientData.push("maLong");
  } else if (price < maLong) {
    broken = true;
    alerts.push(`📉 ${ticker} price ${price} below ${thresholds.longWindow}MA (${maLong})`);
  }

  let signal: TrendSetterResult["signal"] = SignalState.NORMAL;
  if (broken) {
    signal = SignalState.THESIS_BROKEN;
  } else if (oversold) {
    signal = SignalState.CONTRARIAN_BUY;
  }

  let gate: SentimentGateNote | undefined;
  if (sentiment) {
    if (signal === SignalState.CONTRARIAN_BUY && sentiment.sentiment === MarketSentiment.CAUTION) {
      gate = {
        action: "suppressed",
        from: signal,
        to: SignalState.NORMAL,
        sentiment: sentiment.sentiment,
        belowShortMaRatio: sentiment.belowShortMaRatio,
      };
      signal = SignalState.NORMAL;
    } else if (
      signal === SignalState.NORMAL &&
      bias !== undefined &&
      bias > thresholds.biasOverheatedPct &&
      sentiment.sentiment === MarketSentiment.POSITIVE
    ) {
      gate = {
        action: "escalated",
        from: signal,
        to: SignalState.OVERHEATED,
        sentiment: sentiment.sentiment,
        belowShortMaRatio: sentiment.belowShortMaRatio,
      };
      signal = SignalState.OVERHEATED;
      alerts.push(`🔥 ${ticker} bias ${bias}% overheated in a positive market`);
    }
  }

  return {
    category: "trend_setter",
    ticker,
    signal,
    snapshot,
    status: buildSignalStatus(snapshot, thresholds),
    alerts,
    insufficientData,
    ...(gate ? { gate } : {}),
  };
}

function classifyMoat(ticker: string, margin: MarginComparison): MoatResult {
  if (margin.status === MarginStatus.UNAVAILABLE) {
    return {
      category: "moat",
      ticker,
      signal: SignalState.NORMAL,
      margin,
      alerts: [],
      insufficientData: ["margin"],
    };
  }

  const deteriorating = margin.status === MarginStatus.DETERIORATING;
  return {
    category: "moat",
    ticker,
    signal: deteriorating ? SignalState.THESIS_BROKEN : SignalState.NORMAL,
    margin,
    alerts: deteriorating ? [`📉 ${ticker} ${margin.detail}`] : [],
    insufficientData: [],
  };
}

function classifyGrowth(
  ticker: string,
  snapshot: IndicatorSnapshot,
  thresholds: SignalThresholds
): GrowthResult {
  const { price, maShort } = snapshot;

  if (maShort === undefined) {
    return {
      category: "growth",
      ticker,
      signal: SignalState.NORMAL,
      snapshot,
      status: buildSignalStatus(snapshot, thresholds),
      alerts: [],
      insufficientData: ["maShort"],
    };
  }

  const broken = price < maShort;
  return {
    category: "growth",
    ticker,
    signal: broken ? SignalState.THESIS_BROKEN : SignalState.NORMAL,
    snapshot,
    status: buildSignalStatus(snapshot, thresholds),
    alerts: broken
      ? [`📉 ${ticker} price ${price} below ${thresholds.shortWindow}MA (${maShort}), growth momentum lost`]
      : [],
    insufficientData: [],
  };
}

/**
 * Classify one instrument. The sentiment gate only affects trend setters.
 */
export function classifySignal(
  input: ClassificationInput,
  thresholds: SignalThresholds = DEFAULT_SIGNAL_THRESHOLDS,
  sentiment?: SentimentContext
): ClassificationResult {
  switch (input.category) {
    case "trend_setter":
      return classifyTrendSetter(input.ticker, input.snapshot, thresholds, sentiment);
    case "moat":
      return classifyMoat(input.ticker, input.margin);
    case "growth":
      return classifyGrowth(input.ticker, input.snapshot, thresholds);
  }
}

/**
 * Whether a result warrants attention (anything other than NORMAL)
 */
export function isActionable(result: ClassificationResult): boolean {
  return result.signal !== SignalState.NORMAL;
}
