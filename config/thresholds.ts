/**
 * Thresholds assembled from the environment
 */

import { env, type Env } from "./env";
import {
  validateRateChangeThresholds,
  type RateChangeThresholds,
} from "../src/analysis/rate-change";
import { validateSignalThresholds, type SignalThresholds } from "../src/analysis/thresholds";

/**
 * Build validated signal thresholds; throws ConfigurationError when the
 * environment describes an inconsistent set
 */
export function signalThresholdsFromEnv(source: Env = env): SignalThresholds {
  return validateSignalThresholds({
    rsiPeriod: source.RSI_PERIOD,
    rsiOversold: source.RSI_OVERSOLD,
    rsiOverbought: source.RSI_OVERBOUGHT,
    longWindow: source.MA_LONG_WINDOW,
    shortWindow: source.MA_SHORT_WINDOW,
    relaxedLongWindow: source.MA_LONG_RELAXED,
    biasOverheatedPct: source.BIAS_OVERHEATED_PCT,
    biasOversoldPct: source.BIAS_OVERSOLD_PCT,
    sentimentCautionRatio: source.SENTIMENT_CAUTION_RATIO,
  });
}

export function rateChangeThresholdsFromEnv(source: Env = env): RateChangeThresholds {
  return validateRateChangeThresholds({
    dailySpikePct: source.FX_DAILY_SPIKE_PCT,
    shortSwingPct: source.FX_SHORT_SWING_PCT,
    longTrendPct: source.FX_LONG_TREND_PCT,
  });
}
