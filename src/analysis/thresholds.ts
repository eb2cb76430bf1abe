/**
 * Signal thresholds
 */

import { ConfigurationError } from "../errors";
import {
  DEFAULT_MA_LONG_WINDOW,
  DEFAULT_MA_SHORT_WINDOW,
  DEFAULT_RSI_PERIOD,
} from "./indicators";

export interface SignalThresholds {
  rsiPeriod: number;
  /** RSI strictly below this is oversold */
  rsiOversold: number;
  /** RSI strictly above this is overbought */
  rsiOverbought: number;
  longWindow: number;
  shortWindow: number;
  relaxedLongWindow: boolean;
  /** Bias strictly above this (percent) is overheated */
  biasOverheatedPct: number;
  /** Bias below this (percent) is oversold */
  biasOversoldPct: number;
  /** Fraction of the universe below its short MA that turns the market to CAUTION */
  sentimentCautionRatio: number;
}

export const DEFAULT_SIGNAL_THRESHOLDS: SignalThresholds = {
  rsiPeriod: DEFAULT_RSI_PERIOD,
  rsiOversold: 30,
  rsiOverbought: 70,
  longWindow: DEFAULT_MA_LONG_WINDOW,
  shortWindow: DEFAULT_MA_SHORT_WINDOW,
  relaxedLongWindow: false,
  biasOverheatedPct: 20,
  biasOversoldPct: -20,
  sentimentCautionRatio: 0.5,
};

/**
 * Reject inconsistent thresholds before any scan runs
 */
export function validateSignalThresholds(thresholds: SignalThresholds): SignalThresholds {
  const issues: string[] = [];

  if (!Number.isInteger(thresholds.rsiPeriod) || thresholds.rsiPeriod < 1) {
    issues.push(`rsiPeriod must be a positive integer, got ${thresholds.rsiPeriod}`);
  }
  if (thresholds.rsiOversold < 0 || thresholds.rsiOverbought > 100) {
    issues.push("RSI thresholds must lie within 0..100");
  }
  if (thresholds.rsiOversold >= thresholds.rsiOverbought) {
    issues.push(
      `rsiOversold (${thresholds.rsiOversold}) must be below rsiOverbought (${thresholds.rsiOverbought})`
    );
  }
  if (!Number.isInteger(thresholds.longWindow) || thresholds.longWindow < 2) {
    issues.push(`longWindow must be an integer of at least 2, got ${thresholds.longWindow}`);
  }
  if (!Number.isInteger(thresholds.shortWindow) || thresholds.shortWindow < 2) {
    issues.push(`shortWindow must be an integer of at least 2, got ${thresholds.shortWindow}`);
  }
  if (thresholds.shortWindow >= thresholds.longWindow) {
    issues.push("shortWindow must be shorter than longWindow");
  }
  if (thresholds.biasOversoldPct >= thresholds.biasOverheatedPct) {
    issues.push("biasOversoldPct must be below biasOverheatedPct");
  }
  if (thresholds.sentimentCautionRatio <= 0 || thresholds.sentimentCautionRatio >= 1) {
    issues.push(
      `sentimentCautionRatio must lie strictly between 0 and 1, got ${thresholds.sentimentCautionRatio}`
    );
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return thresholds;
}
