/**
 * Multi-window rate movement alerts
 *
 * Three independent checks over a pair's history: a one-session spike, a
 * swing across the short window and a trend across the long window.
 */

import { ConfigurationError } from "../errors";
import { closesOf, computePercentChange } from "./indicators";
import type { PriceSeries } from "./types";

export enum RateAlertType {
  DAILY_SPIKE = "DAILY_SPIKE",
  SHORT_TERM_SWING = "SHORT_TERM_SWING",
  LONG_TERM_TREND = "LONG_TERM_TREND",
}

export type RateDirection = "up" | "down" | "flat";

export type RateRiskLevel = "high" | "medium" | "low" | "none";

export interface RateChangeAlert {
  pair: string;
  type: RateAlertType;
  /** Signed percentage change over the window */
  changePct: number;
  direction: RateDirection;
  currentRate: number;
  periodLabel: string;
}

/**
 * Absolute percentage thresholds per window
 */
export interface RateChangeThresholds {
  dailySpikePct: number;
  shortSwingPct: number;
  longTrendPct: number;
}

export const DEFAULT_RATE_CHANGE_THRESHOLDS: RateChangeThresholds = {
  dailySpikePct: 1.0,
  shortSwingPct: 2.0,
  longTrendPct: 8.0,
};

/**
 * Reject thresholds that would fire on every movement or never compare
 */
export function validateRateChangeThresholds(
  thresholds: RateChangeThresholds
): RateChangeThresholds {
  const issues: string[] = [];
  for (const [name, value] of Object.entries(thresholds)) {
    if (!Number.isFinite(value) || value <= 0) {
      issues.push(`${name} must be a positive percentage, got ${value}`);
    }
  }
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return thresholds;
}

export interface RateChangeInput {
  pair: string;
  currentRate: number;
  shortHistory: PriceSeries;
  longHistory: PriceSeries;
  shortLabel?: string;
  longLabel?: string;
}

const RISK_BY_TYPE: Record<RateAlertType, Exclude<RateRiskLevel, "none">> = {
  [RateAlertType.DAILY_SPIKE]: "high",
  [RateAlertType.SHORT_TERM_SWING]: "medium",
  [RateAlertType.LONG_TERM_TREND]: "low",
};

const RISK_ORDER: Record<RateRiskLevel, number> = {
  none: 0,
  low: 1,
  medium: 2,
  high: 3,
};

function directionOf(changePct: number): RateDirection {
  if (changePct > 0) return "up";
  if (changePct < 0) return "down";
  return "flat";
}

/**
 * Run the three window checks and return one alert per window that met
 * its threshold.
 */
export function analyzeRateChanges(
  input: RateChangeInput,
  thresholds: RateChangeThresholds = DEFAULT_RATE_CHANGE_THRESHOLDS
): RateChangeAlert[] {
  const shortCloses = closesOf(input.shortHistory);
  const longCloses = closesOf(input.longHistory);

  const windows: Array<{
    type: RateAlertType;
    changePct: number | undefined;
    threshold: number;
    periodLabel: string;
  }> = [
    {
      type: RateAlertType.DAILY_SPIKE,
      changePct: computePercentChange(shortCloses, -2, -1),
      threshold: thresholds.dailySpikePct,
      periodLabel: "1 day",
    },
    {
      type: RateAlertType.SHORT_TERM_SWING,
      changePct: computePercentChange(shortCloses, 0, -1),
      threshold: thresholds.shortSwingPct,
      periodLabel: input.shortLabel ?? `${shortCloses.length} days`,
    },
    {
      type: RateAlertType.LONG_TERM_TREND,
      changePct: computePercentChange(longCloses, 0, -1),
      threshold: thresholds.longTrendPct,
      periodLabel: input.longLabel ?? `${longCloses.length} days`,
    },
  ];

  const alerts: RateChangeAlert[] = [];
  for (const window of windows) {
    if (window.changePct === undefined || Math.abs(window.changePct) < window.threshold) {
      continue;
    }
    alerts.push({
      pair: input.pair,
      type: window.type,
      changePct: window.changePct,
      direction: directionOf(window.changePct),
      currentRate: input.currentRate,
      periodLabel: window.periodLabel,
    });
  }
  return alerts;
}

/**
 * Overall risk: the most severe alert type present
 */
export function determineRiskLevel(alerts: readonly RateChangeAlert[]): RateRiskLevel {
  let level: RateRiskLevel = "none";
  for (const alert of alerts) {
    const candidate = RISK_BY_TYPE[alert.type];
    if (RISK_ORDER[candidate] > RISK_ORDER[level]) {
      level = candidate;
    }
  }
  return level;
}
