/**
 * Margin Trend (moat) Evaluator
 *
 * Compares the latest quarter's gross margin with the same quarter a year
 * earlier. A shrinking margin is read as the moat eroding.
 */

import { roundTo } from "./indicators";
import { MarginStatus } from "./types";

export type MarginComparison =
  | {
      status: MarginStatus.UNAVAILABLE;
      currentMargin?: number;
      previousMargin?: number;
      detail: string;
    }
  | {
      status: MarginStatus.DETERIORATING | MarginStatus.STABLE;
      currentMargin: number;
      previousMargin: number;
      /** current - previous, in percentage points, 2 decimals */
      change: number;
      detail: string;
    };

/**
 * Gross margin percentage from statement figures, 2 decimals
 */
export function grossMarginFromStatement(
  grossProfit: number | undefined,
  revenue: number | undefined
): number | undefined {
  if (grossProfit === undefined || revenue === undefined || revenue === 0) {
    return undefined;
  }
  return roundTo((grossProfit / revenue) * 100, 2);
}

/** Fiscal period labels, e.g. "2024Q1" */
export interface MarginPeriods {
  current?: string;
  previous?: string;
}

function comparisonText(current: number, previous: number, periods: MarginPeriods): string {
  if (periods.current && periods.previous) {
    return `${current}% in ${periods.current} vs ${previous}% in ${periods.previous}`;
  }
  return `${current}% vs ${previous}% a year ago`;
}

/**
 * Classify the YoY margin change
 */
export function evaluateMarginTrend(
  currentMargin: number | undefined,
  previousMargin: number | undefined,
  periods: MarginPeriods = {}
): MarginComparison {
  if (currentMargin === undefined || previousMargin === undefined) {
    return {
      status: MarginStatus.UNAVAILABLE,
      ...(currentMargin !== undefined ? { currentMargin } : {}),
      ...(previousMargin !== undefined ? { previousMargin } : {}),
      detail: "Gross margin unavailable for the current or year-ago quarter",
    };
  }

  const change = roundTo(currentMargin - previousMargin, 2);

  if (change < 0) {
    return {
      status: MarginStatus.DETERIORATING,
      currentMargin,
      previousMargin,
      change,
      detail:
        `Gross margin deteriorating: ${comparisonText(currentMargin, previousMargin, periods)} ` +
        `(down ${Math.abs(change)} pts)`,
    };
  }

  return {
    status: MarginStatus.STABLE,
    currentMargin,
    previousMargin,
    change,
    detail:
      `Gross margin stable: ${comparisonText(currentMargin, previousMargin, periods)} ` +
      `(+${change} pts)`,
  };
}
