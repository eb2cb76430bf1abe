/**
 * Market-data provider contract
 *
 * The engine never talks to a data vendor directly. Callers plug in a
 * provider that resolves with whatever data exists (an empty series or
 * missing margins are not errors) and rejects only on transport or auth
 * failures.
 */

import { UpstreamFetchError, errorMessage } from "../../errors";
import type { PriceSeries } from "../../analysis/types";

/**
 * History span requested from the provider, in calendar days
 */
export interface HistoryPeriod {
  days: number;
}

/**
 * Gross margin for the latest quarter and the same quarter a year earlier
 */
export interface Fundamentals {
  currentMargin?: number;
  previousMargin?: number;
  /** Label of the latest reported quarter, when the provider knows it */
  currentPeriod?: string;
  /** Label of the year-ago quarter */
  previousPeriod?: string;
}

export interface MarketDataProvider {
  fetchPriceHistory(instrumentId: string, period: HistoryPeriod): Promise<PriceSeries>;
  fetchFundamentals(instrumentId: string): Promise<Fundamentals>;
}

/**
 * Typed outcome of an external call
 */
export type FetchOutcome<T> =
  | { success: true; data: T }
  | { success: false; error: UpstreamFetchError };

/**
 * Reject if `promise` does not settle within `timeoutMs`. A string names the
 * instrument for an UpstreamFetchError; other callers pass their own error
 * factory. The timer is always cleared.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: string | (() => Error)
): Promise<T> {
  const timeoutError = (): Error =>
    typeof onTimeout === "string"
      ? new UpstreamFetchError(onTimeout, `Request timeout after ${timeoutMs}ms`, {
          timeout: true,
        })
      : onTimeout();

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(timeoutError()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}

/**
 * Run a provider call with a timeout and fold any failure into a typed
 * outcome
 */
export async function fetchOutcome<T>(
  instrumentId: string,
  timeoutMs: number,
  call: () => Promise<T>
): Promise<FetchOutcome<T>> {
  try {
    const data = await withTimeout(call(), timeoutMs, instrumentId);
    return { success: true, data };
  } catch (error) {
    if (error instanceof UpstreamFetchError) {
      return { success: false, error };
    }
    return {
      success: false,
      error: new UpstreamFetchError(instrumentId, errorMessage(error), { cause: error }),
    };
  }
}

/**
 * Drop points with non-finite closes and keep the series ascending with
 * unique timestamps. Providers are trusted for content, not for shape.
 */
export function normalizeSeries(series: PriceSeries): PriceSeries {
  const byTime = new Map<number, { timestamp: Date; close: number }>();
  for (const point of series) {
    const time = point.timestamp.getTime();
    if (!Number.isFinite(point.close) || Number.isNaN(time)) {
      continue;
    }
    byTime.set(time, { timestamp: point.timestamp, close: point.close });
  }
  return Array.from(byTime.entries())
    .sort(([a], [b]) => a - b)
    .map(([, point]) => point);
}
