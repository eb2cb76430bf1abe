/**
 * Technical Indicators
 *
 * Stateless helpers turning a close series into RSI, simple moving
 * averages, bias and percentage change. Every function returns `undefined`
 * when the series is too short rather than throwing.
 */

import type { IndicatorSnapshot, PriceSeries } from "./types";

// ============================================================================
// Constants
// ============================================================================

/** Default RSI lookback (Wilder) */
export const DEFAULT_RSI_PERIOD = 14;

/** Default long moving-average window */
export const DEFAULT_MA_LONG_WINDOW = 200;

/** Default short moving-average window */
export const DEFAULT_MA_SHORT_WINDOW = 60;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Round to a fixed number of decimals
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Extract closes from a series
 */
export function closesOf(series: PriceSeries): number[] {
  return series.map((point) => point.close);
}

// ============================================================================
// Indicators
// ============================================================================

/**
 * Relative Strength Index using Wilder's smoothing.
 *
 * The first `period` deltas seed the average gain and loss; each later
 * delta is folded in with weight 1/period. Needs at least `period + 1`
 * closes. Saturates at 100 when the average loss is exactly zero.
 */
export function computeRSI(
  closes: readonly number[],
  period: number = DEFAULT_RSI_PERIOD
): number | undefined {
  if (period < 1 || closes.length < period + 1) {
    return undefined;
  }

  const deltas: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const current = closes[i];
    const previous = closes[i - 1];
    if (current === undefined || previous === undefined) {
      return undefined;
    }
    deltas.push(current - previous);
  }

  let avgGain = 0;
  let avgLoss = 0;
  for (const delta of deltas.slice(0, period)) {
    if (delta > 0) {
      avgGain += delta;
    } else if (delta < 0) {
      avgLoss -= delta;
    }
  }
  avgGain /= period;
  avgLoss /= period;

  for (const delta of deltas.slice(period)) {
    const gain = delta > 0 ? delta : 0;
    const loss = delta < 0 ? -delta : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
  }

  if (avgLoss === 0) {
    return 100.0;
  }

  const rs = avgGain / avgLoss;
  return roundTo(100 - 100 / (1 + rs), 2);
}

/**
 * Options for {@link computeSMA}
 */
export interface SMAOptions {
  /**
   * When false, a series shorter than the window is averaged over all of
   * its points instead of being reported unavailable.
   * @default true
   */
  strict?: boolean;
}

/**
 * Arithmetic mean of the last `window` closes
 */
export function computeSMA(
  closes: readonly number[],
  window: number,
  options: SMAOptions = {}
): number | undefined {
  const strict = options.strict ?? true;
  if (window < 1 || closes.length === 0) {
    return undefined;
  }
  if (strict && closes.length < window) {
    return undefined;
  }

  const slice = closes.slice(-window);
  const sum = slice.reduce((acc, close) => acc + close, 0);
  return sum / slice.length;
}

/**
 * Percentage deviation of price from a moving average, 1 decimal
 */
export function computeBias(price: number, ma: number | undefined): number | undefined {
  if (ma === undefined || ma === 0) {
    return undefined;
  }
  return roundTo(((price - ma) / ma) * 100, 1);
}

/**
 * Signed percentage change from `series[from]` to `series[to]`, 2 decimals.
 * Negative indices count from the end (-1 is the last point).
 */
export function computePercentChange(
  series: readonly number[],
  from: number,
  to: number
): number | undefined {
  if (series.length < 2) {
    return undefined;
  }
  const first = series.at(from);
  const last = series.at(to);
  if (first === undefined || last === undefined || first <= 0) {
    return undefined;
  }
  return roundTo(((last - first) / first) * 100, 2);
}

// ============================================================================
// Snapshot
// ============================================================================

/**
 * Options for {@link buildIndicatorSnapshot}
 */
export interface SnapshotOptions {
  rsiPeriod?: number;
  longWindow?: number;
  shortWindow?: number;
  /** Average the long MA over fewer points when history is short */
  relaxedLongWindow?: boolean;
}

/**
 * Compute every indicator for the latest close of a series.
 *
 * Returns undefined for an empty series; any indicator the history is too
 * short for is left out of the snapshot.
 */
export function buildIndicatorSnapshot(
  series: PriceSeries,
  options: SnapshotOptions = {}
): IndicatorSnapshot | undefined {
  const closes = closesOf(series);
  const last = closes.at(-1);
  if (last === undefined) {
    return undefined;
  }

  const price = roundTo(last, 2);
  const rsi = computeRSI(closes, options.rsiPeriod ?? DEFAULT_RSI_PERIOD);
  const maLong = computeSMA(closes, options.longWindow ?? DEFAULT_MA_LONG_WINDOW, {
    strict: !(options.relaxedLongWindow ?? false),
  });
  const maShort = computeSMA(closes, options.shortWindow ?? DEFAULT_MA_SHORT_WINDOW);
  const bias = computeBias(price, maShort);

  return {
    price,
    ...(rsi !== undefined ? { rsi } : {}),
    ...(maLong !== undefined ? { maLong: roundTo(maLong, 2) } : {}),
    ...(maShort !== undefined ? { maShort: roundTo(maShort, 2) } : {}),
    ...(bias !== undefined ? { bias } : {}),
  };
}
