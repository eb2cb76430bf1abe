/**
 * Human-readable status lines for an indicator snapshot
 */

import type { SignalThresholds } from "./thresholds";
import type { IndicatorSnapshot } from "./types";

type StatusThresholds = Pick<
  SignalThresholds,
  | "rsiPeriod"
  | "rsiOversold"
  | "rsiOverbought"
  | "longWindow"
  | "shortWindow"
  | "biasOverheatedPct"
  | "biasOversoldPct"
>;

function movingAverageLine(price: number, ma: number | undefined, window: number): string {
  if (ma === undefined) {
    return `⚠️ Fewer than ${window} closes, ${window}MA unavailable`;
  }
  if (price < ma) {
    return `🔴 Price ${price} below ${window}MA (${ma})`;
  }
  return `🟢 Price ${price} holding above ${window}MA (${ma})`;
}

export function buildSignalStatus(
  snapshot: IndicatorSnapshot,
  thresholds: StatusThresholds
): string[] {
  const lines: string[] = [];
  const { price, rsi, maLong, maShort, bias } = snapshot;

  if (rsi === undefined) {
    lines.push(`⚠️ Fewer than ${thresholds.rsiPeriod + 1} closes, RSI unavailable`);
  } else if (rsi < thresholds.rsiOversold) {
    lines.push(`🟢 RSI=${rsi} oversold (possible opportunity)`);
  } else if (rsi > thresholds.rsiOverbought) {
    lines.push(`🔴 RSI=${rsi} overbought (watch for a pullback)`);
  } else {
    lines.push(`⚪ RSI=${rsi} neutral`);
  }

  lines.push(movingAverageLine(price, maLong, thresholds.longWindow));
  lines.push(movingAverageLine(price, maShort, thresholds.shortWindow));

  if (bias !== undefined) {
    if (bias > thresholds.biasOverheatedPct) {
      lines.push(`🔴 Bias ${bias}% overheated`);
    } else if (bias < thresholds.biasOversoldPct) {
      lines.push(`🟢 Bias ${bias}% oversold`);
    }
  }

  return lines;
}
