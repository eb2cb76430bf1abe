/**
 * Telegram Alert Message Formatter
 * Renders engine results as Telegram HTML messages
 */

import type { ClassificationResult } from "../../analysis/signal-classifier";
import type { RateChangeAlert, RateRiskLevel } from "../../analysis/rate-change";
import { RateAlertType } from "../../analysis/rate-change";
import { SignalState, type TimingVerdict } from "../../analysis/types";

/** Telegram rejects messages longer than this */
export const TELEGRAM_MAX_LENGTH = 4096;

/**
 * Emoji and label per signal state
 */
export const SIGNAL_CONFIG: Record<SignalState, { emoji: string; label: string }> = {
  [SignalState.NORMAL]: { emoji: "⚪", label: "Normal" },
  [SignalState.CONTRARIAN_BUY]: { emoji: "🟢", label: "Contrarian buy" },
  [SignalState.OVERHEATED]: { emoji: "🔥", label: "Overheated" },
  [SignalState.THESIS_BROKEN]: { emoji: "🔴", label: "Thesis broken" },
};

export const RISK_CONFIG: Record<RateRiskLevel, { emoji: string; label: string }> = {
  high: { emoji: "🔴", label: "HIGH" },
  medium: { emoji: "🟠", label: "MEDIUM" },
  low: { emoji: "🟡", label: "LOW" },
  none: { emoji: "⚪", label: "NONE" },
};

const RATE_ALERT_LABELS: Record<RateAlertType, string> = {
  [RateAlertType.DAILY_SPIKE]: "Daily spike",
  [RateAlertType.SHORT_TERM_SWING]: "Short-term swing",
  [RateAlertType.LONG_TERM_TREND]: "Long-term trend",
};

/**
 * Escape text for Telegram's HTML parse mode
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Format a signed percentage
 */
export function formatPercentage(value: number): string {
  const sign = value >= 0 ? "+" : "";
  return `${sign}${value.toFixed(2)}%`;
}

function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + "...";
}

/**
 * Currency-pair timing alert
 */
export function formatTimingAlert(verdict: TimingVerdict): string {
  const pair = escapeHtml(`${verdict.base}/${verdict.quote}`);
  const lines = [
    `💱 <b>${pair}</b> ${escapeHtml(verdict.recommendation)}`,
    "",
    `<b>Rate:</b> ${verdict.currentRate}`,
    `<b>${verdict.lookbackDays}-day high:</b> ${verdict.lookbackHigh}`,
    `<b>Consecutive increases:</b> ${verdict.consecutiveIncreases}/${verdict.consecutiveThreshold}`,
    "",
    `<i>${escapeHtml(verdict.reasoning)}</i>`,
  ];
  return lines.join("\n");
}

/**
 * Multi-window movement summary for one pair
 */
export function formatMovementAlert(
  pair: string,
  alerts: readonly RateChangeAlert[],
  riskLevel: RateRiskLevel
): string {
  const risk = RISK_CONFIG[riskLevel];
  const lines = [`${risk.emoji} <b>${escapeHtml(pair)}</b> movement risk: <b>${risk.label}</b>`];

  if (alerts.length === 0) {
    lines.push("No window crossed its threshold");
  }
  for (const alert of alerts) {
    const arrow = alert.direction === "up" ? "📈" : alert.direction === "down" ? "📉" : "➖";
    lines.push(
      `${arrow} ${RATE_ALERT_LABELS[alert.type]} (${escapeHtml(alert.periodLabel)}): ${formatPercentage(alert.changePct)}`
    );
  }
  return lines.join("\n");
}

/**
 * One instrument's classification, with alert and status lines
 */
export function formatSignalAlert(result: ClassificationResult): string {
  const signal = SIGNAL_CONFIG[result.signal];
  const lines = [`${signal.emoji} <b>${escapeHtml(result.ticker)}</b> ${signal.label}`];

  for (const alert of result.alerts) {
    lines.push(escapeHtml(alert));
  }
  if (result.category !== "moat" && result.status.length > 0) {
    lines.push("");
    for (const status of result.status) {
      lines.push(escapeHtml(status));
    }
  }
  if (result.insufficientData.length > 0) {
    lines.push(`<i>Insufficient data: ${result.insufficientData.join(", ")}</i>`);
  }
  return lines.join("\n");
}

/**
 * Digest of every actionable result of a scan, cut to Telegram's limit
 */
export function formatScanDigest(
  results: readonly ClassificationResult[],
  maxLength: number = TELEGRAM_MAX_LENGTH
): string {
  if (results.length === 0) {
    return "✅ <b>Scan complete</b>\nNo actionable signals";
  }
  const blocks = [`📊 <b>Scan complete</b>: ${results.length} actionable signal(s)`];
  for (const result of results) {
    blocks.push(formatSignalAlert(result));
  }
  return truncateText(blocks.join("\n\n"), maxLength);
}

const METRIC_LABELS: Record<"rsi" | "price" | "bias", string> = {
  rsi: "RSI",
  price: "Price",
  bias: "Bias",
};

/**
 * User-defined threshold crossing
 */
export function formatPriceAlert(alert: {
  ticker: string;
  metric: "rsi" | "price" | "bias";
  operator: "lt" | "gt";
  threshold: number;
  value: number;
}): string {
  const unit = alert.metric === "bias" ? "%" : "";
  const relation = alert.operator === "lt" ? "below" : "above";
  return (
    `🔔 <b>${escapeHtml(alert.ticker)}</b> ${METRIC_LABELS[alert.metric]} is ` +
    `${alert.value}${unit}, ${relation} ${alert.threshold}${unit}`
  );
}
