/**
 * Price Alert Service
 *
 * User-defined rules such as "NVDA RSI below 30" or "TSLA bias above 20%",
 * evaluated against indicator snapshots and delivered through the same
 * cooldown-gated dispatcher as the currency watches.
 */

import { env } from "../../config/env";
import { ConfigurationError, errorMessage } from "../errors";
import type { IndicatorSnapshot } from "../analysis/types";
import { formatPriceAlert } from "../notifications/telegram/alert-formatter";
import { settleInBatches } from "../utils/batch";
import { serviceLoggers, type Logger } from "../utils/logger";
import type { AlertCandidate, AlertDispatcher } from "./alert-dispatcher";
import type { SignalScanner } from "./signal-scanner";
import { cooldownIssues, type CooldownRecord, type WatchStore } from "./watch-store";

// ============================================================================
// Types
// ============================================================================

export type PriceAlertMetric = "rsi" | "price" | "bias";

export type PriceAlertOperator = "lt" | "gt";

export interface PriceAlertRule extends CooldownRecord {
  ticker: string;
  metric: PriceAlertMetric;
  operator: PriceAlertOperator;
  threshold: number;
}

export interface PriceAlertMatch {
  ruleId: string;
  ticker: string;
  metric: PriceAlertMetric;
  operator: PriceAlertOperator;
  threshold: number;
  value: number;
}

export interface FiredPriceAlert extends PriceAlertMatch {
  alertedAt: Date;
}

export interface PriceAlertCycleResult {
  totalEvaluated: number;
  triggered: number;
  fired: number;
  firedDetails: FiredPriceAlert[];
  suppressed: number;
  failed: number;
  /** Tickers whose snapshot could not be loaded */
  errors: Array<{ ticker: string; error: string }>;
}

export interface PriceAlertServiceConfig {
  scanner: SignalScanner;
  store: WatchStore<PriceAlertRule>;
  dispatcher: AlertDispatcher<PriceAlertRule>;
  concurrency?: number;
  logger?: Logger;
}

const METRICS: readonly PriceAlertMetric[] = ["rsi", "price", "bias"];
const OPERATORS: readonly PriceAlertOperator[] = ["lt", "gt"];

/**
 * Validate a rule before it enters a cycle
 */
export function validatePriceAlertRule(rule: PriceAlertRule): PriceAlertRule {
  const issues = cooldownIssues(rule);
  if (!rule.ticker) {
    issues.push(`${rule.id}: ticker is required`);
  }
  if (!METRICS.includes(rule.metric)) {
    issues.push(`${rule.id}: metric must be one of ${METRICS.join(", ")}`);
  }
  if (!OPERATORS.includes(rule.operator)) {
    issues.push(`${rule.id}: operator must be one of ${OPERATORS.join(", ")}`);
  }
  if (!Number.isFinite(rule.threshold)) {
    issues.push(`${rule.id}: threshold must be a finite number`);
  }
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return rule;
}

/**
 * Compare one rule against a snapshot. An unavailable metric never matches.
 */
export function evaluatePriceAlert(
  rule: PriceAlertRule,
  snapshot: IndicatorSnapshot
): PriceAlertMatch | undefined {
  const value = snapshot[rule.metric];
  if (value === undefined) {
    return undefined;
  }
  const crossed = rule.operator === "lt" ? value < rule.threshold : value > rule.threshold;
  if (!crossed) {
    return undefined;
  }
  return {
    ruleId: rule.id,
    ticker: rule.ticker,
    metric: rule.metric,
    operator: rule.operator,
    threshold: rule.threshold,
    value,
  };
}

// ============================================================================
// Price Alert Service
// ============================================================================

export class PriceAlertService {
  private readonly scanner: SignalScanner;
  private readonly store: WatchStore<PriceAlertRule>;
  private readonly dispatcher: AlertDispatcher<PriceAlertRule>;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(config: PriceAlertServiceConfig) {
    this.scanner = config.scanner;
    this.store = config.store;
    this.dispatcher = config.dispatcher;
    this.concurrency = config.concurrency ?? env.SCAN_CONCURRENCY;
    this.logger = config.logger ?? serviceLoggers.priceAlerts;
  }

  /**
   * Evaluate the rules (the store's active ones by default) and dispatch
   * every match. One snapshot is loaded per distinct ticker.
   */
  async runPriceAlertCycle(rules?: readonly PriceAlertRule[]): Promise<PriceAlertCycleResult> {
    const targets = rules ?? (await this.store.listActive());
    targets.forEach(validatePriceAlertRule);

    const tickers = Array.from(new Set(targets.map((rule) => rule.ticker)));
    const settled = await settleInBatches(tickers, this.concurrency, (ticker) =>
      this.scanner.snapshotFor(ticker)
    );

    const snapshots = new Map<string, IndicatorSnapshot>();
    const errors: PriceAlertCycleResult["errors"] = [];
    settled.forEach((result, index) => {
      const ticker = tickers[index];
      if (ticker === undefined) {
        return;
      }
      if (result.status === "rejected") {
        const error = errorMessage(result.reason);
        this.logger.warn("Snapshot unavailable", { ticker, error });
        errors.push({ ticker, error });
      } else {
        snapshots.set(ticker, result.value);
      }
    });

    const matches = new Map<string, PriceAlertMatch>();
    const candidates: AlertCandidate<PriceAlertRule>[] = [];
    for (const rule of targets) {
      const snapshot = snapshots.get(rule.ticker);
      const match = snapshot ? evaluatePriceAlert(rule, snapshot) : undefined;
      if (match) {
        matches.set(rule.id, match);
        candidates.push({ record: rule, message: formatPriceAlert(match) });
      }
    }

    const dispatch = await this.dispatcher.dispatch(candidates, targets.length);

    const firedDetails: FiredPriceAlert[] = [];
    for (const outcome of dispatch.outcomes) {
      const match = matches.get(outcome.id);
      if (outcome.state === "FIRED" && match) {
        firedDetails.push({ ...match, alertedAt: outcome.alertedAt });
      }
    }

    this.logger.info("Price alert cycle complete", {
      totalEvaluated: targets.length,
      triggered: candidates.length,
      fired: dispatch.fired,
    });

    return {
      totalEvaluated: targets.length,
      triggered: candidates.length,
      fired: dispatch.fired,
      firedDetails,
      suppressed: dispatch.suppressed,
      failed: dispatch.failed,
      errors,
    };
  }
}

export function createPriceAlertService(config: PriceAlertServiceConfig): PriceAlertService {
  return new PriceAlertService(config);
}
