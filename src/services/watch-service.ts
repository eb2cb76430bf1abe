/**
 * Watch Service
 *
 * Currency-pair timing watches: read-only checks, the cooldown-gated alert
 * cycle and multi-window movement analysis.
 */

import { env } from "../../config/env";
import { rateChangeThresholdsFromEnv } from "../../config/thresholds";
import {
  fetchOutcome,
  normalizeSeries,
  type MarketDataProvider,
} from "../api/market-data/provider";
import { ResultCache } from "../cache/result-cache";
import { errorMessage } from "../errors";
import { assessTiming } from "../analysis/exchange-timing";
import {
  analyzeRateChanges,
  determineRiskLevel,
  type RateChangeAlert,
  type RateChangeThresholds,
  type RateRiskLevel,
  validateRateChangeThresholds,
} from "../analysis/rate-change";
import type { PriceSeries, TimingVerdict } from "../analysis/types";
import {
  formatMovementAlert,
  formatTimingAlert,
} from "../notifications/telegram/alert-formatter";
import { settleInBatches } from "../utils/batch";
import { serviceLoggers, type Logger } from "../utils/logger";
import type { AlertCandidate, AlertDispatcher, DispatchOutcome } from "./alert-dispatcher";
import { validateWatchConfig, type WatchConfig, type WatchStore } from "./watch-store";

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_SHORT_WINDOW_DAYS = 5;
export const DEFAULT_LONG_WINDOW_DAYS = 90;

export interface WatchCheck {
  watchId: string;
  pair: string;
  verdict: TimingVerdict;
}

export interface WatchCheckFailure {
  watchId: string;
  pair: string;
  error: string;
}

export interface FiredAlertDetail {
  watchId: string;
  pair: string;
  verdict: TimingVerdict;
  alertedAt: Date;
}

export interface AlertCycleResult {
  totalEvaluated: number;
  triggered: number;
  fired: number;
  firedDetails: FiredAlertDetail[];
  suppressed: number;
  failed: number;
  /** Watches whose rate history could not be fetched */
  errors: WatchCheckFailure[];
}

export interface MovementAnalysis {
  watchId: string;
  pair: string;
  currentRate: number;
  alerts: RateChangeAlert[];
  riskLevel: RateRiskLevel;
  /** Telegram-ready summary */
  message: string;
}

export interface WatchServiceConfig {
  provider: MarketDataProvider;
  store: WatchStore<WatchConfig>;
  dispatcher: AlertDispatcher<WatchConfig>;

  /** Cache for rate histories, keyed by pair and span */
  historyCache?: ResultCache<PriceSeries>;

  changeThresholds?: RateChangeThresholds;

  /** Days covered by the short swing window (default: 5) */
  shortWindowDays?: number;

  /** Days covered by the long trend window (default: 90) */
  longWindowDays?: number;

  concurrency?: number;
  fetchTimeoutMs?: number;
  logger?: Logger;
}

function pairOf(watch: Pick<WatchConfig, "base" | "quote">): string {
  return `${watch.base}/${watch.quote}`;
}

// ============================================================================
// Watch Service
// ============================================================================

export class WatchService {
  private readonly config: Required<
    Pick<
      WatchServiceConfig,
      "shortWindowDays" | "longWindowDays" | "concurrency" | "fetchTimeoutMs" | "changeThresholds"
    >
  >;
  private readonly provider: MarketDataProvider;
  private readonly store: WatchStore<WatchConfig>;
  private readonly dispatcher: AlertDispatcher<WatchConfig>;
  private readonly historyCache: ResultCache<PriceSeries>;
  private readonly logger: Logger;

  constructor(config: WatchServiceConfig) {
    this.config = {
      shortWindowDays: config.shortWindowDays ?? DEFAULT_SHORT_WINDOW_DAYS,
      longWindowDays: config.longWindowDays ?? DEFAULT_LONG_WINDOW_DAYS,
      concurrency: config.concurrency ?? env.SCAN_CONCURRENCY,
      fetchTimeoutMs: config.fetchTimeoutMs ?? env.FETCH_TIMEOUT_MS,
      changeThresholds: config.changeThresholds
        ? validateRateChangeThresholds(config.changeThresholds)
        : rateChangeThresholdsFromEnv(),
    };
    this.provider = config.provider;
    this.store = config.store;
    this.dispatcher = config.dispatcher;
    this.logger = config.logger ?? serviceLoggers.watchService;
    this.historyCache =
      config.historyCache ??
      new ResultCache<PriceSeries>({
        name: "rate-history",
        defaultTTL: env.CACHE_TTL_MS,
        failureTTL: env.CACHE_FAILURE_TTL_MS,
        maxEntries: env.CACHE_MAX_ENTRIES,
        logger: serviceLoggers.cache,
      });
  }

  /**
   * Rate history for a pair, through the cache
   */
  private async fetchHistory(watch: WatchConfig, days: number): Promise<PriceSeries> {
    const pair = pairOf(watch);
    return this.historyCache.getOrCompute(`${pair}:${days}`, async () => {
      const outcome = await fetchOutcome(pair, this.config.fetchTimeoutMs, () =>
        this.provider.fetchPriceHistory(pair, { days })
      );
      if (!outcome.success) {
        throw outcome.error;
      }
      return normalizeSeries(outcome.data);
    });
  }

  /**
   * Timing verdict for one watch. Reads nothing from and writes nothing to
   * the store; rejects with UpstreamFetchError when the history fetch fails.
   */
  async checkWatch(watch: WatchConfig): Promise<TimingVerdict> {
    validateWatchConfig(watch);
    const history = await this.fetchHistory(watch, watch.lookbackDays);
    return assessTiming({
      base: watch.base,
      quote: watch.quote,
      history,
      lookbackDays: watch.lookbackDays,
      consecutiveThreshold: watch.consecutiveThreshold,
    });
  }

  /**
   * Check several watches (the store's active ones by default)
   */
  async checkWatches(
    watches?: readonly WatchConfig[]
  ): Promise<{ checks: WatchCheck[]; errors: WatchCheckFailure[] }> {
    const targets = watches ?? (await this.store.listActive());
    targets.forEach(validateWatchConfig);

    const settled = await settleInBatches(targets, this.config.concurrency, (watch) =>
      this.checkWatch(watch)
    );

    const checks: WatchCheck[] = [];
    const errors: WatchCheckFailure[] = [];
    settled.forEach((result, index) => {
      const watch = targets[index];
      if (!watch) {
        return;
      }
      if (result.status === "fulfilled") {
        checks.push({ watchId: watch.id, pair: pairOf(watch), verdict: result.value });
        return;
      }
      const error = errorMessage(result.reason);
      this.logger.warn("Watch check failed", { watchId: watch.id, error });
      errors.push({ watchId: watch.id, pair: pairOf(watch), error });
    });

    return { checks, errors };
  }

  /**
   * Evaluate the watches and hand every alerting one to the dispatcher.
   * Resolves after the dispatcher has settled the whole batch.
   */
  async runAlertCycle(activeWatches?: readonly WatchConfig[]): Promise<AlertCycleResult> {
    const targets = activeWatches ?? (await this.store.listActive());
    const { checks, errors } = await this.checkWatches(targets);

    const verdicts = new Map<string, WatchCheck>();
    const candidates: AlertCandidate<WatchConfig>[] = [];
    for (const check of checks) {
      verdicts.set(check.watchId, check);
      const watch = targets.find((w) => w.id === check.watchId);
      if (watch && check.verdict.shouldAlert) {
        candidates.push({ record: watch, message: formatTimingAlert(check.verdict) });
      }
    }

    const dispatch = await this.dispatcher.dispatch(candidates, targets.length);

    const firedDetails: FiredAlertDetail[] = [];
    for (const outcome of dispatch.outcomes) {
      const detail = this.toFiredDetail(outcome, verdicts);
      if (detail) {
        firedDetails.push(detail);
      }
    }

    const result: AlertCycleResult = {
      totalEvaluated: targets.length,
      triggered: candidates.length,
      fired: dispatch.fired,
      firedDetails,
      suppressed: dispatch.suppressed,
      failed: dispatch.failed,
      errors,
    };

    this.logger.info("Alert cycle complete", {
      totalEvaluated: result.totalEvaluated,
      triggered: result.triggered,
      fired: result.fired,
      suppressed: result.suppressed,
      failed: result.failed,
      errors: errors.length,
    });
    return result;
  }

  private toFiredDetail(
    outcome: DispatchOutcome<WatchConfig>,
    verdicts: Map<string, WatchCheck>
  ): FiredAlertDetail | undefined {
    if (outcome.state !== "FIRED") {
      return undefined;
    }
    const check = verdicts.get(outcome.id);
    if (!check) {
      return undefined;
    }
    return {
      watchId: outcome.id,
      pair: check.pair,
      verdict: check.verdict,
      alertedAt: outcome.alertedAt,
    };
  }

  /**
   * Daily spike, short swing and long trend checks for one watch's pair
   */
  async analyzeMovements(watch: WatchConfig): Promise<MovementAnalysis> {
    const { shortWindowDays, longWindowDays } = this.config;
    const [shortHistory, longHistory] = await Promise.all([
      this.fetchHistory(watch, shortWindowDays),
      this.fetchHistory(watch, longWindowDays),
    ]);

    const pair = pairOf(watch);
    const currentRate = shortHistory.at(-1)?.close ?? longHistory.at(-1)?.close ?? 0;
    const alerts = analyzeRateChanges(
      {
        pair,
        currentRate,
        shortHistory,
        longHistory,
        shortLabel: `${shortWindowDays} days`,
        longLabel: `${longWindowDays} days`,
      },
      this.config.changeThresholds
    );

    const riskLevel = determineRiskLevel(alerts);
    return {
      watchId: watch.id,
      pair,
      currentRate,
      alerts,
      riskLevel,
      message: formatMovementAlert(pair, alerts, riskLevel),
    };
  }
}

export function createWatchService(config: WatchServiceConfig): WatchService {
  return new WatchService(config);
}
