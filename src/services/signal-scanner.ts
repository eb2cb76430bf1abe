/**
 * Signal Scanner
 *
 * Evaluates tracked instruments against their category rules. Per
 * instrument: fetch through the injected caches, build indicators, then
 * classify. A fetch that fails or times out marks only that instrument as
 * unavailable; the rest of the scan carries on.
 *
 * A scan runs in two passes so the market-sentiment gate can see the whole
 * universe before any trend setter is classified. It then compares each
 * signal with the last one stored for the instrument and, when a notifier
 * is configured, sends one digest of the changes that became actionable.
 * Last signals of an undelivered digest are left unchanged so the next
 * scan reports them again.
 */

import { env } from "../../config/env";
import { signalThresholdsFromEnv } from "../../config/thresholds";
import {
  fetchOutcome,
  normalizeSeries,
  type MarketDataProvider,
} from "../api/market-data/provider";
import { ResultCache } from "../cache/result-cache";
import {
  DataUnavailableError,
  EngineError,
  type EngineErrorCode,
  errorMessage,
} from "../errors";
import { buildIndicatorSnapshot } from "../analysis/indicators";
import { evaluateMarginTrend, type MarginComparison } from "../analysis/margin-trend";
import { determineMarketSentiment, type SentimentContext } from "../analysis/market-sentiment";
import {
  classifySignal,
  isActionable,
  type ClassificationInput,
  type ClassificationResult,
  type InstrumentCategory,
  type TrackedInstrument,
} from "../analysis/signal-classifier";
import { validateSignalThresholds, type SignalThresholds } from "../analysis/thresholds";
import { SignalState, type IndicatorSnapshot } from "../analysis/types";
import { formatScanDigest } from "../notifications/telegram/alert-formatter";
import { sendWithTimeout } from "../notifications/send";
import type { Notifier, SendOutcome } from "../notifications/types";
import { settleInBatches } from "../utils/batch";
import { serviceLoggers, type Logger } from "../utils/logger";
import { InMemoryScanStateStore, type ScanLogEntry, type ScanStateStore } from "./scan-state-store";

// ============================================================================
// Types
// ============================================================================

/** Calendar days of history requested for technical instruments */
export const DEFAULT_HISTORY_DAYS = 400;

export type Evaluation =
  | {
      status: "classified";
      ticker: string;
      category: InstrumentCategory;
      result: ClassificationResult;
    }
  | {
      status: "unavailable";
      ticker: string;
      category: InstrumentCategory;
      reason: string;
      code: EngineErrorCode;
    };

export interface ScanContext {
  /** Overrides the sentiment the scan would derive from its own snapshots */
  sentiment?: SentimentContext;
}

/**
 * A classified instrument whose signal differs from the stored one
 */
export interface SignalChange {
  ticker: string;
  previous: SignalState;
  current: SignalState;
  result: ClassificationResult;
}

export interface ScanReport {
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  total: number;
  classified: number;
  unavailable: number;
  sentiment?: SentimentContext;
  bySignal: Record<SignalState, number>;
  /** Classified results whose signal is not NORMAL */
  actionable: ClassificationResult[];
  changes: SignalChange[];
  /** Outcome of the digest send; absent when nothing was sent */
  notification?: SendOutcome;
  evaluations: Evaluation[];
}

export interface SignalScannerConfig {
  provider: MarketDataProvider;
  thresholds?: SignalThresholds;

  /** Cache for indicator snapshots, keyed by ticker */
  snapshotCache?: ResultCache<IndicatorSnapshot>;

  /** Cache for margin comparisons, keyed by ticker */
  marginCache?: ResultCache<MarginComparison>;

  /** Instruments fetched in parallel (default: SCAN_CONCURRENCY) */
  concurrency?: number;

  /** Per-fetch timeout in ms (default: FETCH_TIMEOUT_MS) */
  fetchTimeoutMs?: number;

  /** Days of history per technical instrument */
  historyDays?: number;

  /** Last signal per instrument and the scan log (default: in-memory) */
  stateStore?: ScanStateStore;

  /** Receives a digest of newly actionable signals */
  notifier?: Notifier;

  /** Digest send timeout in ms (default: SEND_TIMEOUT_MS) */
  sendTimeoutMs?: number;

  logger?: Logger;
}

type LoadedInput =
  | { status: "loaded"; input: ClassificationInput }
  | Extract<Evaluation, { status: "unavailable" }>;

function emptySignalCounts(): Record<SignalState, number> {
  return {
    [SignalState.NORMAL]: 0,
    [SignalState.CONTRARIAN_BUY]: 0,
    [SignalState.OVERHEATED]: 0,
    [SignalState.THESIS_BROKEN]: 0,
  };
}

// ============================================================================
// Signal Scanner
// ============================================================================

export class SignalScanner {
  private readonly config: Required<
    Pick<SignalScannerConfig, "concurrency" | "fetchTimeoutMs" | "historyDays" | "sendTimeoutMs">
  >;
  private readonly provider: MarketDataProvider;
  private readonly thresholds: SignalThresholds;
  private readonly snapshotCache: ResultCache<IndicatorSnapshot>;
  private readonly marginCache: ResultCache<MarginComparison>;
  private readonly stateStore: ScanStateStore;
  private readonly notifier: Notifier | undefined;
  private readonly logger: Logger;

  constructor(config: SignalScannerConfig) {
    this.config = {
      concurrency: config.concurrency ?? env.SCAN_CONCURRENCY,
      fetchTimeoutMs: config.fetchTimeoutMs ?? env.FETCH_TIMEOUT_MS,
      historyDays: config.historyDays ?? DEFAULT_HISTORY_DAYS,
      sendTimeoutMs: config.sendTimeoutMs ?? env.SEND_TIMEOUT_MS,
    };
    this.provider = config.provider;
    this.stateStore = config.stateStore ?? new InMemoryScanStateStore();
    this.notifier = config.notifier;
    this.thresholds = config.thresholds
      ? validateSignalThresholds(config.thresholds)
      : signalThresholdsFromEnv();
    this.logger = config.logger ?? serviceLoggers.scanner;
    this.snapshotCache =
      config.snapshotCache ??
      new ResultCache<IndicatorSnapshot>({
        name: "snapshots",
        defaultTTL: env.CACHE_TTL_MS,
        failureTTL: env.CACHE_FAILURE_TTL_MS,
        maxEntries: env.CACHE_MAX_ENTRIES,
        logger: serviceLoggers.cache,
      });
    this.marginCache =
      config.marginCache ??
      new ResultCache<MarginComparison>({
        name: "margins",
        defaultTTL: env.CACHE_TTL_MS,
        failureTTL: env.CACHE_FAILURE_TTL_MS,
        maxEntries: env.CACHE_MAX_ENTRIES,
        logger: serviceLoggers.cache,
      });
  }

  /**
   * Evaluate a single instrument. Without a sentiment context the
   * trend-setter gate does not run.
   */
  async evaluate(
    instrument: TrackedInstrument,
    sentiment?: SentimentContext
  ): Promise<Evaluation> {
    const loaded = await this.load(instrument);
    return this.classify(instrument, loaded, sentiment);
  }

  /**
   * Evaluate every instrument, record the signals and notify actionable
   * changes. Resolves after the whole universe has been processed; rejects
   * only when the state store fails.
   */
  async runScan(
    instruments: readonly TrackedInstrument[],
    context: ScanContext = {}
  ): Promise<ScanReport> {
    const startedAt = new Date();
    this.logger.info("Scan started", { instruments: instruments.length });

    const settled = await settleInBatches(instruments, this.config.concurrency, (instrument) =>
      this.load(instrument)
    );
    const loaded: LoadedInput[] = settled.map((result, index) => {
      if (result.status === "fulfilled") {
        return result.value;
      }
      const instrument = instruments[index];
      return {
        status: "unavailable",
        ticker: instrument?.ticker ?? "unknown",
        category: instrument?.category ?? "trend_setter",
        reason: errorMessage(result.reason),
        code: "UPSTREAM_FETCH_FAILED",
      };
    });

    const sentiment = context.sentiment ?? this.deriveSentiment(loaded);

    const evaluations: Evaluation[] = [];
    instruments.forEach((instrument, index) => {
      const entry = loaded[index];
      if (entry) {
        evaluations.push(this.classify(instrument, entry, sentiment));
      }
    });

    const bySignal = emptySignalCounts();
    const actionable: ClassificationResult[] = [];
    let unavailable = 0;
    for (const evaluation of evaluations) {
      if (evaluation.status === "unavailable") {
        unavailable++;
        continue;
      }
      bySignal[evaluation.result.signal]++;
      if (isActionable(evaluation.result)) {
        actionable.push(evaluation.result);
      }
    }

    const changes = await this.detectChanges(evaluations);
    const notification = await this.notifyChanges(changes);
    await this.recordSignals(evaluations, changes, notification, sentiment, startedAt);

    const completedAt = new Date();
    const report: ScanReport = {
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
      total: instruments.length,
      classified: evaluations.length - unavailable,
      unavailable,
      ...(sentiment ? { sentiment } : {}),
      bySignal,
      actionable,
      changes,
      ...(notification ? { notification } : {}),
      evaluations,
    };

    this.logger.info("Scan complete", {
      total: report.total,
      classified: report.classified,
      unavailable: report.unavailable,
      actionable: actionable.length,
      changes: changes.length,
      durationMs: report.durationMs,
    });
    return report;
  }

  /**
   * Signals that differ from the stored ones. An instrument never scanned
   * before counts as NORMAL.
   */
  private async detectChanges(evaluations: readonly Evaluation[]): Promise<SignalChange[]> {
    const changes: SignalChange[] = [];
    for (const evaluation of evaluations) {
      if (evaluation.status !== "classified") {
        continue;
      }
      const previous = (await this.stateStore.getLastSignal(evaluation.ticker)) ?? SignalState.NORMAL;
      const current = evaluation.result.signal;
      if (previous !== current) {
        changes.push({ ticker: evaluation.ticker, previous, current, result: evaluation.result });
      }
    }
    return changes;
  }

  private async notifyChanges(changes: readonly SignalChange[]): Promise<SendOutcome | undefined> {
    const results = changes.filter((change) => isActionable(change.result)).map((c) => c.result);
    if (!this.notifier || results.length === 0) {
      return undefined;
    }

    const outcome = await sendWithTimeout(
      this.notifier,
      formatScanDigest(results),
      this.config.sendTimeoutMs
    );
    if (outcome.success) {
      this.logger.info("Scan digest sent", { signals: results.length });
    } else {
      this.logger.warn("Scan digest failed", { error: outcome.error.message });
    }
    return outcome;
  }

  private async recordSignals(
    evaluations: readonly Evaluation[],
    changes: readonly SignalChange[],
    notification: SendOutcome | undefined,
    sentiment: SentimentContext | undefined,
    scannedAt: Date
  ): Promise<void> {
    const undelivered = new Set(
      notification && !notification.success
        ? changes.filter((change) => isActionable(change.result)).map((c) => c.ticker)
        : []
    );

    const entries: ScanLogEntry[] = [];
    for (const evaluation of evaluations) {
      if (evaluation.status !== "classified") {
        continue;
      }
      const { ticker, result } = evaluation;
      entries.push({
        ticker,
        signal: result.signal,
        ...(sentiment ? { sentiment: sentiment.sentiment } : {}),
        alerts: result.alerts,
        scannedAt,
      });
      if (!undelivered.has(ticker)) {
        await this.stateStore.setLastSignal(ticker, result.signal);
      }
    }
    await this.stateStore.appendScanLog(entries);
  }

  /**
   * Sentiment over the snapshots loaded in this scan
   */
  private deriveSentiment(loaded: readonly LoadedInput[]): SentimentContext | undefined {
    const snapshots: IndicatorSnapshot[] = [];
    for (const entry of loaded) {
      if (entry.status === "loaded" && entry.input.category !== "moat") {
        snapshots.push(entry.input.snapshot);
      }
    }
    return determineMarketSentiment(snapshots, this.thresholds.sentimentCautionRatio);
  }

  private classify(
    instrument: TrackedInstrument,
    loaded: LoadedInput,
    sentiment: SentimentContext | undefined
  ): Evaluation {
    if (loaded.status === "unavailable") {
      return loaded;
    }
    return {
      status: "classified",
      ticker: instrument.ticker,
      category: instrument.category,
      result: classifySignal(loaded.input, this.thresholds, sentiment),
    };
  }

  /**
   * Fetch and derive the classifier input for one instrument
   */
  private async load(instrument: TrackedInstrument): Promise<LoadedInput> {
    const { ticker, category } = instrument;

    try {
      if (category === "moat") {
        const margin = await this.marginCache.getOrCompute(ticker, () => this.loadMargin(ticker));
        return { status: "loaded", input: { category, ticker, margin } };
      }

      const snapshot = await this.snapshotFor(ticker);
      return { status: "loaded", input: { category, ticker, snapshot } };
    } catch (error) {
      const code: EngineErrorCode =
        error instanceof EngineError ? error.code : "UPSTREAM_FETCH_FAILED";
      this.logger.warn("Instrument unavailable", { ticker, code, error: errorMessage(error) });
      return { status: "unavailable", ticker, category, reason: errorMessage(error), code };
    }
  }

  /**
   * Cached indicator snapshot for a ticker. Rejects with UpstreamFetchError
   * on fetch failure or timeout, DataUnavailableError on empty history.
   */
  async snapshotFor(ticker: string): Promise<IndicatorSnapshot> {
    return this.snapshotCache.getOrCompute(ticker, () => this.loadSnapshot(ticker));
  }

  private async loadSnapshot(ticker: string): Promise<IndicatorSnapshot> {
    const outcome = await fetchOutcome(ticker, this.config.fetchTimeoutMs, () =>
      this.provider.fetchPriceHistory(ticker, { days: this.config.historyDays })
    );
    if (!outcome.success) {
      throw outcome.error;
    }
    const snapshot = buildIndicatorSnapshot(normalizeSeries(outcome.data), {
      rsiPeriod: this.thresholds.rsiPeriod,
      longWindow: this.thresholds.longWindow,
      shortWindow: this.thresholds.shortWindow,
      relaxedLongWindow: this.thresholds.relaxedLongWindow,
    });
    if (!snapshot) {
      throw new DataUnavailableError("price", "No price history returned");
    }
    return snapshot;
  }

  private async loadMargin(ticker: string): Promise<MarginComparison> {
    const outcome = await fetchOutcome(ticker, this.config.fetchTimeoutMs, () =>
      this.provider.fetchFundamentals(ticker)
    );
    if (!outcome.success) {
      throw outcome.error;
    }
    const { currentMargin, previousMargin, currentPeriod, previousPeriod } = outcome.data;
    return evaluateMarginTrend(currentMargin, previousMargin, {
      current: currentPeriod,
      previous: previousPeriod,
    });
  }

  getThresholds(): Readonly<SignalThresholds> {
    return { ...this.thresholds };
  }
}

export function createSignalScanner(config: SignalScannerConfig): SignalScanner {
  return new SignalScanner(config);
}
