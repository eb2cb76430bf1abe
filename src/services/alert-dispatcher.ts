/**
 * Alert Dispatcher
 *
 * Turns alert candidates into notifications while enforcing each record's
 * cooldown. Per record and per cycle:
 *
 *   IDLE → CANDIDATE → FIRED | SUPPRESSED | FAILED
 *
 * Only candidates reach the dispatcher; IDLE records never do. For each
 * candidate, under a per-record mutex:
 * - re-read `lastAlertedAt` from the store
 * - inside the cooldown window → SUPPRESSED
 * - claim the slot by compare-and-set of `lastAlertedAt` to now; losing
 *   the race → SUPPRESSED
 * - send; success → FIRED, failure → restore the previous timestamp → FAILED
 *
 * A failed send never consumes the cooldown, so the next cycle retries.
 * A send that outlives `sendTimeoutMs` counts as failed.
 */

import { EventEmitter } from "events";
import { env } from "../../config/env";
import { errorMessage } from "../errors";
import { sendWithTimeout } from "../notifications/send";
import type { Notifier } from "../notifications/types";
import { settleInBatches } from "../utils/batch";
import { KeyedMutex } from "../utils/keyed-mutex";
import { serviceLoggers, type Logger } from "../utils/logger";
import type { CooldownRecord, WatchStore } from "./watch-store";

// ============================================================================
// Types
// ============================================================================

const MS_PER_HOUR = 60 * 60 * 1000;

export type DispatchState = "FIRED" | "SUPPRESSED" | "FAILED";

export type SuppressionReason = "cooldown" | "claim_lost" | "inactive" | "missing";

/**
 * A record whose evaluation said "alert", with the message to send
 */
export interface AlertCandidate<T extends CooldownRecord> {
  record: T;
  message: string;
}

interface OutcomeBase<T extends CooldownRecord> {
  id: string;
  record: T;
  message: string;
}

export type DispatchOutcome<T extends CooldownRecord> =
  | (OutcomeBase<T> & { state: "FIRED"; alertedAt: Date; messageId?: number })
  | (OutcomeBase<T> & {
      state: "SUPPRESSED";
      reason: SuppressionReason;
      nextEligibleAt?: Date;
    })
  | (OutcomeBase<T> & { state: "FAILED"; error: string; restored: boolean });

export interface DispatchResult<T extends CooldownRecord> {
  /** Records evaluated this cycle, candidates or not */
  total: number;
  candidates: number;
  fired: number;
  suppressed: number;
  failed: number;
  outcomes: DispatchOutcome<T>[];
}

/**
 * Dispatcher statistics across cycles
 */
export interface AlertDispatcherStats {
  cycles: number;
  fired: number;
  suppressed: number;
  failed: number;
  lastFiredAt: Date | null;
}

export interface AlertDispatcherConfig<T extends CooldownRecord> {
  store: WatchStore<T>;
  notifier: Notifier;

  /** Candidates processed in parallel (default: 4) */
  concurrency?: number;

  /** Give up on a notifier send after this many ms (default: SEND_TIMEOUT_MS) */
  sendTimeoutMs?: number;

  /** Emit alert:* events (default: true) */
  enableEvents?: boolean;

  /** Clock, injectable for tests */
  now?: () => Date;

  logger?: Logger;
}

// ============================================================================
// Cooldown helpers
// ============================================================================

/**
 * Whether a record alerted less than `cooldownHours` before `now`
 */
export function isInCooldown(
  lastAlertedAt: Date | undefined,
  cooldownHours: number,
  now: Date
): boolean {
  if (lastAlertedAt === undefined) {
    return false;
  }
  return now.getTime() - lastAlertedAt.getTime() < cooldownHours * MS_PER_HOUR;
}

/**
 * Earliest time the record may alert again, undefined when it may now
 */
export function nextEligibleAt(
  lastAlertedAt: Date | undefined,
  cooldownHours: number,
  now: Date
): Date | undefined {
  if (!isInCooldown(lastAlertedAt, cooldownHours, now) || lastAlertedAt === undefined) {
    return undefined;
  }
  return new Date(lastAlertedAt.getTime() + cooldownHours * MS_PER_HOUR);
}

// ============================================================================
// Alert Dispatcher
// ============================================================================

export class AlertDispatcher<T extends CooldownRecord> extends EventEmitter {
  private readonly config: Required<Pick<AlertDispatcherConfig<T>, "concurrency" | "sendTimeoutMs" | "enableEvents">>;
  private readonly store: WatchStore<T>;
  private readonly notifier: Notifier;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly mutex = new KeyedMutex();

  private stats: AlertDispatcherStats = {
    cycles: 0,
    fired: 0,
    suppressed: 0,
    failed: 0,
    lastFiredAt: null,
  };

  constructor(config: AlertDispatcherConfig<T>) {
    super();
    this.config = {
      concurrency: Math.max(1, config.concurrency ?? 4),
      sendTimeoutMs: config.sendTimeoutMs ?? env.SEND_TIMEOUT_MS,
      enableEvents: config.enableEvents ?? true,
    };
    this.store = config.store;
    this.notifier = config.notifier;
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? serviceLoggers.alertDispatcher;
  }

  /**
   * Dispatch every candidate of one cycle. Resolves once each candidate
   * has reached a final state; never rejects because of one record.
   *
   * @param total - Records evaluated in the cycle (defaults to the candidate count)
   */
  async dispatch(
    candidates: readonly AlertCandidate<T>[],
    total: number = candidates.length
  ): Promise<DispatchResult<T>> {
    const settled = await settleInBatches(candidates, this.config.concurrency, (candidate) =>
      this.mutex.runExclusive(candidate.record.id, () => this.dispatchOne(candidate))
    );

    const outcomes: DispatchOutcome<T>[] = [];
    settled.forEach((result, index) => {
      const candidate = candidates[index];
      if (!candidate) {
        return;
      }
      if (result.status === "fulfilled") {
        outcomes.push(result.value);
        return;
      }
      // Store errors land here, before a claim or after the restore attempt
      const error = errorMessage(result.reason);
      this.logger.error("Dispatch failed", { watchId: candidate.record.id, error });
      outcomes.push({
        id: candidate.record.id,
        record: candidate.record,
        message: candidate.message,
        state: "FAILED",
        error,
        restored: false,
      });
    });

    const result: DispatchResult<T> = {
      total,
      candidates: candidates.length,
      fired: outcomes.filter((o) => o.state === "FIRED").length,
      suppressed: outcomes.filter((o) => o.state === "SUPPRESSED").length,
      failed: outcomes.filter((o) => o.state === "FAILED").length,
      outcomes,
    };

    this.stats.cycles++;
    this.stats.fired += result.fired;
    this.stats.suppressed += result.suppressed;
    this.stats.failed += result.failed;

    this.logger.info("Dispatch cycle complete", {
      total: result.total,
      candidates: result.candidates,
      fired: result.fired,
      suppressed: result.suppressed,
      failed: result.failed,
    });

    return result;
  }

  /**
   * Run one candidate through the state machine. Caller holds the mutex.
   */
  private async dispatchOne(candidate: AlertCandidate<T>): Promise<DispatchOutcome<T>> {
    const { id } = candidate.record;
    const base = { id, record: candidate.record, message: candidate.message };

    const current = await this.store.get(id);
    if (!current) {
      return this.suppress(base, "missing");
    }
    if (!current.isActive) {
      return this.suppress(base, "inactive");
    }

    const now = this.now();
    const previous = current.lastAlertedAt;
    if (isInCooldown(previous, current.cooldownHours, now)) {
      return this.suppress(base, "cooldown", nextEligibleAt(previous, current.cooldownHours, now));
    }

    const claimed = await this.store.compareAndSetLastAlertedAt(id, previous, now);
    if (!claimed) {
      return this.suppress(base, "claim_lost");
    }

    const sent = await sendWithTimeout(this.notifier, candidate.message, this.config.sendTimeoutMs);

    if (!sent.success) {
      const restored = await this.store.compareAndSetLastAlertedAt(id, now, previous);
      if (!restored) {
        this.logger.warn("Could not restore lastAlertedAt after failed send", { watchId: id });
      }
      this.logger.warn("Alert send failed", { watchId: id, error: sent.error.message });

      const outcome: DispatchOutcome<T> = {
        ...base,
        state: "FAILED",
        error: sent.error.message,
        restored,
      };
      this.publish("alert:failed", outcome);
      return outcome;
    }

    this.stats.lastFiredAt = now;
    this.logger.info("Alert fired", { watchId: id });
    const outcome: DispatchOutcome<T> = {
      ...base,
      state: "FIRED",
      alertedAt: now,
      ...(sent.messageId !== undefined ? { messageId: sent.messageId } : {}),
    };
    this.publish("alert:fired", outcome);
    return outcome;
  }

  private suppress(
    base: OutcomeBase<T>,
    reason: SuppressionReason,
    eligibleAt?: Date
  ): DispatchOutcome<T> {
    this.logger.debug("Alert suppressed", { watchId: base.id, reason });
    const outcome: DispatchOutcome<T> = {
      ...base,
      state: "SUPPRESSED",
      reason,
      ...(eligibleAt ? { nextEligibleAt: eligibleAt } : {}),
    };
    this.publish("alert:suppressed", outcome);
    return outcome;
  }

  private publish(event: string, outcome: DispatchOutcome<T>): void {
    if (this.config.enableEvents) {
      this.emit(event, outcome);
    }
  }

  getStats(): AlertDispatcherStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = { cycles: 0, fired: 0, suppressed: 0, failed: 0, lastFiredAt: null };
  }

  dispose(): void {
    this.removeAllListeners();
  }
}

/**
 * Create a dispatcher over a store and notifier
 */
export function createAlertDispatcher<T extends CooldownRecord>(
  config: AlertDispatcherConfig<T>
): AlertDispatcher<T> {
  return new AlertDispatcher<T>(config);
}
