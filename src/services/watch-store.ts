/**
 * Watch Store
 *
 * Persistence contract for anything gated by an alert cooldown (currency
 * watches, price-alert rules). The only field the engine writes is
 * `lastAlertedAt`, and only through compare-and-set.
 */

import { ConfigurationError } from "../errors";

// ============================================================================
// Records
// ============================================================================

/**
 * Fields every cooldown-gated record carries
 */
export interface CooldownRecord {
  id: string;
  cooldownHours: number;
  isActive: boolean;
  lastAlertedAt?: Date;
}

/**
 * A currency-pair timing watch
 */
export interface WatchConfig extends CooldownRecord {
  base: string;
  quote: string;
  /** Window for the recent-high check, in days */
  lookbackDays: number;
  /** Strictly increasing closes required before alerting */
  consecutiveThreshold: number;
}

export const DEFAULT_WATCH_SETTINGS = {
  lookbackDays: 30,
  consecutiveThreshold: 3,
  cooldownHours: 24,
} as const;

/**
 * Collect problems with a cooldown record's shared fields
 */
export function cooldownIssues(record: CooldownRecord): string[] {
  const issues: string[] = [];
  if (!record.id) {
    issues.push("id is required");
  }
  if (!Number.isFinite(record.cooldownHours) || record.cooldownHours < 0) {
    issues.push(`${record.id}: cooldownHours must be >= 0`);
  }
  return issues;
}

/**
 * Validate a watch before it enters a cycle
 */
export function validateWatchConfig(watch: WatchConfig): WatchConfig {
  const issues = cooldownIssues(watch);
  if (!watch.base || !watch.quote) {
    issues.push(`${watch.id}: base and quote currencies are required`);
  }
  if (!Number.isInteger(watch.lookbackDays) || watch.lookbackDays < 2) {
    issues.push(`${watch.id}: lookbackDays must be an integer >= 2`);
  }
  if (!Number.isInteger(watch.consecutiveThreshold) || watch.consecutiveThreshold < 1) {
    issues.push(`${watch.id}: consecutiveThreshold must be an integer >= 1`);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return watch;
}

// ============================================================================
// Store contract
// ============================================================================

export interface WatchStore<T extends CooldownRecord> {
  listActive(): Promise<T[]>;
  get(id: string): Promise<T | undefined>;
  /**
   * Set `lastAlertedAt` to `next` only if it still equals `expected`.
   * Resolves false when another writer got there first or the record is gone.
   */
  compareAndSetLastAlertedAt(
    id: string,
    expected: Date | undefined,
    next: Date | undefined
  ): Promise<boolean>;
}

function sameInstant(a: Date | undefined, b: Date | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.getTime() === b.getTime();
}

// ============================================================================
// In-process store
// ============================================================================

/**
 * Map-backed store. Records are copied on the way in and out so callers
 * never hold a live reference.
 */
export class InMemoryWatchStore<T extends CooldownRecord> implements WatchStore<T> {
  private readonly records: Map<string, T> = new Map();

  constructor(initial: readonly T[] = []) {
    for (const record of initial) {
      this.upsert(record);
    }
  }

  public upsert(record: T): void {
    this.records.set(record.id, { ...record });
  }

  public remove(id: string): boolean {
    return this.records.delete(id);
  }

  public async listActive(): Promise<T[]> {
    return Array.from(this.records.values())
      .filter((record) => record.isActive)
      .map((record) => ({ ...record }));
  }

  public async get(id: string): Promise<T | undefined> {
    const record = this.records.get(id);
    return record ? { ...record } : undefined;
  }

  public async compareAndSetLastAlertedAt(
    id: string,
    expected: Date | undefined,
    next: Date | undefined
  ): Promise<boolean> {
    const record = this.records.get(id);
    if (!record || !sameInstant(record.lastAlertedAt, expected)) {
      return false;
    }
    const updated: T = { ...record };
    updated.lastAlertedAt = next;
    this.records.set(id, updated);
    return true;
  }

  public get size(): number {
    return this.records.size;
  }
}
