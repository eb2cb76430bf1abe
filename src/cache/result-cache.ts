/**
 * Result Cache
 *
 * Keyed, time-expiring memoization in front of expensive fetches and
 * computations. One instance per computation kind (indicator snapshots,
 * margin checks); construct it once and inject it.
 *
 * - Per-entry TTL fixed at insertion, checked lazily on read
 * - Least-recently-used eviction at `maxEntries`
 * - Concurrent `getOrCompute` calls for one key share a single computation
 * - A TTL of 0 turns the cache into a pass-through
 * - Failures are not cached unless `failureTTL` is set
 */

import type { Logger } from "../utils/logger";

/**
 * Configuration options for the cache
 */
export interface ResultCacheConfig {
  /**
   * Default TTL in milliseconds; 0 disables storage
   * @default 300000 (5 minutes)
   */
  defaultTTL?: number;

  /**
   * Maximum number of entries
   * @default 200
   */
  maxEntries?: number;

  /**
   * How long a failed computation is remembered, in milliseconds.
   * 0 means failures are never cached.
   * @default 0
   */
  failureTTL?: number;

  /**
   * Interval in ms for sweeping expired entries; 0 disables the sweep
   * @default 0
   */
  cleanupInterval?: number;

  /** Name used in log entries */
  name?: string;

  /** Logger for debug output */
  logger?: Logger;
}

/**
 * Cache entry with value and metadata
 */
export interface CacheEntry<T> {
  value: T;
  createdAt: number;
  expiresAt: number;
  ttl: number;
  hitCount: number;
}

interface FailureEntry {
  error: unknown;
  expiresAt: number;
}

/**
 * Cache statistics
 */
export interface ResultCacheStats {
  size: number;
  maxEntries: number;
  hits: number;
  misses: number;
  hitRate: number;
  evictions: number;
  expirations: number;
  computations: number;
  failures: number;
  cachedFailureHits: number;
  inFlight: number;
}

/**
 * Options for a single set/compute
 */
export interface ResultCacheOptions {
  /** TTL for this entry (overrides the default) */
  ttl?: number;
}

const DEFAULT_CONFIG = {
  defaultTTL: 300000,
  maxEntries: 200,
  failureTTL: 0,
  cleanupInterval: 0,
  name: "results",
};

/**
 * In-memory result cache with TTL and LRU eviction
 *
 * @example
 * ```typescript
 * const snapshots = new ResultCache<IndicatorSnapshot>({ defaultTTL: 300000 });
 * const snapshot = await snapshots.getOrCompute("NVDA", () => loadSnapshot("NVDA"));
 * ```
 */
export class ResultCache<T> {
  private readonly config: Required<Omit<ResultCacheConfig, "logger">>;
  private readonly logger: Logger | null;
  // Map iteration order doubles as recency order: oldest first
  private readonly entries: Map<string, CacheEntry<T>> = new Map();
  private readonly failures: Map<string, FailureEntry> = new Map();
  private readonly inFlight: Map<string, Promise<T>> = new Map();
  // Bumped by delete() per key and by clear() for all keys; a computation
  // that started under an older generation does not write its result
  private readonly keyGenerations: Map<string, number> = new Map();
  private epoch = 0;
  private cleanupIntervalId: ReturnType<typeof setInterval> | null = null;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;
  private computations = 0;
  private failureCount = 0;
  private cachedFailureHits = 0;

  constructor(config: ResultCacheConfig = {}) {
    this.config = {
      defaultTTL: config.defaultTTL ?? DEFAULT_CONFIG.defaultTTL,
      maxEntries: Math.max(1, config.maxEntries ?? DEFAULT_CONFIG.maxEntries),
      failureTTL: config.failureTTL ?? DEFAULT_CONFIG.failureTTL,
      cleanupInterval: config.cleanupInterval ?? DEFAULT_CONFIG.cleanupInterval,
      name: config.name ?? DEFAULT_CONFIG.name,
    };
    this.logger = config.logger ?? null;

    if (this.config.cleanupInterval > 0) {
      this.startCleanupInterval();
    }
  }

  private log(message: string, data: Record<string, unknown>): void {
    this.logger?.debug(message, { cache: this.config.name, ...data });
  }

  private startCleanupInterval(): void {
    if (this.cleanupIntervalId !== null) {
      return;
    }
    this.cleanupIntervalId = setInterval(() => {
      this.cleanup();
    }, this.config.cleanupInterval);
    // The sweep alone must not keep the process alive
    this.cleanupIntervalId.unref?.();
  }

  private stopCleanupInterval(): void {
    if (this.cleanupIntervalId !== null) {
      clearInterval(this.cleanupIntervalId);
      this.cleanupIntervalId = null;
    }
  }

  private isExpired(expiresAt: number): boolean {
    return Date.now() >= expiresAt;
  }

  /**
   * Evict least recently used entries until there is room for one more
   */
  private evictIfNeeded(): void {
    while (this.entries.size >= this.config.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey === undefined) {
        break;
      }
      this.entries.delete(oldestKey);
      this.evictions++;
      this.log("Evicted entry due to max size", { key: oldestKey });
    }
  }

  /**
   * Get a live value, or undefined if absent or expired
   */
  public get(key: string): T | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry.expiresAt)) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      this.log("Cache miss (expired)", { key });
      return undefined;
    }

    this.touch(key, entry);
    return entry.value;
  }

  /**
   * Count a hit and move the entry to the most recently used position
   */
  private touch(key: string, entry: CacheEntry<T>): void {
    entry.hitCount++;
    this.hits++;
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  /**
   * Store a value. A TTL of 0 or less stores nothing.
   */
  public set(key: string, value: T, options?: ResultCacheOptions): void {
    const ttl = options?.ttl ?? this.config.defaultTTL;
    if (ttl <= 0) {
      return;
    }

    this.entries.delete(key);
    this.evictIfNeeded();

    const now = Date.now();
    this.entries.set(key, {
      value,
      createdAt: now,
      expiresAt: now + ttl,
      ttl,
      hitCount: 0,
    });
    this.failures.delete(key);
  }

  /**
   * Whether a live entry exists (does not count as a hit)
   */
  public has(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    if (this.isExpired(entry.expiresAt)) {
      this.entries.delete(key);
      this.expirations++;
      return false;
    }
    return true;
  }

  public delete(key: string): boolean {
    this.keyGenerations.set(key, (this.keyGenerations.get(key) ?? 0) + 1);
    this.inFlight.delete(key);
    this.failures.delete(key);
    return this.entries.delete(key);
  }

  private generationOf(key: string): string {
    return `${this.epoch}:${this.keyGenerations.get(key) ?? 0}`;
  }

  /**
   * Return the cached value or compute, store and return it.
   *
   * Concurrent callers for the same key await one computation. A thrown
   * error reaches every waiting caller and is remembered only for
   * `failureTTL`.
   */
  public async getOrCompute(
    key: string,
    compute: () => Promise<T>,
    options?: ResultCacheOptions
  ): Promise<T> {
    const entry = this.entries.get(key);
    if (entry && !this.isExpired(entry.expiresAt)) {
      this.touch(key, entry);
      return entry.value;
    }
    if (entry) {
      this.entries.delete(key);
      this.expirations++;
    }

    const failure = this.failures.get(key);
    if (failure) {
      if (!this.isExpired(failure.expiresAt)) {
        this.cachedFailureHits++;
        throw failure.error;
      }
      this.failures.delete(key);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    this.misses++;
    this.computations++;
    const generation = this.generationOf(key);
    const promise: Promise<T> = compute()
      .then((value) => {
        if (this.generationOf(key) === generation) {
          this.set(key, value, options);
        }
        return value;
      })
      .catch((error: unknown) => {
        this.failureCount++;
        if (this.config.failureTTL > 0 && this.generationOf(key) === generation) {
          this.failures.set(key, { error, expiresAt: Date.now() + this.config.failureTTL });
        }
        this.log("Computation failed", { key, cachedFor: this.config.failureTTL });
        throw error;
      })
      .finally(() => {
        if (this.inFlight.get(key) === promise) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, promise);
    return promise;
  }

  /**
   * Remove expired entries and failures
   *
   * @returns Number of entries removed
   */
  public cleanup(): number {
    let count = 0;

    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry.expiresAt)) {
        this.entries.delete(key);
        this.expirations++;
        count++;
      }
    }
    for (const [key, failure] of this.failures) {
      if (this.isExpired(failure.expiresAt)) {
        this.failures.delete(key);
      }
    }

    if (count > 0) {
      this.log("Cleanup removed expired entries", { count });
    }
    return count;
  }

  public clear(): void {
    this.epoch++;
    this.keyGenerations.clear();
    this.inFlight.clear();
    this.entries.clear();
    this.failures.clear();
  }

  public getStats(): ResultCacheStats {
    const totalRequests = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxEntries: this.config.maxEntries,
      hits: this.hits,
      misses: this.misses,
      hitRate: totalRequests > 0 ? this.hits / totalRequests : 0,
      evictions: this.evictions,
      expirations: this.expirations,
      computations: this.computations,
      failures: this.failureCount,
      cachedFailureHits: this.cachedFailureHits,
      inFlight: this.inFlight.size,
    };
  }

  public keys(): string[] {
    return Array.from(this.entries.keys());
  }

  public get size(): number {
    return this.entries.size;
  }

  public getConfig(): Readonly<Required<Omit<ResultCacheConfig, "logger">>> {
    return { ...this.config };
  }

  /**
   * Entry metadata without the value, null when absent or expired
   */
  public getEntryMetadata(key: string): Omit<CacheEntry<T>, "value"> | null {
    const entry = this.entries.get(key);
    if (!entry || this.isExpired(entry.expiresAt)) {
      return null;
    }
    const { value: _value, ...metadata } = entry;
    return metadata;
  }

  /**
   * Stop the sweep and drop everything
   */
  public dispose(): void {
    this.stopCleanupInterval();
    this.clear();
  }
}

/**
 * Create a result cache
 */
export function createResultCache<T>(config: ResultCacheConfig = {}): ResultCache<T> {
  return new ResultCache<T>(config);
}
