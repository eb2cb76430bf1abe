/**
 * Unit tests for ResultCache
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ResultCache, createResultCache } from "../../src/cache/result-cache";

describe("ResultCache", () => {
  let cache: ResultCache<string>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
    cache = new ResultCache<string>({ defaultTTL: 1000, maxEntries: 3 });
  });

  afterEach(() => {
    cache.dispose();
    vi.useRealTimers();
  });

  describe("get/set", () => {
    it("should return a stored value", () => {
      cache.set("a", "one");
      expect(cache.get("a")).toBe("one");
      expect(cache.has("a")).toBe(true);
    });

    it("should return undefined for a missing key", () => {
      expect(cache.get("missing")).toBeUndefined();
    });

    it("should expire an entry exactly at its TTL", () => {
      cache.set("a", "one");

      vi.advanceTimersByTime(999);
      expect(cache.get("a")).toBe("one");

      vi.advanceTimersByTime(1);
      expect(cache.get("a")).toBeUndefined();
      expect(cache.getStats().expirations).toBe(1);
    });

    it("should honour a per-entry TTL", () => {
      cache.set("a", "one", { ttl: 5000 });
      vi.advanceTimersByTime(4000);
      expect(cache.get("a")).toBe("one");
    });

    it("should store nothing with a TTL of 0", () => {
      cache.set("a", "one", { ttl: 0 });
      expect(cache.size).toBe(0);
    });

    it("should delete entries", () => {
      cache.set("a", "one");
      expect(cache.delete("a")).toBe(true);
      expect(cache.get("a")).toBeUndefined();
    });
  });

  describe("eviction", () => {
    it("should evict the least recently used entry", () => {
      cache.set("a", "one");
      cache.set("b", "two");
      cache.set("c", "three");

      // touching "a" leaves "b" as the oldest
      cache.get("a");
      cache.set("d", "four");

      expect(cache.keys()).toEqual(["c", "a", "d"]);
      expect(cache.getStats().evictions).toBe(1);
    });

    it("should not evict when overwriting an existing key", () => {
      cache.set("a", "one");
      cache.set("b", "two");
      cache.set("c", "three");
      cache.set("a", "uno");

      expect(cache.size).toBe(3);
      expect(cache.get("a")).toBe("uno");
    });
  });

  describe("getOrCompute", () => {
    it("should compute once and serve later calls from the cache", async () => {
      const compute = vi.fn().mockResolvedValue("value");

      expect(await cache.getOrCompute("k", compute)).toBe("value");
      expect(await cache.getOrCompute("k", compute)).toBe("value");

      expect(compute).toHaveBeenCalledTimes(1);
      expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1, computations: 1 });
    });

    it("should recompute after expiry", async () => {
      const compute = vi.fn().mockResolvedValueOnce("first").mockResolvedValueOnce("second");

      await cache.getOrCompute("k", compute);
      vi.advanceTimersByTime(1000);

      expect(await cache.getOrCompute("k", compute)).toBe("second");
      expect(compute).toHaveBeenCalledTimes(2);
    });

    it("should share one computation between concurrent callers", async () => {
      let resolve: (value: string) => void = () => undefined;
      const compute = vi.fn(
        () =>
          new Promise<string>((r) => {
            resolve = r;
          })
      );

      const first = cache.getOrCompute("k", compute);
      const second = cache.getOrCompute("k", compute);
      expect(cache.getStats().inFlight).toBe(1);

      resolve("shared");
      expect(await first).toBe("shared");
      expect(await second).toBe("shared");
      expect(compute).toHaveBeenCalledTimes(1);
      expect(cache.getStats().inFlight).toBe(0);
    });

    it("should not store a value whose key was deleted mid-computation", async () => {
      let resolve: (value: string) => void = () => undefined;
      const pending = cache.getOrCompute(
        "k",
        () =>
          new Promise<string>((r) => {
            resolve = r;
          })
      );

      cache.delete("k");
      resolve("stale");

      expect(await pending).toBe("stale");
      expect(cache.get("k")).toBeUndefined();
    });

    it("should not store a value computed across a clear", async () => {
      let resolve: (value: string) => void = () => undefined;
      const pending = cache.getOrCompute(
        "k",
        () =>
          new Promise<string>((r) => {
            resolve = r;
          })
      );

      cache.delete("k");
      cache.clear();
      resolve("stale");
      await pending;

      expect(cache.get("k")).toBeUndefined();
      expect(cache.getStats().inFlight).toBe(0);
    });

    it("should start a fresh computation after a delete", async () => {
      let resolveStale: (value: string) => void = () => undefined;
      const stale = cache.getOrCompute(
        "k",
        () =>
          new Promise<string>((r) => {
            resolveStale = r;
          })
      );
      cache.delete("k");

      const fresh = cache.getOrCompute("k", async () => "fresh");
      expect(await fresh).toBe("fresh");

      resolveStale("stale");
      await stale;
      expect(cache.get("k")).toBe("fresh");
    });

    it("should not cache failures by default", async () => {
      const compute = vi
        .fn<[], Promise<string>>()
        .mockRejectedValueOnce(new Error("boom"))
        .mockResolvedValueOnce("recovered");

      await expect(cache.getOrCompute("k", compute)).rejects.toThrow("boom");
      expect(await cache.getOrCompute("k", compute)).toBe("recovered");
      expect(cache.getStats().failures).toBe(1);
    });

    it("should remember failures for failureTTL", async () => {
      const failing = new ResultCache<string>({ defaultTTL: 1000, failureTTL: 500 });
      const compute = vi
        .fn<[], Promise<string>>()
        .mockRejectedValueOnce(new Error("boom"))
        .mockResolvedValueOnce("recovered");

      await expect(failing.getOrCompute("k", compute)).rejects.toThrow("boom");
      await expect(failing.getOrCompute("k", compute)).rejects.toThrow("boom");
      expect(compute).toHaveBeenCalledTimes(1);
      expect(failing.getStats().cachedFailureHits).toBe(1);

      vi.advanceTimersByTime(500);
      expect(await failing.getOrCompute("k", compute)).toBe("recovered");
      failing.dispose();
    });

    it("should pass through with a default TTL of 0", async () => {
      const passThrough = createResultCache<string>({ defaultTTL: 0 });
      const compute = vi.fn().mockResolvedValue("fresh");

      await passThrough.getOrCompute("k", compute);
      await passThrough.getOrCompute("k", compute);

      expect(compute).toHaveBeenCalledTimes(2);
      expect(passThrough.size).toBe(0);
    });
  });

  describe("cleanup", () => {
    it("should remove expired entries", () => {
      cache.set("a", "one");
      cache.set("b", "two", { ttl: 5000 });
      vi.advanceTimersByTime(2000);

      expect(cache.cleanup()).toBe(1);
      expect(cache.keys()).toEqual(["b"]);
    });

    it("should sweep on an interval when configured", () => {
      const swept = new ResultCache<string>({ defaultTTL: 1000, cleanupInterval: 5000 });
      swept.set("a", "one");

      vi.advanceTimersByTime(5000);
      expect(swept.size).toBe(0);
      swept.dispose();
    });
  });

  describe("metadata", () => {
    it("should expose entry metadata without the value", () => {
      cache.set("a", "one");
      cache.get("a");

      const now = new Date("2024-01-01T00:00:00Z").getTime();
      expect(cache.getEntryMetadata("a")).toEqual({
        createdAt: now,
        expiresAt: now + 1000,
        ttl: 1000,
        hitCount: 1,
      });
      expect(cache.getEntryMetadata("missing")).toBeNull();
    });

    it("should report its configuration", () => {
      expect(cache.getConfig()).toEqual({
        defaultTTL: 1000,
        maxEntries: 3,
        failureTTL: 0,
        cleanupInterval: 0,
        name: "results",
      });
    });
  });
});
