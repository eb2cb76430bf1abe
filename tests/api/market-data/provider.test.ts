/**
 * Tests for provider call helpers
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  fetchOutcome,
  normalizeSeries,
  withTimeout,
} from "../../../src/api/market-data/provider";
import { UpstreamFetchError } from "../../../src/errors";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve with the wrapped value", async () => {
    expect(await withTimeout(Promise.resolve(5), 100, "AAA")).toBe(5);
  });

  it("should reject with a timeout error when the call hangs", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<number>(() => undefined), 100, "AAA");
    const assertion = expect(pending).rejects.toMatchObject({
      code: "UPSTREAM_TIMEOUT",
      instrumentId: "AAA",
      message: "Request timeout after 100ms",
    });

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it("should reject with the caller's error when given a factory", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(
      new Promise<number>(() => undefined),
      50,
      () => new Error("send took too long")
    );
    const assertion = expect(pending).rejects.toThrow("send took too long");

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it("should clear the timer once the call settles", async () => {
    vi.useFakeTimers();
    await withTimeout(Promise.resolve("done"), 100, "AAA");
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe("fetchOutcome", () => {
  it("should wrap data in a success outcome", async () => {
    expect(await fetchOutcome("AAA", 100, async () => [1, 2])).toEqual({
      success: true,
      data: [1, 2],
    });
  });

  it("should convert a plain error into an upstream fetch error", async () => {
    const cause = new Error("502 Bad Gateway");

    const outcome = await fetchOutcome("AAA", 100, async () => {
      throw cause;
    });

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error).toBeInstanceOf(UpstreamFetchError);
      expect(outcome.error.message).toBe("502 Bad Gateway");
      expect(outcome.error.code).toBe("UPSTREAM_FETCH_FAILED");
      expect(outcome.error.retryable).toBe(true);
      expect(outcome.error.isTimeout).toBe(false);
    }
  });

  it("should keep an upstream fetch error as is", async () => {
    const error = new UpstreamFetchError("AAA", "forbidden");
    const outcome = await fetchOutcome("AAA", 100, async () => {
      throw error;
    });
    expect(outcome.success ? undefined : outcome.error).toBe(error);
  });
});

describe("normalizeSeries", () => {
  it("should sort, dedupe and drop non-finite closes", () => {
    const day = (n: number) => new Date(Date.UTC(2024, 0, n));

    const series = normalizeSeries([
      { timestamp: day(3), close: 3 },
      { timestamp: day(1), close: 1 },
      { timestamp: day(2), close: Number.NaN },
      { timestamp: day(3), close: 33 },
      { timestamp: new Date("invalid"), close: 5 },
      { timestamp: day(4), close: Number.POSITIVE_INFINITY },
    ]);

    expect(series).toEqual([
      { timestamp: day(1), close: 1 },
      { timestamp: day(3), close: 33 },
    ]);
  });
});
