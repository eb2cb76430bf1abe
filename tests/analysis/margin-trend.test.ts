/**
 * Unit tests for the margin trend evaluator
 */

import { describe, it, expect } from "vitest";
import { evaluateMarginTrend, grossMarginFromStatement } from "../../src/analysis/margin-trend";
import { MarginStatus } from "../../src/analysis/types";

describe("evaluateMarginTrend", () => {
  it("should flag a shrinking margin as deteriorating", () => {
    expect(evaluateMarginTrend(45.5, 48.25)).toEqual({
      status: MarginStatus.DETERIORATING,
      currentMargin: 45.5,
      previousMargin: 48.25,
      change: -2.75,
      detail: "Gross margin deteriorating: 45.5% vs 48.25% a year ago (down 2.75 pts)",
    });
  });

  it("should treat a growing margin as stable", () => {
    expect(evaluateMarginTrend(50, 48)).toEqual({
      status: MarginStatus.STABLE,
      currentMargin: 50,
      previousMargin: 48,
      change: 2,
      detail: "Gross margin stable: 50% vs 48% a year ago (+2 pts)",
    });
  });

  it("should treat an unchanged margin as stable", () => {
    const result = evaluateMarginTrend(40, 40);
    expect(result.status).toBe(MarginStatus.STABLE);
    expect(result.detail).toBe("Gross margin stable: 40% vs 40% a year ago (+0 pts)");
  });

  it("should be unavailable when either quarter is missing", () => {
    expect(evaluateMarginTrend(undefined, 40)).toEqual({
      status: MarginStatus.UNAVAILABLE,
      previousMargin: 40,
      detail: "Gross margin unavailable for the current or year-ago quarter",
    });
    expect(evaluateMarginTrend(40, undefined).status).toBe(MarginStatus.UNAVAILABLE);
    expect(evaluateMarginTrend(undefined, undefined)).not.toHaveProperty("change");
  });

  it("should name the fiscal periods when both are known", () => {
    expect(evaluateMarginTrend(40, 45, { current: "2024Q1", previous: "2023Q1" }).detail).toBe(
      "Gross margin deteriorating: 40% in 2024Q1 vs 45% in 2023Q1 (down 5 pts)"
    );
    expect(evaluateMarginTrend(46, 45, { current: "2024Q1" }).detail).toBe(
      "Gross margin stable: 46% vs 45% a year ago (+1 pts)"
    );
  });

  it("should treat a change that rounds to zero as stable", () => {
    const result = evaluateMarginTrend(33.333, 33.336);
    expect(result.status).toBe(MarginStatus.STABLE);
    expect(result.detail).toBe("Gross margin stable: 33.333% vs 33.336% a year ago (+0 pts)");
  });
});

describe("grossMarginFromStatement", () => {
  it("should derive a percentage rounded to 2 decimals", () => {
    expect(grossMarginFromStatement(40, 100)).toBe(40);
    expect(grossMarginFromStatement(1, 3)).toBe(33.33);
  });

  it("should be unavailable for zero revenue or missing figures", () => {
    expect(grossMarginFromStatement(10, 0)).toBeUndefined();
    expect(grossMarginFromStatement(undefined, 100)).toBeUndefined();
    expect(grossMarginFromStatement(10, undefined)).toBeUndefined();
  });
});
