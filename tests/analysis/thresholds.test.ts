/**
 * Unit tests for signal threshold validation
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_SIGNAL_THRESHOLDS,
  validateSignalThresholds,
} from "../../src/analysis/thresholds";
import { ConfigurationError } from "../../src/errors";

describe("validateSignalThresholds", () => {
  it("should accept the defaults", () => {
    expect(validateSignalThresholds(DEFAULT_SIGNAL_THRESHOLDS)).toBe(DEFAULT_SIGNAL_THRESHOLDS);
  });

  it("should reject inverted RSI thresholds", () => {
    expect(() =>
      validateSignalThresholds({ ...DEFAULT_SIGNAL_THRESHOLDS, rsiOversold: 70, rsiOverbought: 30 })
    ).toThrow("rsiOversold (70) must be below rsiOverbought (30)");
  });

  it("should collect every issue into one error", () => {
    let caught: unknown;
    try {
      validateSignalThresholds({
        ...DEFAULT_SIGNAL_THRESHOLDS,
        rsiPeriod: 0,
        shortWindow: 300,
        sentimentCautionRatio: 1,
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.issues).toEqual([
        "rsiPeriod must be a positive integer, got 0",
        "shortWindow must be shorter than longWindow",
        "sentimentCautionRatio must lie strictly between 0 and 1, got 1",
      ]);
    }
  });

  it("should reject inverted bias thresholds", () => {
    expect(() =>
      validateSignalThresholds({ ...DEFAULT_SIGNAL_THRESHOLDS, biasOversoldPct: 25 })
    ).toThrow(ConfigurationError);
  });
});
