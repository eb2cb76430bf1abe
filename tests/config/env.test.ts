import { describe, it, expect, afterEach, vi } from "vitest";
import { env, envUtils, initializeEnv, validateEnv } from "../../config/env";
import { rateChangeThresholdsFromEnv, signalThresholdsFromEnv } from "../../config/thresholds";
import { ConfigurationError } from "../../src/errors";

describe("Environment Configuration", () => {
  describe("validateTelegramBotToken", () => {
    it("should return undefined for empty or undefined token", () => {
      expect(envUtils.validateTelegramBotToken(undefined)).toBe(undefined);
      expect(envUtils.validateTelegramBotToken("")).toBe(undefined);
    });

    it("should return token for valid format", () => {
      expect(envUtils.validateTelegramBotToken("12345:test-secret")).toBe("12345:test-secret");
    });

    it("should throw for invalid format", () => {
      expect(() => envUtils.validateTelegramBotToken("test-secret")).toThrow(
        "Invalid TELEGRAM_BOT_TOKEN format"
      );
    });
  });

  describe("redactSecret", () => {
    it("should keep only the ends of long secrets", () => {
      expect(envUtils.redactSecret("test-secret-value")).toBe("test****alue");
    });

    it("should fully mask short secrets", () => {
      expect(envUtils.redactSecret("secret")).toBe("****");
    });

    it("should report unset secrets", () => {
      expect(envUtils.redactSecret(undefined)).toBe("(not set)");
      expect(envUtils.redactSecret("")).toBe("(not set)");
    });
  });

  describe("getEnvVarAsFloat / getEnvVarAsBoolean", () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it("should parse floats and fall back to the default", () => {
      vi.stubEnv("TEST_RATIO", "0.65");
      expect(envUtils.getEnvVarAsFloat("TEST_RATIO", 0.5)).toBe(0.65);
      expect(envUtils.getEnvVarAsFloat("TEST_MISSING_RATIO", 0.5)).toBe(0.5);
    });

    it("should reject non-numeric floats", () => {
      vi.stubEnv("TEST_RATIO", "lots");
      expect(() => envUtils.getEnvVarAsFloat("TEST_RATIO", 0.5)).toThrow(
        "Environment variable TEST_RATIO must be a finite number, got: lots"
      );
    });

    it("should parse booleans", () => {
      vi.stubEnv("TEST_FLAG", "TRUE");
      expect(envUtils.getEnvVarAsBoolean("TEST_FLAG", false)).toBe(true);
      vi.stubEnv("TEST_FLAG", "0");
      expect(envUtils.getEnvVarAsBoolean("TEST_FLAG", true)).toBe(false);
      expect(envUtils.getEnvVarAsBoolean("TEST_MISSING_FLAG", true)).toBe(true);
    });
  });

  describe("validateEnv", () => {
    const configured = {
      ...env,
      TELEGRAM_BOT_TOKEN: "12345:test-secret",
      TELEGRAM_CHAT_ID: "12345",
      SCAN_CONCURRENCY: 4,
      FETCH_TIMEOUT_MS: 15000,
      SEND_TIMEOUT_MS: 15000,
      CACHE_TTL_MS: 300000,
      CACHE_FAILURE_TTL_MS: 0,
      CACHE_MAX_ENTRIES: 200,
      MA_LONG_RELAXED: false,
    };

    it("should pass a complete configuration", () => {
      expect(validateEnv(configured)).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it("should report invalid execution settings", () => {
      const result = validateEnv({
        ...configured,
        SCAN_CONCURRENCY: 0,
        FETCH_TIMEOUT_MS: 0,
        SEND_TIMEOUT_MS: -1,
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        "SCAN_CONCURRENCY must be at least 1, got: 0",
        "FETCH_TIMEOUT_MS must be positive, got: 0",
        "SEND_TIMEOUT_MS must be positive, got: -1",
      ]);
    });

    it("should warn when Telegram is not configured", () => {
      const result = validateEnv({ ...configured, TELEGRAM_CHAT_ID: undefined });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        "TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID not set - alerts will not be delivered",
      ]);
    });

    it("should warn when failures outlive successes", () => {
      const result = validateEnv({ ...configured, CACHE_TTL_MS: 1000, CACHE_FAILURE_TTL_MS: 5000 });
      expect(result.warnings).toHaveLength(1);
    });
  });

  describe("initializeEnv", () => {
    it("should accept the default configuration", () => {
      expect(() => initializeEnv()).not.toThrow();
    });
  });

  describe("thresholds from the environment", () => {
    it("should build signal thresholds", () => {
      const thresholds = signalThresholdsFromEnv({ ...env, RSI_PERIOD: 10, MA_SHORT_WINDOW: 20 });

      expect(thresholds.rsiPeriod).toBe(10);
      expect(thresholds.shortWindow).toBe(20);
    });

    it("should throw on an inconsistent set", () => {
      expect(() =>
        signalThresholdsFromEnv({ ...env, RSI_OVERSOLD: 80, RSI_OVERBOUGHT: 70 })
      ).toThrow(ConfigurationError);
    });

    it("should build rate change thresholds", () => {
      expect(
        rateChangeThresholdsFromEnv({
          ...env,
          FX_DAILY_SPIKE_PCT: 1,
          FX_SHORT_SWING_PCT: 2,
          FX_LONG_TREND_PCT: 8,
        })
      ).toEqual({ dailySpikePct: 1, shortSwingPct: 2, longTrendPct: 8 });
    });

    it("should throw on a negative or unparsable rate threshold", () => {
      expect(() => rateChangeThresholdsFromEnv({ ...env, FX_DAILY_SPIKE_PCT: -0.5 })).toThrow(
        "dailySpikePct must be a positive percentage, got -0.5"
      );
      expect(() => rateChangeThresholdsFromEnv({ ...env, FX_LONG_TREND_PCT: NaN })).toThrow(
        ConfigurationError
      );
    });
  });
});
