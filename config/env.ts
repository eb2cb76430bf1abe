import dotenv from "dotenv";
import { ConfigurationError } from "../src/errors";

// Load environment variables from .env file
dotenv.config();

/**
 * Environment variable configuration with type safety and validation
 */

/**
 * Get a required environment variable
 */
function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable
 */
function getEnvVarOptional(key: string): string | undefined {
  const value = process.env[key];
  return value === "" ? undefined : value;
}

/**
 * Get an environment variable as an integer
 */
function getEnvVarAsNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

/**
 * Get an environment variable as a float (thresholds and percentages)
 */
function getEnvVarAsFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be a finite number, got: ${value}`);
  }
  return parsed;
}

/**
 * Get an environment variable as a boolean
 */
function getEnvVarAsBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  return value.toLowerCase() === "true" || value === "1";
}

/**
 * Validate Telegram bot token format
 * Token format: <bot_id>:<secret>
 */
function validateTelegramBotToken(token: string | undefined): string | undefined {
  if (token === undefined || token === "") {
    return undefined;
  }
  const tokenRegex = /^\d+:[A-Za-z0-9_-]+$/;
  if (!tokenRegex.test(token)) {
    throw new Error(
      "Invalid TELEGRAM_BOT_TOKEN format. Expected format: <bot_id>:<secret>"
    );
  }
  return token;
}

/**
 * Redact sensitive values for logging
 */
function redactSecret(value: string | undefined): string {
  if (value === undefined || value === "") {
    return "(not set)";
  }
  if (value.length <= 8) {
    return "****";
  }
  return `${value.substring(0, 4)}****${value.substring(value.length - 4)}`;
}

/**
 * All environment configuration
 */
export const env = {
  // Application
  NODE_ENV: getEnvVar("NODE_ENV", "development"),
  isProduction: getEnvVar("NODE_ENV", "development") === "production",
  isTest: getEnvVar("NODE_ENV", "development") === "test",
  LOG_LEVEL: getEnvVarOptional("LOG_LEVEL"),
  LOG_PRETTY: getEnvVarAsBoolean("LOG_PRETTY", true),

  // Telegram Notifications
  TELEGRAM_BOT_TOKEN: validateTelegramBotToken(getEnvVarOptional("TELEGRAM_BOT_TOKEN")),
  TELEGRAM_CHAT_ID: getEnvVarOptional("TELEGRAM_CHAT_ID"),

  // Scan execution
  SCAN_CONCURRENCY: getEnvVarAsNumber("SCAN_CONCURRENCY", 4),
  FETCH_TIMEOUT_MS: getEnvVarAsNumber("FETCH_TIMEOUT_MS", 15000),
  SEND_TIMEOUT_MS: getEnvVarAsNumber("SEND_TIMEOUT_MS", 15000),

  // Result caches (indicators and margin checks)
  CACHE_TTL_MS: getEnvVarAsNumber("CACHE_TTL_MS", 300000),
  CACHE_FAILURE_TTL_MS: getEnvVarAsNumber("CACHE_FAILURE_TTL_MS", 0),
  CACHE_MAX_ENTRIES: getEnvVarAsNumber("CACHE_MAX_ENTRIES", 200),

  // Technical indicators
  RSI_PERIOD: getEnvVarAsNumber("RSI_PERIOD", 14),
  RSI_OVERSOLD: getEnvVarAsFloat("RSI_OVERSOLD", 30),
  RSI_OVERBOUGHT: getEnvVarAsFloat("RSI_OVERBOUGHT", 70),
  MA_LONG_WINDOW: getEnvVarAsNumber("MA_LONG_WINDOW", 200),
  MA_SHORT_WINDOW: getEnvVarAsNumber("MA_SHORT_WINDOW", 60),
  MA_LONG_RELAXED: getEnvVarAsBoolean("MA_LONG_RELAXED", false),
  BIAS_OVERHEATED_PCT: getEnvVarAsFloat("BIAS_OVERHEATED_PCT", 20),
  BIAS_OVERSOLD_PCT: getEnvVarAsFloat("BIAS_OVERSOLD_PCT", -20),

  // Market sentiment gate
  SENTIMENT_CAUTION_RATIO: getEnvVarAsFloat("SENTIMENT_CAUTION_RATIO", 0.5),

  // FX movement alerts
  FX_DAILY_SPIKE_PCT: getEnvVarAsFloat("FX_DAILY_SPIKE_PCT", 1.0),
  FX_SHORT_SWING_PCT: getEnvVarAsFloat("FX_SHORT_SWING_PCT", 2.0),
  FX_LONG_TREND_PCT: getEnvVarAsFloat("FX_LONG_TREND_PCT", 8.0),
} as const;

export type Env = typeof env;

/**
 * Log the current configuration (with sensitive values redacted)
 */
export function logConfig(): void {
  const config = {
    NODE_ENV: env.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL ?? "(default)",
    LOG_PRETTY: env.LOG_PRETTY,
    TELEGRAM_BOT_TOKEN: redactSecret(env.TELEGRAM_BOT_TOKEN),
    TELEGRAM_CHAT_ID: env.TELEGRAM_CHAT_ID ?? "(not set)",
    SCAN_CONCURRENCY: env.SCAN_CONCURRENCY,
    FETCH_TIMEOUT_MS: env.FETCH_TIMEOUT_MS,
    SEND_TIMEOUT_MS: env.SEND_TIMEOUT_MS,
    CACHE_TTL_MS: env.CACHE_TTL_MS,
    CACHE_FAILURE_TTL_MS: env.CACHE_FAILURE_TTL_MS,
    CACHE_MAX_ENTRIES: env.CACHE_MAX_ENTRIES,
    RSI_PERIOD: env.RSI_PERIOD,
    MA_LONG_WINDOW: env.MA_LONG_WINDOW,
    MA_SHORT_WINDOW: env.MA_SHORT_WINDOW,
    MA_LONG_RELAXED: env.MA_LONG_RELAXED,
  };

  console.log("=".repeat(60));
  console.log("Environment Configuration (secrets redacted):");
  console.log("=".repeat(60));
  for (const [key, value] of Object.entries(config)) {
    console.log(`  ${key}: ${value}`);
  }
  console.log("=".repeat(60));
}

/**
 * Validate that the environment is properly configured
 */
export function validateEnv(source: Env = env): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (source.SCAN_CONCURRENCY < 1) {
    errors.push(`SCAN_CONCURRENCY must be at least 1, got: ${source.SCAN_CONCURRENCY}`);
  }
  if (source.FETCH_TIMEOUT_MS <= 0) {
    errors.push(`FETCH_TIMEOUT_MS must be positive, got: ${source.FETCH_TIMEOUT_MS}`);
  }
  if (source.SEND_TIMEOUT_MS <= 0) {
    errors.push(`SEND_TIMEOUT_MS must be positive, got: ${source.SEND_TIMEOUT_MS}`);
  }
  if (source.CACHE_TTL_MS < 0 || source.CACHE_FAILURE_TTL_MS < 0) {
    errors.push("CACHE_TTL_MS and CACHE_FAILURE_TTL_MS must not be negative");
  }
  if (source.CACHE_MAX_ENTRIES < 1) {
    errors.push(`CACHE_MAX_ENTRIES must be at least 1, got: ${source.CACHE_MAX_ENTRIES}`);
  }
  if (source.CACHE_FAILURE_TTL_MS > source.CACHE_TTL_MS) {
    warnings.push("CACHE_FAILURE_TTL_MS is longer than CACHE_TTL_MS - failures outlive successes");
  }

  if (!source.TELEGRAM_BOT_TOKEN || !source.TELEGRAM_CHAT_ID) {
    warnings.push("TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID not set - alerts will not be delivered");
  }

  if (source.MA_LONG_RELAXED) {
    warnings.push("MA_LONG_RELAXED is enabled - the long moving average may cover fewer points than its window");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Initialize and validate environment configuration
 * Logs config and throws a ConfigurationError if critical errors are found
 */
export function initializeEnv(): void {
  if (!env.isTest) {
    logConfig();
  }

  const validation = validateEnv();

  if (validation.warnings.length > 0 && !env.isTest) {
    console.log("\nConfiguration Warnings:");
    for (const warning of validation.warnings) {
      console.log(`  ⚠️  ${warning}`);
    }
  }

  if (validation.errors.length > 0) {
    console.error("\nConfiguration Errors:");
    for (const error of validation.errors) {
      console.error(`  ❌  ${error}`);
    }
    throw new ConfigurationError(validation.errors);
  }
}

// Export utility functions for testing
export const envUtils = {
  validateTelegramBotToken,
  redactSecret,
  getEnvVarAsFloat,
  getEnvVarAsBoolean,
};
