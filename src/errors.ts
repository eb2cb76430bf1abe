/**
 * Error taxonomy
 *
 * Every error raised by the engine carries a machine-readable `code`.
 * Only ConfigurationError is meant to escape to callers; the others are
 * caught at their call site and turned into typed outcomes.
 */

export type EngineErrorCode =
  | "DATA_UNAVAILABLE"
  | "UPSTREAM_FETCH_FAILED"
  | "UPSTREAM_TIMEOUT"
  | "NOTIFICATION_FAILED"
  | "INVALID_CONFIG";

/**
 * Base class for engine errors
 */
export class EngineError extends Error {
  public readonly code: EngineErrorCode;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: EngineErrorCode,
    options: { retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.retryable = options.retryable ?? false;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Input data missing or too short for an indicator
 */
export class DataUnavailableError extends EngineError {
  public readonly field: string;

  constructor(field: string, message?: string) {
    super(message ?? `Insufficient data for ${field}`, "DATA_UNAVAILABLE");
    this.name = "DataUnavailableError";
    this.field = field;
  }
}

/**
 * Transport, auth or timeout failure from a market-data fetch
 */
export class UpstreamFetchError extends EngineError {
  public readonly instrumentId: string;

  constructor(
    instrumentId: string,
    message: string,
    options: { timeout?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.timeout ? "UPSTREAM_TIMEOUT" : "UPSTREAM_FETCH_FAILED", {
      retryable: true,
      cause: options.cause,
    });
    this.name = "UpstreamFetchError";
    this.instrumentId = instrumentId;
  }

  get isTimeout(): boolean {
    return this.code === "UPSTREAM_TIMEOUT";
  }
}

/**
 * Notification channel rejected or failed to deliver a message
 */
export class NotificationDeliveryError extends EngineError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, "NOTIFICATION_FAILED", { retryable: true, cause: options.cause });
    this.name = "NotificationDeliveryError";
  }
}

/**
 * Invalid thresholds or watch settings, rejected before a cycle starts
 */
export class ConfigurationError extends EngineError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, "INVALID_CONFIG");
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Normalize anything thrown into an Error message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
