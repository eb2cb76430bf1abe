/**
 * Structured logging
 *
 * One JSON line per entry in production, a colored single line elsewhere.
 * Level and format come from LOG_LEVEL and LOG_PRETTY.
 *
 *   const log = createServiceLogger("Scanner");
 *   log.warn("Instrument unavailable", { ticker: "NVDA", code: "UPSTREAM_TIMEOUT" });
 */

import { env } from "../../config/env";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Lowest level a logger writes; "silent" writes nothing */
export type LogThreshold = LogLevel | "silent";

const SEVERITY: Record<LogThreshold, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: Number.POSITIVE_INFINITY,
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  readonly level: LogThreshold;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
}

export interface LoggerOptions {
  level?: LogThreshold;
  /** Tagged on every entry as `service` */
  service?: string;
  pretty?: boolean;
}

export function isLogThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

function configuredThreshold(): LogThreshold {
  const level = env.LOG_LEVEL?.toLowerCase();
  if (level && isLogThreshold(level)) {
    return level;
  }
  return env.isProduction ? "info" : "debug";
}

// ============================================================================
// Output
// ============================================================================

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: ANSI.cyan,
  info: ANSI.green,
  warn: ANSI.yellow,
  error: ANSI.red,
};

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function prettyLine(
  time: string,
  level: LogLevel,
  service: string | undefined,
  msg: string,
  context: LogContext
): string {
  // HH:MM:SS.mmm
  const clock = ANSI.dim + time.slice(11, 23) + ANSI.reset;
  const label = LEVEL_COLOR[level] + level.toUpperCase().padEnd(5) + ANSI.reset;
  const tag = service ? `${ANSI.cyan}[${service}]${ANSI.reset} ` : "";
  const extra =
    Object.keys(context).length > 0 ? ` ${ANSI.dim}${JSON.stringify(context)}${ANSI.reset}` : "";
  return `${clock} ${label} ${tag}${msg}${extra}`;
}

// ============================================================================
// Loggers
// ============================================================================

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = options.level ?? configuredThreshold();
  const pretty = options.pretty ?? (env.LOG_PRETTY && !env.isProduction);
  const { service } = options;

  const write = (level: LogLevel, msg: string, context: LogContext = {}): void => {
    if (SEVERITY[level] < SEVERITY[threshold]) {
      return;
    }
    const time = new Date().toISOString();
    WRITERS[level](
      pretty
        ? prettyLine(time, level, service, msg, context)
        : JSON.stringify({ time, level, ...(service ? { service } : {}), msg, ...context })
    );
  };

  return {
    level: threshold,
    debug: (msg, context) => write("debug", msg, context),
    info: (msg, context) => write("info", msg, context),
    warn: (msg, context) => write("warn", msg, context),
    error: (msg, context) => write("error", msg, context),
  };
}

export const logger = createLogger({ service: "signal-radar" });

export function createServiceLogger(service: string): Logger {
  return createLogger({ service });
}

const serviceLoggerCache = new Map<string, Logger>();

function lazyServiceLogger(service: string): Logger {
  let instance = serviceLoggerCache.get(service);
  if (!instance) {
    instance = createServiceLogger(service);
    serviceLoggerCache.set(service, instance);
  }
  return instance;
}

/**
 * One shared logger per engine service, created on first use
 */
export const serviceLoggers = {
  get scanner(): Logger {
    return lazyServiceLogger("Scanner");
  },
  get watchService(): Logger {
    return lazyServiceLogger("WatchService");
  },
  get alertDispatcher(): Logger {
    return lazyServiceLogger("AlertDispatcher");
  },
  get priceAlerts(): Logger {
    return lazyServiceLogger("PriceAlerts");
  },
  get telegram(): Logger {
    return lazyServiceLogger("Telegram");
  },
  get cache(): Logger {
    return lazyServiceLogger("Cache");
  },
};

/**
 * Logger that writes nothing, for tests and dry runs
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: "silent" });
}
