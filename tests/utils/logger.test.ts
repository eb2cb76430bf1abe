/**
 * Logger Utility Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  createLogger,
  createServiceLogger,
  createSilentLogger,
  isLogThreshold,
  serviceLoggers,
} from "../../src/utils/logger";

function spyConsole() {
  return {
    debug: vi.spyOn(console, "debug").mockImplementation(() => {}),
    info: vi.spyOn(console, "info").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

describe("Logger Utility", () => {
  let consoleSpy: ReturnType<typeof spyConsole>;

  function lineOf(method: keyof ReturnType<typeof spyConsole>): string {
    return String(consoleSpy[method].mock.calls[0]?.[0]);
  }

  beforeEach(() => {
    consoleSpy = spyConsole();
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T09:30:15.250Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("isLogThreshold", () => {
    it("should accept known levels and silent only", () => {
      expect(isLogThreshold("warn")).toBe(true);
      expect(isLogThreshold("silent")).toBe(true);
      expect(isLogThreshold("trace")).toBe(false);
      expect(isLogThreshold("toString")).toBe(false);
    });
  });

  describe("createLogger", () => {
    it("should write one JSON line with the service and context", () => {
      const log = createLogger({ level: "info", pretty: false, service: "Scanner" });

      log.info("Scan complete", { ticker: "AAA", total: 3 });

      expect(lineOf("info")).toBe(
        '{"time":"2024-01-01T09:30:15.250Z","level":"info","service":"Scanner",' +
          '"msg":"Scan complete","ticker":"AAA","total":3}'
      );
    });

    it("should leave out the service when none is set", () => {
      const log = createLogger({ level: "info", pretty: false });

      log.warn("Alert send failed", { watchId: "w1" });

      expect(JSON.parse(lineOf("warn"))).toEqual({
        time: "2024-01-01T09:30:15.250Z",
        level: "warn",
        msg: "Alert send failed",
        watchId: "w1",
      });
    });

    it("should drop entries below the configured level", () => {
      const log = createLogger({ level: "warn", pretty: false });

      log.debug("hidden");
      log.info("hidden");
      log.warn("shown");
      log.error("shown");

      expect(consoleSpy.debug).not.toHaveBeenCalled();
      expect(consoleSpy.info).not.toHaveBeenCalled();
      expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    });

    it("should pretty print a colored single line", () => {
      const log = createLogger({ level: "info", pretty: true, service: "Cache" });

      log.info("Evicted entry", { key: "AAA" });

      expect(lineOf("info")).toBe(
        "\x1b[2m09:30:15.250\x1b[0m \x1b[32mINFO \x1b[0m \x1b[36m[Cache]\x1b[0m " +
          'Evicted entry \x1b[2m{"key":"AAA"}\x1b[0m'
      );
    });

    it("should pretty print without context", () => {
      const log = createLogger({ level: "debug", pretty: true });

      log.debug("tick");

      expect(lineOf("debug")).toBe("\x1b[2m09:30:15.250\x1b[0m \x1b[36mDEBUG\x1b[0m tick");
    });
  });

  describe("service loggers", () => {
    it("should create a logger at the configured level", () => {
      const log = createServiceLogger("Telegram");
      expect(log.level).not.toBe("silent");
    });

    it("should reuse one instance per service", () => {
      expect(serviceLoggers.scanner).toBe(serviceLoggers.scanner);
      expect(serviceLoggers.scanner).not.toBe(serviceLoggers.cache);
    });
  });

  describe("createSilentLogger", () => {
    it("should never write", () => {
      const silent = createSilentLogger();

      silent.error("nothing");
      silent.info("nothing");

      expect(silent.level).toBe("silent");
      expect(consoleSpy.error).not.toHaveBeenCalled();
      expect(consoleSpy.info).not.toHaveBeenCalled();
    });
  });
});
