/**
 * Signal Radar
 * Signal analysis and cooldown-gated alerting engine
 */

export const APP_NAME = "Signal Radar";
export const VERSION = "0.1.0";

// Analysis
export * from "./analysis/types";
export * from "./analysis/indicators";
export * from "./analysis/exchange-timing";
export * from "./analysis/rate-change";
export * from "./analysis/margin-trend";
export * from "./analysis/thresholds";
export * from "./analysis/signal-status";
export * from "./analysis/market-sentiment";
export * from "./analysis/signal-classifier";

// Infrastructure
export * from "./errors";
export * from "./cache/result-cache";
export * from "./api/market-data/provider";
export * from "./utils/keyed-mutex";
export * from "./utils/batch";
export * from "./utils/logger";

// Notifications
export * from "./notifications/types";
export * from "./notifications/send";
export * from "./notifications/telegram/notifier";
export * from "./notifications/telegram/alert-formatter";

// Services
export * from "./services/watch-store";
export * from "./services/scan-state-store";
export * from "./services/alert-dispatcher";
export * from "./services/signal-scanner";
export * from "./services/watch-service";
export * from "./services/price-alerts";
