/**
 * Test helpers for building price series and fakes
 */

import { vi } from "vitest";
import type { Fundamentals, HistoryPeriod, MarketDataProvider } from "../../src/api/market-data/provider";
import type { PriceSeries } from "../../src/analysis/types";
import type { Notifier, SendOutcome } from "../../src/notifications/types";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * One point per day starting 2024-01-01
 */
export function seriesFrom(closes: readonly number[]): PriceSeries {
  const start = Date.UTC(2024, 0, 1);
  return closes.map((close, i) => ({ timestamp: new Date(start + i * DAY_MS), close }));
}

export interface FakeProviderData {
  history?: Record<string, readonly number[] | Error>;
  fundamentals?: Record<string, Fundamentals | Error>;
}

/**
 * Provider backed by fixed data; unknown ids resolve empty
 */
export function createFakeProvider(data: FakeProviderData = {}) {
  const provider = {
    fetchPriceHistory: vi.fn(
      async (instrumentId: string, _period: HistoryPeriod): Promise<PriceSeries> => {
        const entry = data.history?.[instrumentId];
        if (entry instanceof Error) {
          throw entry;
        }
        return seriesFrom(entry ?? []);
      }
    ),
    fetchFundamentals: vi.fn(async (instrumentId: string): Promise<Fundamentals> => {
      const entry = data.fundamentals?.[instrumentId];
      if (entry instanceof Error) {
        throw entry;
      }
      return entry ?? {};
    }),
  } satisfies MarketDataProvider;
  return provider;
}

/**
 * Notifier whose sends succeed unless told otherwise
 */
export function createFakeNotifier(outcome: SendOutcome = { success: true, messageId: 1 }) {
  const notifier = {
    send: vi.fn(async (_message: string): Promise<SendOutcome> => outcome),
  } satisfies Notifier;
  return notifier;
}
