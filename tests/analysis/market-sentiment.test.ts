/**
 * Unit tests for breadth-based market sentiment
 */

import { describe, it, expect } from "vitest";
import { determineMarketSentiment } from "../../src/analysis/market-sentiment";
import { MarketSentiment } from "../../src/analysis/types";

describe("determineMarketSentiment", () => {
  it("should turn cautious when most instruments trade below their short MA", () => {
    const context = determineMarketSentiment(
      [
        { price: 9, maShort: 10 },
        { price: 18, maShort: 20 },
        { price: 6, maShort: 5 },
      ],
      0.5
    );

    expect(context).toEqual({
      sentiment: MarketSentiment.CAUTION,
      belowShortMaRatio: 2 / 3,
      sampleSize: 3,
    });
  });

  it("should stay positive when the ratio equals the caution ratio", () => {
    const context = determineMarketSentiment(
      [
        { price: 9, maShort: 10 },
        { price: 11, maShort: 10 },
      ],
      0.5
    );

    expect(context?.sentiment).toBe(MarketSentiment.POSITIVE);
    expect(context?.belowShortMaRatio).toBe(0.5);
  });

  it("should skip snapshots without a short MA", () => {
    const context = determineMarketSentiment(
      [{ price: 9 }, { price: 9, maShort: 10 }, { price: 1, rsi: 10 }],
      0.5
    );

    expect(context).toEqual({
      sentiment: MarketSentiment.CAUTION,
      belowShortMaRatio: 1,
      sampleSize: 1,
    });
  });

  it("should return undefined when no snapshot has a short MA", () => {
    expect(determineMarketSentiment([{ price: 1 }, { price: 2 }], 0.5)).toBeUndefined();
    expect(determineMarketSentiment([], 0.5)).toBeUndefined();
  });

  it("should not count a price sitting exactly on the MA as below", () => {
    const context = determineMarketSentiment([{ price: 10, maShort: 10 }], 0.5);
    expect(context?.belowShortMaRatio).toBe(0);
  });
});
