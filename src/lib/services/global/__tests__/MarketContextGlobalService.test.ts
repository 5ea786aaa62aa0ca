import { addContext } from "../../../../function/add";
import { deriveMarketContext } from "../../../../function/analyze";
import market from "../../../index";
import { ITicker } from "../../../../interfaces/Exchange.interface";

const ticker: ITicker = {
  price: 2000,
  change24h: -3,
  volume24h: 1500,
  high24h: 2100,
  low24h: 1950,
  source: "primary",
};

describe("deriveMarketContext", () => {
  test("bullish above the threshold", () => {
    const context = deriveMarketContext(3.5, 1000);
    expect(context.marketSentiment).toBe("bullish");
    expect(context.sentimentStrength).toBeCloseTo(0.35);
    expect(context.change24h).toBe(3.5);
    expect(context.volume24h).toBe(1000);
    expect(context.source).toBe("default");
  });

  test("bearish below the negative threshold", () => {
    const context = deriveMarketContext(-2.5, null);
    expect(context.marketSentiment).toBe("bearish");
    expect(context.sentimentStrength).toBeCloseTo(0.25);
  });

  test("neutral within the threshold, inclusive", () => {
    expect(deriveMarketContext(2, 10).marketSentiment).toBe("neutral");
    expect(deriveMarketContext(-1, 10).sentimentStrength).toBeCloseTo(0.1);
  });

  test("strength is capped at 1", () => {
    expect(deriveMarketContext(15, 1).sentimentStrength).toBe(1);
  });

  test("non-finite change is neutral", () => {
    expect(deriveMarketContext(NaN, 1)).toEqual({
      marketSentiment: "neutral",
      sentimentStrength: 0.5,
      change24h: null,
      volume24h: null,
      source: "default",
    });
  });
});

describe("MarketContextGlobalService", () => {
  const { marketContextGlobalService } = market;

  test("neutral without sources or ticker", async () => {
    await expect(
      marketContextGlobalService.getMarketContext("ETH/USDT")
    ).resolves.toEqual({
      marketSentiment: "neutral",
      sentimentStrength: 0.5,
      change24h: null,
      volume24h: null,
      source: "default",
    });
  });

  test("every neutral fallback is a fresh object", async () => {
    const first = await marketContextGlobalService.getMarketContext("ETH/USDT");
    const second = await marketContextGlobalService.getMarketContext("ETH/USDT");
    expect(second).not.toBe(first);
    first.sentimentStrength = 0;
    expect(second.sentimentStrength).toBe(0.5);
  });

  test("falls back to the ticker", async () => {
    const context = await marketContextGlobalService.getMarketContext(
      "ETH/USDT",
      ticker
    );
    expect(context.marketSentiment).toBe("bearish");
    expect(context.sentimentStrength).toBeCloseTo(0.3);
    expect(context.source).toBe("primary");
  });

  test("prefers the first registered source that answers", async () => {
    addContext({
      contextName: "failing",
      getMarketContext: async () => {
        throw new Error("rate limited");
      },
    });
    addContext({
      contextName: "fake",
      getMarketContext: async () => ({ change24h: 4, volume24h: 900 }),
    });
    const context = await marketContextGlobalService.getMarketContext(
      "ETH/USDT",
      ticker
    );
    expect(context.marketSentiment).toBe("bullish");
    expect(context.sentimentStrength).toBeCloseTo(0.4);
    expect(context.volume24h).toBe(900);
    expect(context.source).toBe("fake");
  });
});
