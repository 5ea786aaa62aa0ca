import { getReport } from "../../../../function/analyze";
import {
  IMarketAnalysis,
  ITimeframeAnalysis,
} from "../../../../interfaces/Analysis.interface";

const WHEN = new Date("2024-01-01T00:00:00.000Z");

const intraday: ITimeframeAnalysis = {
  status: "ok",
  timeframe: "15m",
  currentPrice: 2005.25,
  indicators: {
    rsi: { value: 62.34, condition: "bullish", trend: "rising" },
    macd: {
      macd: 1.2,
      signal: 0.9,
      histogram: 0.3,
      condition: "bullish",
      crossover: "bullish_crossover",
    },
    bollinger: {
      upper: 2040,
      middle: 2000,
      lower: 1960,
      width: 0.04,
      position: "upper_half",
      squeeze: true,
    },
    obv: { value: 5000, trend: "accumulation" },
    sma20: 1990,
    sma50: 1970,
    levels: { support: [1950, 1980], resistance: [2050], strength: 3 },
    volumeProfile: { poc: 1999.5, totalVolume: 90000, distribution: "balanced" },
  },
  trend: "bullish",
  trendScore: 2,
  confidence: 86,
  sentiment: 0.8,
  action: "BUY",
};

const analysis: IMarketAnalysis = {
  symbol: "ETH/USDT",
  when: WHEN,
  timeframes: {
    "15m": intraday,
    "1h": {
      status: "error",
      timeframe: "1h",
      error: "RSI requires at least 15 candles, received 10",
    },
  },
  anchor: {
    timestamp: WHEN.getTime() - 900_000,
    open: 2000,
    high: 2010.5,
    low: 1995,
    close: 2005.25,
    volume: 12345.6,
  },
  context: {
    marketSentiment: "bullish",
    sentimentStrength: 0.35,
    change24h: 3.5,
    volume24h: 1234567,
    source: "coingecko",
  },
  tradeLevels: {
    intraday: {
      horizon: "intraday",
      action: "BUY",
      entry: 2000,
      stopLoss: 1970,
      takeProfit: 2060,
      riskReward: 2,
    },
    swing: {
      horizon: "swing",
      action: "SELL",
      entry: 2000,
      stopLoss: 2100,
      takeProfit: 1800,
      riskReward: 2,
    },
  },
  sentiment: { shortTerm: 0.8, longTerm: 0.25 },
};

describe("ReportMarkdownService", () => {
  test("renders every section", async () => {
    const report = await getReport(analysis, {
      price: 2005.25,
      change24h: 3.5,
      volume24h: 1234567,
      high24h: 2050,
      low24h: 1950,
      source: "kucoin",
    });
    expect(report).toBe(
      [
        "# Market Analysis: ETH/USDT",
        "> Generated: 2024-01-01T00:00:00.000Z",
        "",
        "## Latest Completed Candle",
        "",
        "> 2023-12-31T23:45:00.000Z",
        "",
        "| Open | High | Low | Close | Volume |",
        "| --- | --- | --- | --- | --- |",
        "| 2000.00 | 2010.50 | 1995.00 | 2005.25 | 12,346 |",
        "",
        "## Trading Matrix",
        "",
        "| Horizon | Action | Entry | Stop Loss | Take Profit | R:R | Leverage |",
        "| --- | --- | --- | --- | --- | --- | --- |",
        "| Intraday | BUY | 2000.00 | 1970.00 | 2060.00 | 1:2.0 | 5x |",
        "| Swing | SELL | 2000.00 | 2100.00 | 1800.00 | 1:2.0 | 3x |",
        "",
        "## Key Levels",
        "",
        "### 15m",
        "- Resistance: 2050.00",
        "- Support: 1950.00, 1980.00",
        "- Strength: 3",
        "",
        "### 1h",
        "- None identified",
        "",
        "## Technical Signals",
        "",
        "| Timeframe | Price | Trend | Confidence | RSI | MACD | Bollinger | OBV | Volume Profile | Action |",
        "| --- | --- | --- | --- | --- | --- | --- | --- | --- | --- |",
        "| 15m | 2005.25 | bullish | 86% | 62.3 (bullish, rising) | bullish, bullish_crossover | upper_half, squeeze | accumulation | POC 1999.50 (balanced) | BUY |",
        "",
        "**Failed timeframes:**",
        "- 1h: RSI requires at least 15 candles, received 10",
        "",
        "## Sentiment",
        "",
        "- Short-term: 0.80",
        "- Long-term: 0.25",
        "",
        "## Market Context",
        "",
        "- Sentiment: bullish (strength 0.35)",
        "- 24h change: +3.50%",
        "- 24h volume: 1,234,567",
        "- Source: coingecko",
        "- Last price: 2005.25 (kucoin)",
        "- 24h range: 1950.00 - 2050.00",
        "",
        "## Risk Management",
        "",
        "- Max risk per trade: 2%",
        "- Intraday leverage: 5x",
        "- Swing leverage: 3x",
      ].join("\n")
    );
  });

  test("marks missing data", async () => {
    const report = await getReport({
      ...analysis,
      timeframes: {},
      anchor: null,
      context: null,
    });
    const lines = report.split("\n");
    expect(lines).toContain("*No completed candle*");
    expect(lines).toContain("*No timeframe could be analysed*");
    expect(lines).toContain("- Sentiment: unknown");
    expect(lines).not.toContain("**Failed timeframes:**");
  });
});
