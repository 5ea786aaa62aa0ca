import market from "../../../index";
import {
  IIndicatorSnapshot,
  MacdCondition,
  MacdCrossover,
  ObvTrend,
  RsiCondition,
  TradeAction,
  TrendLabel,
} from "../../../../interfaces/Analysis.interface";

const { trendMathService } = market;

const snapshot = (patch: Partial<IIndicatorSnapshot>): IIndicatorSnapshot => ({
  rsi: null,
  macd: null,
  bollinger: null,
  obv: null,
  sma20: null,
  sma50: null,
  levels: { support: [], resistance: [], strength: 0 },
  volumeProfile: null,
  ...patch,
});

const bullishMacd = {
  macd: 1,
  signal: 0.5,
  histogram: 0.5,
  condition: "bullish",
  crossover: "bullish_crossover",
} as const;

describe("TrendMathService", () => {
  test("price score from the moving averages", () => {
    expect(trendMathService.getPriceScore(110, 100, 90)).toBe(2);
    expect(trendMathService.getPriceScore(110, 100, 105)).toBe(1);
    expect(trendMathService.getPriceScore(90, 100, 110)).toBe(-2);
    expect(trendMathService.getPriceScore(90, 100, 80)).toBe(-1);
    expect(trendMathService.getPriceScore(100, 100, 90)).toBe(0);
    expect(trendMathService.getPriceScore(100, null, null)).toBe(0);
  });

  test("trend labels", () => {
    expect(trendMathService.getTrendLabel(4)).toBe("strong_bullish");
    expect(trendMathService.getTrendLabel(1)).toBe("bullish");
    expect(trendMathService.getTrendLabel(0)).toBe("neutral");
    expect(trendMathService.getTrendLabel(-2)).toBe("bearish");
    expect(trendMathService.getTrendLabel(-3)).toBe("strong_bearish");
  });

  test("aligned signals give a strong bullish trend", () => {
    const result = trendMathService.getTrend(
      snapshot({
        rsi: { value: 65, condition: "bullish", trend: "rising" },
        macd: bullishMacd,
        sma20: 100,
        sma50: 90,
      }),
      110
    );
    expect(result).toEqual({ trend: "strong_bullish", score: 4 });
  });

  test("RSI extremes do not vote in the trend", () => {
    const result = trendMathService.getTrend(
      snapshot({
        rsi: { value: 90, condition: "extremely_overbought", trend: "rising" },
        sma20: 100,
      }),
      110
    );
    expect(result).toEqual({ trend: "bullish", score: 1 });
  });

  test("confidence adds bonuses for directional signals and levels", () => {
    expect(
      trendMathService.getConfidence(
        snapshot({
          rsi: { value: 65, condition: "bullish", trend: "rising" },
          macd: bullishMacd,
          levels: { support: [90], resistance: [110, 120], strength: 3 },
        })
      )
    ).toBe(96);
  });

  test("level bonus is capped", () => {
    expect(
      trendMathService.getConfidence(
        snapshot({
          levels: { support: [1, 2, 3], resistance: [4, 5, 6], strength: 6 },
        })
      )
    ).toBe(60);
  });

  test("confidence stays at the base without signals", () => {
    expect(trendMathService.getConfidence(snapshot({}))).toBe(50);
  });

  test("sentiment is clamped to 0..1", () => {
    expect(
      trendMathService.getSentiment(
        snapshot({
          rsi: { value: 65, condition: "bullish", trend: "rising" },
          macd: bullishMacd,
          obv: { value: 10, trend: "accumulation" },
        }),
        "strong_bullish"
      )
    ).toBeCloseTo(1);
    expect(
      trendMathService.getSentiment(
        snapshot({
          rsi: { value: 90, condition: "extremely_overbought", trend: "rising" },
          macd: { ...bullishMacd, condition: "bearish", crossover: "none" },
          obv: { value: 1, trend: "distribution" },
        }),
        "bearish"
      )
    ).toBeCloseTo(0);
    expect(trendMathService.getSentiment(snapshot({}), "neutral")).toBe(0.5);
  });

  test("majority vote with ties resolved to HOLD", () => {
    expect(trendMathService.voteAction([1, 1, -1])).toBe("BUY");
    expect(trendMathService.voteAction([-1, 0, 0])).toBe("SELL");
    expect(trendMathService.voteAction([1, -1, 0])).toBe("HOLD");
    expect(trendMathService.voteAction([])).toBe("HOLD");
  });

  test("an overbought extreme cancels a bullish trend", () => {
    expect(
      trendMathService.getAction(
        snapshot({
          rsi: { value: 90, condition: "extremely_overbought", trend: "rising" },
        }),
        "bullish"
      )
    ).toBe("HOLD");
  });

  describe("over every label combination", () => {
    const TRENDS: TrendLabel[] = [
      "strong_bullish",
      "bullish",
      "neutral",
      "bearish",
      "strong_bearish",
    ];
    const RSI_CONDITIONS: RsiCondition[] = [
      "extremely_overbought",
      "overbought",
      "bullish",
      "neutral",
      "bearish",
      "oversold",
      "extremely_oversold",
    ];
    const MACD_CONDITIONS: MacdCondition[] = ["bullish", "neutral", "bearish"];
    const CROSSOVERS: MacdCrossover[] = [
      "bullish_crossover",
      "none",
      "bearish_crossover",
    ];
    const OBV_TRENDS: ObvTrend[] = ["accumulation", "distribution"];

    const MIRROR_TREND: Record<TrendLabel, TrendLabel> = {
      strong_bullish: "strong_bearish",
      bullish: "bearish",
      neutral: "neutral",
      bearish: "bullish",
      strong_bearish: "strong_bullish",
    };
    const MIRROR_RSI: Record<RsiCondition, RsiCondition> = {
      extremely_overbought: "extremely_oversold",
      overbought: "oversold",
      bullish: "bearish",
      neutral: "neutral",
      bearish: "bullish",
      oversold: "overbought",
      extremely_oversold: "extremely_overbought",
    };
    const MIRROR_MACD: Record<MacdCondition, MacdCondition> = {
      bullish: "bearish",
      neutral: "neutral",
      bearish: "bullish",
    };
    const MIRROR_ACTION: Record<TradeAction, TradeAction> = {
      BUY: "SELL",
      SELL: "BUY",
      HOLD: "HOLD",
    };

    const labelled = (
      rsi: RsiCondition,
      macd: MacdCondition,
      crossover: MacdCrossover = "none",
      obv: ObvTrend = "accumulation",
      strength = 0
    ) =>
      snapshot({
        rsi: { value: 50, condition: rsi, trend: "flat" },
        macd: { macd: 0, signal: 0, histogram: 0, condition: macd, crossover },
        obv: { value: 0, trend: obv },
        levels: { support: [], resistance: [], strength },
      });

    test("mirrored inputs flip BUY and SELL", () => {
      for (const trend of TRENDS) {
        for (const rsi of RSI_CONDITIONS) {
          for (const macd of MACD_CONDITIONS) {
            const action = trendMathService.getAction(labelled(rsi, macd), trend);
            const mirrored = trendMathService.getAction(
              labelled(MIRROR_RSI[rsi], MIRROR_MACD[macd]),
              MIRROR_TREND[trend]
            );
            expect(mirrored).toBe(MIRROR_ACTION[action]);
          }
        }
      }
    });

    test("confidence stays within 0..100 and sentiment within 0..1", () => {
      for (const trend of TRENDS) {
        for (const rsi of RSI_CONDITIONS) {
          for (const macd of MACD_CONDITIONS) {
            for (const crossover of CROSSOVERS) {
              for (const obv of OBV_TRENDS) {
                for (const strength of [0, 3, 6]) {
                  const value = labelled(rsi, macd, crossover, obv, strength);
                  const confidence = trendMathService.getConfidence(value);
                  const sentiment = trendMathService.getSentiment(value, trend);
                  expect(confidence).toBeGreaterThanOrEqual(0);
                  expect(confidence).toBeLessThanOrEqual(100);
                  expect(sentiment).toBeGreaterThanOrEqual(0);
                  expect(sentiment).toBeLessThanOrEqual(1);
                }
              }
            }
          }
        }
      }
    });
  });
});
