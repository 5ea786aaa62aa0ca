import market from "../../../index";
import { setConfig } from "../../../../function/setup";
import EmptyInputError from "../../../../errors/EmptyInputError";
import {
  buildCandles,
  buildCloses,
  flatCandles,
  uptrendCandles,
  UPTREND_STEPS,
} from "../../../../__tests__/fixtures";

const { indicatorMathService } = market;

beforeAll(() => {
  setConfig({ CC_INDICATOR_BACKEND: "formula" });
});

describe("IndicatorMathService", () => {
  test("computes every indicator of a long series", () => {
    const values = indicatorMathService.getIndicators(uptrendCandles());
    expect(values.currentPrice).toBe(128);
    expect(values.rsi?.value).toBeCloseTo(63.1579, 3);
    expect(values.rsi?.previous).toBeCloseTo(63.1579, 3);
    expect(values.macd?.macd).toBeCloseTo(2.37902, 4);
    expect(values.macd?.signal).toBeCloseTo(2.33538, 4);
    expect(values.macd?.histogram).toBeCloseTo(0.04364, 4);
    expect(values.macd?.previousHistogram).toBeCloseTo(-0.03535, 4);
    expect(values.bollinger?.middle).toBeCloseTo(123.85);
    expect(values.bollinger?.upper).toBeCloseTo(128.16765, 4);
    expect(values.bollinger?.lower).toBeCloseTo(119.53235, 4);
    expect(values.bollinger?.widths).toHaveLength(61);
    expect(values.bollinger?.widths[60]).toBeCloseTo(8.6353, 3);
    expect(values.obv).toEqual({ value: 200, previous: 80 });
    expect(values.sma20).toBeCloseTo(123.85);
    expect(values.sma50).toBeCloseTo(118.84);
    expect(values.levels.strength).toBe(0);
    expect(values.levels.support[0]).toBeCloseTo(125.44);
    expect(values.levels.resistance[0]).toBeCloseTo(130.56);
  });

  test("a short series leaves the long indicators empty", () => {
    const values = indicatorMathService.getIndicators(
      buildCandles(buildCloses(UPTREND_STEPS, 10))
    );
    expect(values.rsi).toBeNull();
    expect(values.macd).toBeNull();
    expect(values.bollinger).toBeNull();
    expect(values.sma20).toBeNull();
    expect(values.sma50).toBeNull();
    expect(values.obv).not.toBeNull();
  });

  test("a motionless series has no RSI but still has bands", () => {
    const values = indicatorMathService.getIndicators(flatCandles());
    expect(values.rsi).toBeNull();
    expect(values.macd).toEqual({
      macd: 0,
      signal: 0,
      histogram: 0,
      previousHistogram: 0,
    });
    expect(values.bollinger?.upper).toBe(100);
    expect(values.bollinger?.lower).toBe(100);
    expect(values.levels).toEqual({
      support: [99.5],
      resistance: [100.5],
      strength: 2,
    });
  });

  test("throws on an empty series", () => {
    expect(() => indicatorMathService.getIndicators([])).toThrow(EmptyInputError);
  });

  test("single readings reject series that have not warmed up", () => {
    expect(() => indicatorMathService.getRsi([1, 2, 3])).toThrow(
      "RSI requires at least 15 candles, received 3"
    );
    expect(() => indicatorMathService.getRsi(new Array<number>(20).fill(5))).toThrow(
      "RSI produced a non-finite value: NaN"
    );
  });
});
