import {
  getConfig,
  getDefaultConfig,
  setConfig,
  setLogger,
} from "../setup";
import { getTradeLevels } from "../analyze";

describe("setConfig", () => {
  test("applies a valid override", () => {
    setConfig({ CC_INTRADAY_STOP_PERCENT: 2 });
    expect(getConfig().CC_INTRADAY_STOP_PERCENT).toBe(2);
    expect(getTradeLevels(100, "BUY", "intraday").stopLoss).toBeCloseTo(98);
    setConfig({ CC_INTRADAY_STOP_PERCENT: 1.5 });
  });

  test("rolls back and lists every problem", () => {
    const before = getConfig();
    expect(() =>
      setConfig({
        CC_RSI_PERIOD: 0,
        CC_MACD_FAST_PERIOD: 30,
        CC_TIMEFRAMES: [],
      })
    ).toThrow(
      [
        "GLOBAL_CONFIG validation failed:",
        "  1. CC_RSI_PERIOD must be a positive integer, got 0",
        "  2. CC_MACD_FAST_PERIOD (30) must be less than CC_MACD_SLOW_PERIOD (26)",
        "  3. CC_TIMEFRAMES must list at least one timeframe",
      ].join("\n")
    );
    expect(getConfig()).toEqual(before);
  });

  test("unsafe mode skips validation", () => {
    setConfig({ CC_CANDLE_LIMIT: -1 }, true);
    expect(getConfig().CC_CANDLE_LIMIT).toBe(-1);
    setConfig({ CC_CANDLE_LIMIT: 200 });
  });

  test("defaults stay untouched", () => {
    expect(getDefaultConfig().CC_CANDLE_LIMIT).toBe(200);
    expect(Object.isFrozen(getDefaultConfig())).toBe(true);
  });
});

describe("setLogger", () => {
  test("receives service messages", () => {
    const info = jest.fn();
    setLogger({ log: jest.fn(), debug: jest.fn(), info, warn: jest.fn() });
    getTradeLevels(100, "SELL", "swing");
    expect(info).toHaveBeenCalledWith(
      "analyze.getTradeLevels",
      { price: 100, action: "SELL", horizon: "swing" },
      {}
    );
  });
});
