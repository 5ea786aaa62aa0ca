import computeObv from "../computeObv";
import findKeyLevels from "../findKeyLevels";
import computeVolumeProfile from "../computeVolumeProfile";
import splitReport from "../splitReport";
import normalizeSymbol from "../normalizeSymbol";
import { isUnsafe, toSafe } from "../isUnsafe";
import { ICandleData } from "../../interfaces/Exchange.interface";

const candle = (
  close: number,
  volume: number,
  high = close,
  low = close
): ICandleData => ({
  timestamp: 0,
  open: close,
  high,
  low,
  close,
  volume,
});

describe("computeObv", () => {
  test("adds on higher closes, subtracts on lower, keeps on equal", () => {
    const obv = computeObv([
      candle(10, 5),
      candle(11, 3),
      candle(11, 2),
      candle(9, 4),
    ]);
    expect(obv).toEqual([5, 8, 8, 4]);
  });

  test("empty input gives an empty series", () => {
    expect(computeObv([])).toEqual([]);
  });

  test("never falls on rising closes and never rises on falling ones", () => {
    const rising = Array.from({ length: 30 }, (_, idx) =>
      candle(100 + idx, 10 + (idx % 7))
    );
    const falling = [...rising].reverse();
    const up = computeObv(rising);
    const down = computeObv(falling);
    for (let idx = 1; idx < up.length; idx++) {
      expect(up[idx]).toBeGreaterThanOrEqual(up[idx - 1]);
      expect(down[idx]).toBeLessThanOrEqual(down[idx - 1]);
    }
  });
});

describe("findKeyLevels", () => {
  const highs = [10, 12, 15, 12, 10, 11, 13, 11, 9, 10, 11];
  const candles = highs.map((high) => candle(high - 2, 1, high, high - 4));

  test("returns pivot highs above and pivot lows below the price", () => {
    const levels = findKeyLevels(candles, 10, {
      window: 3,
      maxLevels: 3,
      minDistancePercent: 0.1,
      fallbackPercent: 2,
    });
    expect(levels).toEqual({
      support: [5, 6],
      resistance: [13, 15],
      strength: 4,
    });
  });

  test("keeps only the most recent levels", () => {
    const levels = findKeyLevels(candles, 10, {
      window: 3,
      maxLevels: 1,
      minDistancePercent: 0.1,
      fallbackPercent: 2,
    });
    expect(levels).toEqual({ support: [5], resistance: [13], strength: 2 });
  });

  test("falls back to synthetic levels when no pivot qualifies", () => {
    const rising = [1, 2, 3, 4, 5].map((close) => candle(close, 1));
    const levels = findKeyLevels(rising, 50, {
      window: 3,
      maxLevels: 3,
      minDistancePercent: 0.1,
      fallbackPercent: 2,
    });
    expect(levels.strength).toBe(0);
    expect(levels.support[0]).toBeCloseTo(49);
    expect(levels.resistance[0]).toBeCloseTo(51);
  });
});

describe("computeVolumeProfile", () => {
  test("puts the point of control in the busiest bin", () => {
    const profile = computeVolumeProfile(
      [candle(100, 10), candle(101, 50), candle(110, 5), candle(105, 20)],
      101,
      10,
      2
    );
    expect(profile).toEqual({
      poc: 101.5,
      totalVolume: 85,
      distribution: "balanced",
    });
  });

  test("reports a skewed distribution far from the price", () => {
    const profile = computeVolumeProfile(
      [candle(100, 10), candle(101, 50), candle(110, 5), candle(105, 20)],
      110,
      10,
      2
    );
    expect(profile?.distribution).toBe("skewed");
  });

  test("returns null without candles", () => {
    expect(computeVolumeProfile([], 100, 20, 2)).toBeNull();
  });
});

describe("splitReport", () => {
  test("splits on line boundaries", () => {
    expect(splitReport("aaa\nbbb\nccc", 7)).toEqual(["aaa\nbbb", "ccc"]);
  });

  test("cuts a line longer than the limit", () => {
    expect(splitReport("x\nabcdefghij", 4)).toEqual([
      "x",
      "abcd",
      "efgh",
      "ij",
    ]);
  });

  test("drops blank parts and trims", () => {
    expect(splitReport("\n\nhello\n", 100)).toEqual(["hello"]);
  });
});

describe("normalizeSymbol", () => {
  test("upper-cases and appends the USDT quote", () => {
    expect(normalizeSymbol(" eth ")).toBe("ETH/USDT");
    expect(normalizeSymbol("btc/eur")).toBe("BTC/EUR");
  });
});

describe("isUnsafe", () => {
  test("flags values unusable in arithmetic", () => {
    expect(isUnsafe(1.5)).toBe(false);
    expect(isUnsafe(NaN)).toBe(true);
    expect(isUnsafe(Infinity)).toBe(true);
    expect(isUnsafe(null)).toBe(true);
    expect(toSafe(undefined)).toBeNull();
    expect(toSafe(-Infinity)).toBeNull();
    expect(toSafe(3)).toBe(3);
  });
});
