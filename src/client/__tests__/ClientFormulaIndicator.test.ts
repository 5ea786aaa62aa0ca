import ClientFormulaIndicator from "../ClientFormulaIndicator";
import { ILogger } from "../../interfaces/Logger.interface";

const logger: ILogger = {
  log: jest.fn(),
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
};

const indicator = new ClientFormulaIndicator({ logger });

describe("ClientFormulaIndicator", () => {
  test("sma is null until the window is full", () => {
    expect(indicator.sma([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
  });

  test("rsi uses rolling means of gains and losses", () => {
    const rsi = indicator.rsi([1, 2, 1, 3], 2);
    expect(rsi[0]).toBeNull();
    expect(rsi[1]).toBeNull();
    expect(rsi[2]).toBe(50);
    expect(rsi[3]).toBeCloseTo(66.6667, 3);
  });

  test("rsi stays within 0..100 on mixed moves", () => {
    const closes = [
      100, 103, 99, 104, 104, 98, 101, 107, 102, 102, 96, 105, 110, 103, 99,
      101, 108, 100, 97, 102, 106, 95, 99, 104,
    ];
    const rsi = indicator.rsi(closes, 5).filter(
      (value): value is number => value !== null
    );
    expect(rsi).toHaveLength(closes.length - 5);
    for (const value of rsi) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
    }
  });

  test("rsi is 100 without losses and NaN without any movement", () => {
    expect(indicator.rsi([1, 2, 3, 4], 2)[3]).toBe(100);
    expect(indicator.rsi([5, 5, 5, 5], 2)[3]).toBeNaN();
  });

  test("macd signal starts once the macd line has warmed up", () => {
    const { macd, signal, histogram } = indicator.macd([1, 2, 3, 4, 5], 2, 3, 2);
    expect(macd).toEqual([null, null, 0.5, 0.5, 0.5]);
    expect(signal).toEqual([null, null, null, 0.5, 0.5]);
    expect(histogram).toEqual([null, null, null, 0, 0]);
  });

  test("bollinger bands use the sample standard deviation", () => {
    const { upper, middle, lower } = indicator.bollinger([1, 2, 3], 3, 2);
    expect(middle[2]).toBe(2);
    expect(upper[2]).toBe(4);
    expect(lower[2]).toBe(0);
    expect(upper[1]).toBeNull();
  });

  test("reports its backend name", () => {
    expect(indicator.backendName).toBe("formula");
  });
});
