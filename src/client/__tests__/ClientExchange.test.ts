import ClientExchange, { VALIDATE_CANDLES_FN } from "../ClientExchange";
import { ILogger } from "../../interfaces/Logger.interface";
import { ICandleData } from "../../interfaces/Exchange.interface";
import { setConfig } from "../../function/setup";
import { buildCandles } from "../../__tests__/fixtures";

const logger: ILogger = {
  log: jest.fn(),
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
};

const candles = buildCandles([100, 101, 102]);

beforeAll(() => {
  setConfig({ CC_GET_CANDLES_RETRY_DELAY_MS: 0, CC_GET_CANDLES_RETRY_COUNT: 3 });
});

describe("VALIDATE_CANDLES_FN", () => {
  test("accepts ordered positive candles", () => {
    expect(() => VALIDATE_CANDLES_FN(candles)).not.toThrow();
  });

  test("rejects non-finite values", () => {
    const broken: ICandleData[] = [{ ...candles[0], close: NaN }];
    expect(() => VALIDATE_CANDLES_FN(broken)).toThrow(
      "candle[0] has invalid numeric values"
    );
  });

  test("rejects non-positive prices", () => {
    const broken: ICandleData[] = [{ ...candles[0], low: 0 }];
    expect(() => VALIDATE_CANDLES_FN(broken)).toThrow(
      "candle[0] has zero or negative values"
    );
  });

  test("rejects timestamps out of order", () => {
    const broken: ICandleData[] = [candles[1], candles[0]];
    expect(() => VALIDATE_CANDLES_FN(broken)).toThrow(
      "candle[1] timestamp"
    );
  });
});

describe("ClientExchange", () => {
  test("retries until the source answers", async () => {
    const getCandles = jest
      .fn()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValueOnce(candles);
    const onCandleData = jest.fn();
    const exchange = new ClientExchange({
      exchangeName: "flaky",
      getCandles,
      callbacks: { onCandleData },
      logger,
    });
    await expect(exchange.getCandles("ETH/USDT", "15m", 3)).resolves.toEqual(
      candles
    );
    expect(getCandles).toHaveBeenCalledTimes(2);
    expect(onCandleData).toHaveBeenCalledWith("ETH/USDT", "15m", 3, candles);
  });

  test("gives up after the configured attempts with the last error", async () => {
    const getCandles = jest
      .fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockRejectedValueOnce(new Error("third"));
    const exchange = new ClientExchange({
      exchangeName: "down",
      getCandles,
      logger,
    });
    await expect(exchange.getCandles("ETH/USDT", "1h", 3)).rejects.toThrow(
      "third"
    );
    expect(getCandles).toHaveBeenCalledTimes(3);
  });

  test("treats invalid candles as a failed attempt", async () => {
    const getCandles = jest
      .fn()
      .mockResolvedValueOnce([{ ...candles[0], volume: -1 }])
      .mockResolvedValueOnce(candles);
    const exchange = new ClientExchange({
      exchangeName: "noisy",
      getCandles,
      logger,
    });
    await expect(exchange.getCandles("ETH/USDT", "1h", 3)).resolves.toEqual(
      candles
    );
    expect(getCandles).toHaveBeenCalledTimes(2);
  });

  test("ticker is tagged with the exchange name", async () => {
    const exchange = new ClientExchange({
      exchangeName: "primary",
      getCandles: async () => candles,
      getTicker: async () => ({
        price: 2000,
        change24h: 3.5,
        volume24h: 1000,
        high24h: 2100,
        low24h: 1900,
      }),
      logger,
    });
    await expect(exchange.getTicker("ETH/USDT")).resolves.toEqual({
      price: 2000,
      change24h: 3.5,
      volume24h: 1000,
      high24h: 2100,
      low24h: 1900,
      source: "primary",
    });
  });

  test("ticker is null when missing, failing or unpriced", async () => {
    const base = {
      getCandles: async () => candles,
      logger,
    };
    const missing = new ClientExchange({ ...base, exchangeName: "a" });
    const failing = new ClientExchange({
      ...base,
      exchangeName: "b",
      getTicker: async () => {
        throw new Error("rate limited");
      },
    });
    const unpriced = new ClientExchange({
      ...base,
      exchangeName: "c",
      getTicker: async () => ({
        price: NaN,
        change24h: 0,
        volume24h: 0,
        high24h: 0,
        low24h: 0,
      }),
    });
    await expect(missing.getTicker("ETH/USDT")).resolves.toBeNull();
    await expect(failing.getTicker("ETH/USDT")).resolves.toBeNull();
    await expect(unpriced.getTicker("ETH/USDT")).resolves.toBeNull();
  });
});
