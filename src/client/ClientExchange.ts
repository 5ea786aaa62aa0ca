import { errorData, getErrorMessage, sleep } from "functools-kit";
import {
  CandleInterval,
  ICandleData,
  IExchange,
  IExchangeParams,
  ITicker,
} from "../interfaces/Exchange.interface";
import { GLOBAL_CONFIG } from "../config/params";
import { isUnsafe } from "../utils/isUnsafe";

/**
 * Rejects candles that cannot be analysed: non-finite numbers, zero or
 * negative prices, negative volume, or timestamps out of order.
 *
 * @throws Error describing the first offending candle
 */
export const VALIDATE_CANDLES_FN = (candles: ICandleData[]): void => {
  for (let i = 0; i < candles.length; i++) {
    const candle = candles[i];

    if (
      !Number.isFinite(candle.open) ||
      !Number.isFinite(candle.high) ||
      !Number.isFinite(candle.low) ||
      !Number.isFinite(candle.close) ||
      !Number.isFinite(candle.volume) ||
      !Number.isFinite(candle.timestamp)
    ) {
      throw new Error(
        `VALIDATE_CANDLES_FN: candle[${i}] has invalid numeric values (NaN or Infinity)`
      );
    }

    if (
      candle.open <= 0 ||
      candle.high <= 0 ||
      candle.low <= 0 ||
      candle.close <= 0 ||
      candle.volume < 0
    ) {
      throw new Error(
        `VALIDATE_CANDLES_FN: candle[${i}] has zero or negative values`
      );
    }

    if (i > 0 && candle.timestamp <= candles[i - 1].timestamp) {
      throw new Error(
        `VALIDATE_CANDLES_FN: candle[${i}] timestamp ${candle.timestamp} is not after ${candles[i - 1].timestamp}`
      );
    }
  }
};

/**
 * Retries the getCandles function with specified retry count and delay.
 */
const GET_CANDLES_FN = async (
  dto: {
    symbol: string;
    interval: CandleInterval;
    limit: number;
  },
  self: ClientExchange
) => {
  let lastError: unknown = new Error(
    `ClientExchange GET_CANDLES_FN: no attempt made for exchangeName=${self.params.exchangeName}`
  );
  for (let i = 0; i < GLOBAL_CONFIG.CC_GET_CANDLES_RETRY_COUNT; i++) {
    try {
      const result = await self.params.getCandles(
        dto.symbol,
        dto.interval,
        dto.limit
      );
      VALIDATE_CANDLES_FN(result);
      return result;
    } catch (error) {
      const message = `ClientExchange GET_CANDLES_FN: attempt ${i + 1} failed for exchangeName=${self.params.exchangeName}, symbol=${dto.symbol}, interval=${dto.interval}, limit=${dto.limit}`;
      self.params.logger.warn(message, {
        error: errorData(error),
        message: getErrorMessage(error),
      });
      lastError = error;
      if (i + 1 < GLOBAL_CONFIG.CC_GET_CANDLES_RETRY_COUNT) {
        await sleep(GLOBAL_CONFIG.CC_GET_CANDLES_RETRY_DELAY_MS);
      }
    }
  }
  throw lastError;
};

/**
 * Client implementation for exchange data access.
 *
 * @example
 * ```typescript
 * const exchange = new ClientExchange({
 *   exchangeName: "kucoin",
 *   getCandles: async (symbol, interval, limit) => [...],
 *   logger: loggerService,
 * });
 *
 * const candles = await exchange.getCandles("ETH/USDT", "1h", 200);
 * ```
 */
export class ClientExchange implements IExchange {
  constructor(readonly params: IExchangeParams) {}

  public async getCandles(
    symbol: string,
    interval: CandleInterval,
    limit: number
  ): Promise<ICandleData[]> {
    this.params.logger.debug(`ClientExchange getCandles`, {
      exchangeName: this.params.exchangeName,
      symbol,
      interval,
      limit,
    });
    const data = await GET_CANDLES_FN({ symbol, interval, limit }, this);
    if (this.params.callbacks?.onCandleData) {
      this.params.callbacks.onCandleData(symbol, interval, limit, data);
    }
    return data;
  }

  /**
   * Resolves `null` when the exchange has no ticker or the request fails.
   */
  public async getTicker(symbol: string): Promise<ITicker | null> {
    this.params.logger.debug(`ClientExchange getTicker`, {
      exchangeName: this.params.exchangeName,
      symbol,
    });
    if (!this.params.getTicker) {
      return null;
    }
    try {
      const ticker = await this.params.getTicker(symbol);
      if (isUnsafe(ticker.price)) {
        this.params.logger.warn(`ClientExchange getTicker unusable price`, {
          exchangeName: this.params.exchangeName,
          symbol,
        });
        return null;
      }
      return {
        ...ticker,
        source: this.params.exchangeName,
      };
    } catch (error) {
      this.params.logger.warn(`ClientExchange getTicker failed`, {
        exchangeName: this.params.exchangeName,
        symbol,
        error: errorData(error),
      });
      return null;
    }
  }
}

export default ClientExchange;
