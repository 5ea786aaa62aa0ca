import ccxt, { Exchange } from "ccxt";
import { singleshot } from "functools-kit";
import { addExchange } from "../function/add";
import {
  CandleInterval,
  ICandleData,
} from "../interfaces/Exchange.interface";

/**
 * Fallback order of the public exchanges.
 */
const EXCHANGE_FACTORY_LIST: Array<[string, () => Exchange]> = [
  ["kucoin", () => new ccxt.kucoin({ enableRateLimit: true })],
  ["okx", () => new ccxt.okx({ enableRateLimit: true })],
  ["gateio", () => new ccxt.gateio({ enableRateLimit: true })],
];

const CREATE_GET_CANDLES_FN =
  (getClient: () => Exchange) =>
  async (
    symbol: string,
    interval: CandleInterval,
    limit: number
  ): Promise<ICandleData[]> => {
    const ohlcv = await getClient().fetchOHLCV(
      symbol,
      interval,
      undefined,
      limit
    );
    return ohlcv.map(([timestamp, open, high, low, close, volume]) => ({
      timestamp: Number(timestamp),
      open: Number(open),
      high: Number(high),
      low: Number(low),
      close: Number(close),
      volume: Number(volume),
    }));
  };

const CREATE_GET_TICKER_FN =
  (getClient: () => Exchange) => async (symbol: string) => {
    const ticker = await getClient().fetchTicker(symbol);
    return {
      price: Number(ticker.last),
      change24h: Number(ticker.percentage),
      volume24h: Number(ticker.quoteVolume),
      high24h: Number(ticker.high),
      low24h: Number(ticker.low),
    };
  };

/**
 * Registers kucoin, okx and gateio as market data sources, in that order.
 */
export const addCcxtExchanges = () => {
  for (const [exchangeName, factory] of EXCHANGE_FACTORY_LIST) {
    const getClient = singleshot(factory);
    addExchange({
      exchangeName,
      note: "ccxt public market data",
      getCandles: CREATE_GET_CANDLES_FN(getClient),
      getTicker: CREATE_GET_TICKER_FN(getClient),
    });
  }
};

export default addCcxtExchanges;
