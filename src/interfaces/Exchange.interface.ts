import { ILogger } from "./Logger.interface";

/**
 * Candle timeframe understood by the exchange adapters and the analysis orchestrator.
 */
export type CandleInterval =
  | "1m"
  | "5m"
  | "15m"
  | "30m"
  | "1h"
  | "4h"
  | "1d";

/**
 * Single OHLCV candle. Timestamps are epoch milliseconds of the candle open.
 */
export interface ICandleData {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * 24h ticker snapshot used for the report header and the market context.
 */
export interface ITicker {
  /** Last traded price */
  price: number;
  /** 24h change in percent */
  change24h: number;
  /** 24h quote volume */
  volume24h: number;
  high24h: number;
  low24h: number;
  /** Name of the exchange that served the ticker */
  source: ExchangeName;
}

/**
 * Callbacks fired by an exchange client after a successful request.
 */
export interface IExchangeCallbacks {
  onCandleData: (
    symbol: string,
    interval: CandleInterval,
    limit: number,
    data: ICandleData[]
  ) => void;
}

/**
 * Market data source registered via addExchange().
 *
 * Registration order is the fallback order: the first exchange able to
 * serve every requested timeframe wins.
 */
export interface IExchangeSchema {
  exchangeName: ExchangeName;
  /** Optional developer note for documentation */
  note?: string;
  /** Fetch the most recent `limit` candles, oldest first */
  getCandles: (
    symbol: string,
    interval: CandleInterval,
    limit: number
  ) => Promise<ICandleData[]>;
  /** Fetch the 24h ticker. Exchanges without one are skipped for tickers */
  getTicker?: (symbol: string) => Promise<Omit<ITicker, "source">>;
  callbacks?: Partial<IExchangeCallbacks>;
}

/**
 * Constructor parameters of an exchange client.
 */
export interface IExchangeParams extends IExchangeSchema {
  logger: ILogger;
}

/**
 * Client wrapping one registered exchange with retries and validation.
 */
export interface IExchange {
  getCandles: (
    symbol: string,
    interval: CandleInterval,
    limit: number
  ) => Promise<ICandleData[]>;
  getTicker: (symbol: string) => Promise<ITicker | null>;
}

/**
 * Candle series of one symbol fetched from a single exchange.
 */
export interface IMarketData {
  exchangeName: ExchangeName;
  symbol: string;
  series: Partial<Record<CandleInterval, ICandleData[]>>;
}

export type ExchangeName = string;
