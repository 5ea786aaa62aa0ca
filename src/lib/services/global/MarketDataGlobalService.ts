import { errorData, getErrorMessage } from "functools-kit";
import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import ExchangeSchemaService from "../schema/ExchangeSchemaService";
import ExchangeConnectionService from "../connection/ExchangeConnectionService";
import {
  CandleInterval,
  IMarketData,
  ITicker,
} from "../../../interfaces/Exchange.interface";
import { GLOBAL_CONFIG } from "../../../config/params";

/**
 * Candle and ticker retrieval over the chain of registered exchanges.
 *
 * Exchanges are tried in registration order. An exchange is accepted only
 * when it serves every requested timeframe, so a report never mixes sources.
 */
export class MarketDataGlobalService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);
  private readonly exchangeSchemaService = inject<ExchangeSchemaService>(
    TYPES.exchangeSchemaService
  );
  private readonly exchangeConnectionService =
    inject<ExchangeConnectionService>(TYPES.exchangeConnectionService);

  /**
   * @throws Error when no exchange is registered or every exchange failed
   */
  public getMarketData = async (
    symbol: string,
    timeframes: CandleInterval[] = GLOBAL_CONFIG.CC_TIMEFRAMES,
    limit: number = GLOBAL_CONFIG.CC_CANDLE_LIMIT
  ): Promise<IMarketData> => {
    this.loggerService.log("marketDataGlobalService getMarketData", {
      symbol,
      timeframes,
      limit,
    });
    const exchanges = this.exchangeSchemaService.list();
    if (!exchanges.length) {
      throw new Error(
        `marketDataGlobalService getMarketData: no exchange registered for symbol=${symbol}`
      );
    }
    const failures: string[] = [];
    for (const { exchangeName } of exchanges) {
      try {
        const series: IMarketData["series"] = {};
        for (const timeframe of timeframes) {
          series[timeframe] = await this.exchangeConnectionService.getCandles(
            exchangeName,
            symbol,
            timeframe,
            limit
          );
        }
        this.loggerService.info("marketDataGlobalService getMarketData ok", {
          exchangeName,
          symbol,
        });
        return { exchangeName, symbol, series };
      } catch (error) {
        this.loggerService.warn(
          "marketDataGlobalService getMarketData exchange failed",
          {
            exchangeName,
            symbol,
            error: errorData(error),
          }
        );
        failures.push(`${exchangeName}: ${getErrorMessage(error)}`);
      }
    }
    throw new Error(
      `market data unavailable for symbol=${symbol} (${failures.join("; ")})`
    );
  };

  /**
   * First ticker served by the chain, or `null`.
   */
  public getTicker = async (symbol: string): Promise<ITicker | null> => {
    this.loggerService.log("marketDataGlobalService getTicker", { symbol });
    for (const { exchangeName } of this.exchangeSchemaService.list()) {
      const ticker = await this.exchangeConnectionService.getTicker(
        exchangeName,
        symbol
      );
      if (ticker) {
        return ticker;
      }
    }
    return null;
  };
}

export default MarketDataGlobalService;
