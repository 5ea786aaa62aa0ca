import { memoize } from "functools-kit";
import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import {
  CandleInterval,
  ExchangeName,
} from "../../../interfaces/Exchange.interface";
import ClientExchange from "../../../client/ClientExchange";
import ExchangeSchemaService from "../schema/ExchangeSchemaService";

/**
 * Creates one ClientExchange per registered exchange and routes calls to it.
 */
export class ExchangeConnectionService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);
  private readonly exchangeSchemaService = inject<ExchangeSchemaService>(
    TYPES.exchangeSchemaService
  );

  public getExchange = memoize(
    ([exchangeName]) => `${exchangeName}`,
    (exchangeName: ExchangeName) => {
      const schema = this.exchangeSchemaService.get(exchangeName);
      return new ClientExchange({
        ...schema,
        logger: this.loggerService,
      });
    }
  );

  public getCandles = async (
    exchangeName: ExchangeName,
    symbol: string,
    interval: CandleInterval,
    limit: number
  ) => {
    this.loggerService.log("exchangeConnectionService getCandles", {
      exchangeName,
      symbol,
      interval,
      limit,
    });
    return await this.getExchange(exchangeName).getCandles(
      symbol,
      interval,
      limit
    );
  };

  public getTicker = async (exchangeName: ExchangeName, symbol: string) => {
    this.loggerService.log("exchangeConnectionService getTicker", {
      exchangeName,
      symbol,
    });
    return await this.getExchange(exchangeName).getTicker(symbol);
  };
}

export default ExchangeConnectionService;
