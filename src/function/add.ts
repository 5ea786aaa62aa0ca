import market from "../lib";
import { IExchangeSchema } from "../interfaces/Exchange.interface";
import { IContextSchema } from "../interfaces/Context.interface";
import { INotifierSchema } from "../interfaces/Notifier.interface";

const ADD_EXCHANGE_METHOD_NAME = "add.addExchange";
const ADD_CONTEXT_METHOD_NAME = "add.addContext";
const ADD_NOTIFIER_METHOD_NAME = "add.addNotifier";

/**
 * Registers a market data source.
 *
 * Sources are tried in registration order until one serves every timeframe.
 *
 * @example
 * ```typescript
 * addExchange({
 *   exchangeName: "kucoin",
 *   getCandles: async (symbol, interval, limit) => {
 *     const ohlcv = await kucoinClient.fetchOHLCV(symbol, interval, undefined, limit);
 *     return ohlcv.map(([timestamp, open, high, low, close, volume]) => ({
 *       timestamp, open, high, low, close, volume,
 *     }));
 *   },
 * });
 * ```
 */
export function addExchange(exchangeSchema: IExchangeSchema) {
  market.loggerService.info(ADD_EXCHANGE_METHOD_NAME, {
    exchangeName: exchangeSchema.exchangeName,
  });
  market.exchangeSchemaService.register(
    exchangeSchema.exchangeName,
    exchangeSchema
  );
}

/**
 * Registers a source of 24h change and volume for the market context.
 */
export function addContext(contextSchema: IContextSchema) {
  market.loggerService.info(ADD_CONTEXT_METHOD_NAME, {
    contextName: contextSchema.contextName,
  });
  market.contextSchemaService.register(contextSchema.contextName, contextSchema);
}

/**
 * Registers a destination for rendered reports.
 *
 * @example
 * ```typescript
 * addNotifier({
 *   notifierName: "console",
 *   send: async (report) => {
 *     console.log(report);
 *     return true;
 *   },
 * });
 * ```
 */
export function addNotifier(notifierSchema: INotifierSchema) {
  market.loggerService.info(ADD_NOTIFIER_METHOD_NAME, {
    notifierName: notifierSchema.notifierName,
  });
  market.notifierSchemaService.register(
    notifierSchema.notifierName,
    notifierSchema
  );
}
