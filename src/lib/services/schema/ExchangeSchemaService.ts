import { ToolRegistry } from "functools-kit";
import {
  ExchangeName,
  IExchangeSchema,
} from "../../../interfaces/Exchange.interface";
import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";

/**
 * Registry of exchange schemas in registration order.
 *
 * The order defines the fallback chain used by MarketDataGlobalService.
 */
export class ExchangeSchemaService {
  readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  private _registry = new ToolRegistry<Record<ExchangeName, IExchangeSchema>>(
    "exchangeSchema"
  );

  private _exchangeNames: ExchangeName[] = [];

  /**
   * @throws Error if exchange name already exists
   */
  public register = (key: ExchangeName, value: IExchangeSchema) => {
    this.loggerService.info(`exchangeSchemaService register`, { key });
    this.validateShallow(value);
    this._registry = this._registry.register(key, value);
    this._exchangeNames.push(key);
  };

  private validateShallow = (exchangeSchema: IExchangeSchema) => {
    this.loggerService.info(`exchangeSchemaService validateShallow`, {
      exchangeSchema,
    });

    if (typeof exchangeSchema.exchangeName !== "string") {
      throw new Error(`exchange schema validation failed: missing exchangeName`);
    }

    if (typeof exchangeSchema.getCandles !== "function") {
      throw new Error(
        `exchange schema validation failed: missing getCandles for exchangeName=${exchangeSchema.exchangeName}`
      );
    }

    if (
      exchangeSchema.getTicker !== undefined &&
      typeof exchangeSchema.getTicker !== "function"
    ) {
      throw new Error(
        `exchange schema validation failed: getTicker is not a function for exchangeName=${exchangeSchema.exchangeName}`
      );
    }
  };

  public get = (key: ExchangeName): IExchangeSchema => {
    this.loggerService.info(`exchangeSchemaService get`, { key });
    return this._registry.get(key);
  };

  public list = (): IExchangeSchema[] => {
    this.loggerService.log(`exchangeSchemaService list`);
    return this._exchangeNames.map((key) => this._registry.get(key));
  };
}

export default ExchangeSchemaService;
