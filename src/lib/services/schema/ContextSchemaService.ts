import { ToolRegistry } from "functools-kit";
import {
  ContextName,
  IContextSchema,
} from "../../../interfaces/Context.interface";
import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";

/**
 * Registry of market context sources in registration order.
 */
export class ContextSchemaService {
  readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  private _registry = new ToolRegistry<Record<ContextName, IContextSchema>>(
    "contextSchema"
  );

  private _contextNames: ContextName[] = [];

  public register = (key: ContextName, value: IContextSchema) => {
    this.loggerService.info(`contextSchemaService register`, { key });
    if (typeof value.getMarketContext !== "function") {
      throw new Error(
        `context schema validation failed: missing getMarketContext for contextName=${value.contextName}`
      );
    }
    this._registry = this._registry.register(key, value);
    this._contextNames.push(key);
  };

  public get = (key: ContextName): IContextSchema => {
    this.loggerService.info(`contextSchemaService get`, { key });
    return this._registry.get(key);
  };

  public list = (): IContextSchema[] => {
    this.loggerService.log(`contextSchemaService list`);
    return this._contextNames.map((key) => this._registry.get(key));
  };
}

export default ContextSchemaService;
