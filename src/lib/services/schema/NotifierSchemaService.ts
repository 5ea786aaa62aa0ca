import { ToolRegistry } from "functools-kit";
import {
  INotifierSchema,
  NotifierName,
} from "../../../interfaces/Notifier.interface";
import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";

/**
 * Registry of report destinations.
 */
export class NotifierSchemaService {
  readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  private _registry = new ToolRegistry<Record<NotifierName, INotifierSchema>>(
    "notifierSchema"
  );

  private _notifierNames: NotifierName[] = [];

  public register = (key: NotifierName, value: INotifierSchema) => {
    this.loggerService.info(`notifierSchemaService register`, { key });
    if (typeof value.send !== "function") {
      throw new Error(
        `notifier schema validation failed: missing send for notifierName=${value.notifierName}`
      );
    }
    this._registry = this._registry.register(key, value);
    this._notifierNames.push(key);
  };

  public list = (): INotifierSchema[] => {
    this.loggerService.log(`notifierSchemaService list`);
    return this._notifierNames.map((key) => this._registry.get(key));
  };
}

export default NotifierSchemaService;
