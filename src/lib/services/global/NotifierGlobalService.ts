import { errorData, getErrorMessage } from "functools-kit";
import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import NotifierSchemaService from "../schema/NotifierSchemaService";

/**
 * Delivers a rendered report to every registered notifier.
 */
export class NotifierGlobalService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);
  private readonly notifierSchemaService = inject<NotifierSchemaService>(
    TYPES.notifierSchemaService
  );

  /**
   * Resolves the names of notifiers that accepted the report. A failing
   * notifier is logged and does not stop the others.
   */
  public broadcast = async (report: string, symbol: string) => {
    this.loggerService.log("notifierGlobalService broadcast", {
      symbol,
      length: report.length,
    });
    const delivered: string[] = [];
    for (const { notifierName, send } of this.notifierSchemaService.list()) {
      try {
        if (await send(report, symbol)) {
          delivered.push(notifierName);
        }
      } catch (error) {
        this.loggerService.warn("notifierGlobalService broadcast failed", {
          notifierName,
          symbol,
          error: errorData(error),
          message: getErrorMessage(error),
        });
      }
    }
    return delivered;
  };
}

export default NotifierGlobalService;
