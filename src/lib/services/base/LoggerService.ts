import { inject } from "../../core/di";
import { ILogger } from "../../../interfaces/Logger.interface";
import TYPES from "../../core/types";
import ExecutionContextService, {
  TExecutionContextService,
} from "../context/ExecutionContextService";

const NOOP_LOGGER: ILogger = {
  log() {
    void 0;
  },
  debug() {
    void 0;
  },
  info() {
    void 0;
  },
  warn() {
    void 0;
  },
};

/**
 * Logger service with automatic context injection.
 *
 * Delegates to the logger installed by setLogger(), appending the execution
 * context (symbol, timeframe, when) when called inside runInContext.
 */
export class LoggerService implements ILogger {
  private readonly executionContextService = inject<TExecutionContextService>(
    TYPES.executionContextService
  );

  private _commonLogger: ILogger = NOOP_LOGGER;

  private get executionContext() {
    if (ExecutionContextService.hasContext()) {
      return this.executionContextService.context;
    }
    return {};
  }

  public log = (topic: string, ...args: unknown[]) => {
    this._commonLogger.log(topic, ...args, this.executionContext);
  };

  public debug = (topic: string, ...args: unknown[]) => {
    this._commonLogger.debug(topic, ...args, this.executionContext);
  };

  public info = (topic: string, ...args: unknown[]) => {
    this._commonLogger.info(topic, ...args, this.executionContext);
  };

  public warn = (topic: string, ...args: unknown[]) => {
    this._commonLogger.warn(topic, ...args, this.executionContext);
  };

  /**
   * Sets custom logger implementation.
   */
  public setLogger = (logger: ILogger) => {
    this._commonLogger = logger;
  };
}

export default LoggerService;
