import {
  errorData,
  getErrorMessage,
  memoize,
  randomString,
  singlerun,
  Subject,
} from "functools-kit";
import market from "../lib";
import {
  analysisEmitter,
  doneSubject,
  errorEmitter,
  exitEmitter,
  reportEmitter,
} from "../config/emitters";
import { GLOBAL_CONFIG } from "../config/params";
import { IMarketAnalysis } from "../interfaces/Analysis.interface";
import { ReportContract } from "../contract/Report.contract";
import normalizeSymbol from "../utils/normalizeSymbol";

const MONITOR_METHOD_NAME_RUN = "MonitorUtils.run";
const MONITOR_METHOD_NAME_BACKGROUND = "MonitorUtils.background";
const MONITOR_METHOD_NAME_TASK = "MonitorInstance.task";
const MONITOR_METHOD_NAME_GET_STATUS = "MonitorUtils.getStatus";
const MONITOR_METHOD_NAME_LIST = "MonitorUtils.list";

const MS_PER_MINUTE = 60_000;

/**
 * Outcome of one analysis cycle.
 */
export interface IMonitorResult {
  analysis: IMarketAnalysis;
  report: string;
  /** Names of the notifiers that accepted the report */
  delivered: string[];
}

/**
 * Resolves after `ms` or on the first stop signal, whichever comes first.
 * The timer is cleared either way.
 *
 * @internal
 */
const WAIT_FN = (ms: number, stopSubject: Subject<void>) =>
  new Promise<void>((resolve) => {
    let unsubscribe = () => {};
    const timeout = setTimeout(() => {
      unsubscribe();
      resolve();
    }, ms);
    unsubscribe = stopSubject.once(() => {
      clearTimeout(timeout);
      resolve();
    });
  });

/**
 * Fetch, analyse, render and broadcast once.
 *
 * @internal
 */
const RUN_CYCLE_FN = async (
  symbol: string,
  type: ReportContract["type"]
): Promise<IMonitorResult> => {
  const data = await market.marketDataGlobalService.getMarketData(symbol);
  const ticker = await market.marketDataGlobalService.getTicker(symbol);
  const context = await market.marketContextGlobalService.getMarketContext(
    symbol,
    ticker
  );
  const analysis = await market.marketLogicService.analyzeMarket({
    symbol,
    series: data.series,
    context,
  });
  const report = await market.reportMarkdownService.getReport(analysis, ticker);
  await analysisEmitter.next(analysis);
  await reportEmitter.next({ symbol, type, report, analysis });
  const delivered = await market.notifierGlobalService.broadcast(report, symbol);
  return { analysis, report, delivered };
};

/**
 * Scheduled loop body. Waits the analysis interval after a successful
 * cycle and the error retry delay after a failed one.
 *
 * @internal
 */
const INSTANCE_TASK_FN = async (self: MonitorInstance) => {
  self._isStopped = false;
  self._cycles = 0;
  while (!self._isStopped) {
    let delayMinutes = GLOBAL_CONFIG.CC_ANALYSIS_INTERVAL_MINUTES;
    try {
      await self.run("scheduled");
      self._cycles += 1;
    } catch (error) {
      market.loggerService.warn("MonitorInstance cycle failed", {
        symbol: self.symbol,
        error: errorData(error),
      });
      self._lastError = getErrorMessage(error);
      delayMinutes = GLOBAL_CONFIG.CC_ERROR_RETRY_MINUTES;
      await errorEmitter.next(new Error(self._lastError));
    }
    if (self._isStopped) {
      break;
    }
    self._nextAnalysisAt = Date.now() + delayMinutes * MS_PER_MINUTE;
    await WAIT_FN(delayMinutes * MS_PER_MINUTE, self._stopSubject);
  }
  self._nextAnalysisAt = null;
  await doneSubject.next({ symbol: self.symbol, cycles: self._cycles });
};

/**
 * Periodic analysis of a single symbol.
 *
 * @example
 * ```typescript
 * const instance = new MonitorInstance("ETH/USDT");
 * const { report } = await instance.run("manual_request");
 * ```
 */
export class MonitorInstance {
  readonly id = randomString();

  _isStopped = false;

  _cycles = 0;

  _lastAnalysis: IMarketAnalysis | null = null;

  _lastError: string | null = null;

  /** Epoch milliseconds of the next scheduled cycle */
  _nextAnalysisAt: number | null = null;

  readonly _stopSubject = new Subject<void>();

  constructor(readonly symbol: string) {}

  private task = singlerun(async () => {
    market.loggerService.info(MONITOR_METHOD_NAME_TASK, {
      symbol: this.symbol,
    });
    return await INSTANCE_TASK_FN(this);
  });

  /**
   * Runs one cycle. Errors propagate to the caller.
   */
  public run = async (
    type: ReportContract["type"] = "manual_request"
  ): Promise<IMonitorResult> => {
    const result = await RUN_CYCLE_FN(this.symbol, type);
    this._lastAnalysis = result.analysis;
    this._lastError = null;
    return result;
  };

  /**
   * Starts the scheduled loop.
   *
   * @returns Closure that stops the loop, interrupting the wait between cycles
   * @throws Error when the loop is already running
   */
  public background = () => {
    if (this.task.getStatus() === "pending") {
      throw new Error(
        `Monitor.background is already running for symbol=${this.symbol}`
      );
    }
    this.task().catch((error) =>
      exitEmitter.next(new Error(getErrorMessage(error)))
    );
    return () => {
      this._isStopped = true;
      void this._stopSubject.next();
    };
  };

  public getStatus = () => {
    const nextAnalysisInMinutes =
      this._nextAnalysisAt === null
        ? null
        : Math.max(
            0,
            Math.ceil((this._nextAnalysisAt - Date.now()) / MS_PER_MINUTE)
          );
    return {
      id: this.id,
      symbol: this.symbol,
      running: this.task.getStatus() === "pending",
      cycles: this._cycles,
      lastAnalysis: this._lastAnalysis ? this._lastAnalysis.when : null,
      lastError: this._lastError,
      nextAnalysisInMinutes,
    };
  };
}

/**
 * Per-symbol monitor registry. Exported as a singleton.
 *
 * @example
 * ```typescript
 * import { Monitor } from "./classes/Monitor";
 *
 * const stop = Monitor.background("ETH/USDT");
 * listenReport(({ report }) => console.log(report));
 * ```
 */
export class MonitorUtils {
  private _getInstance = memoize<(symbol: string) => MonitorInstance>(
    ([symbol]) => symbol,
    (symbol) => new MonitorInstance(symbol)
  );

  /**
   * Analyses the symbol once and broadcasts the report.
   */
  public run = async (
    symbol: string = GLOBAL_CONFIG.CC_DEFAULT_SYMBOL,
    type: ReportContract["type"] = "manual_request"
  ) => {
    const target = normalizeSymbol(symbol);
    market.loggerService.info(MONITOR_METHOD_NAME_RUN, {
      symbol: target,
      type,
    });
    return await this._getInstance(target).run(type);
  };

  /**
   * Starts the scheduled loop for the symbol.
   *
   * @returns Cancellation closure
   */
  public background = (symbol: string = GLOBAL_CONFIG.CC_DEFAULT_SYMBOL) => {
    const target = normalizeSymbol(symbol);
    market.loggerService.info(MONITOR_METHOD_NAME_BACKGROUND, {
      symbol: target,
    });
    return this._getInstance(target).background();
  };

  public getStatus = (symbol: string = GLOBAL_CONFIG.CC_DEFAULT_SYMBOL) => {
    const target = normalizeSymbol(symbol);
    market.loggerService.info(MONITOR_METHOD_NAME_GET_STATUS, {
      symbol: target,
    });
    return this._getInstance(target).getStatus();
  };

  /**
   * Status of every symbol touched so far.
   */
  public list = () => {
    market.loggerService.info(MONITOR_METHOD_NAME_LIST);
    const instanceList = this._getInstance.values();
    return instanceList.map((instance) => instance.getStatus());
  };
}

export const Monitor = new MonitorUtils();

export default Monitor;
