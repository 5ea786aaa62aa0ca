import { memoize } from "functools-kit";
import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import {
  IIndicatorBackend,
  IndicatorBackendName,
} from "../../../interfaces/Indicator.interface";
import { GLOBAL_CONFIG } from "../../../config/params";
import ClientFasterIndicator from "../../../client/ClientFasterIndicator";
import ClientFormulaIndicator from "../../../client/ClientFormulaIndicator";

/**
 * Routes indicator calls to the backend named by `CC_INDICATOR_BACKEND`.
 *
 * Each backend is instantiated once and reused.
 */
export class IndicatorConnectionService implements IIndicatorBackend {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  public getBackend = memoize(
    ([backendName]) => `${backendName}`,
    (backendName: IndicatorBackendName): IIndicatorBackend => {
      this.loggerService.info("indicatorConnectionService getBackend", {
        backendName,
      });
      if (backendName === "formula") {
        return new ClientFormulaIndicator({ logger: this.loggerService });
      }
      return new ClientFasterIndicator({ logger: this.loggerService });
    }
  );

  public get backendName(): IndicatorBackendName {
    return GLOBAL_CONFIG.CC_INDICATOR_BACKEND;
  }

  public rsi = (closes: number[], period: number) => {
    this.loggerService.log("indicatorConnectionService rsi", { period });
    return this.getBackend(this.backendName).rsi(closes, period);
  };

  public macd = (
    closes: number[],
    fast: number,
    slow: number,
    signal: number
  ) => {
    this.loggerService.log("indicatorConnectionService macd", {
      fast,
      slow,
      signal,
    });
    return this.getBackend(this.backendName).macd(closes, fast, slow, signal);
  };

  public bollinger = (closes: number[], period: number, k: number) => {
    this.loggerService.log("indicatorConnectionService bollinger", {
      period,
      k,
    });
    return this.getBackend(this.backendName).bollinger(closes, period, k);
  };

  public sma = (closes: number[], period: number) => {
    this.loggerService.log("indicatorConnectionService sma", { period });
    return this.getBackend(this.backendName).sma(closes, period);
  };
}

export default IndicatorConnectionService;
