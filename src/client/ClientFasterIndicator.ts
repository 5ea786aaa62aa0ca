import {
  FasterRSI as RSI,
  FasterMACD as MACD,
  FasterBollingerBands as BollingerBands,
  FasterSMA as SMA,
  FasterEMA as EMA,
} from "trading-signals";
import {
  IBollingerSeries,
  IIndicatorBackend,
  IIndicatorParams,
  IMacdSeries,
  IndicatorSeries,
} from "../interfaces/Indicator.interface";

/**
 * Reads the current result of a streaming indicator, `null` while it warms up.
 */
const READ_RESULT_FN = <T>(indicator: {
  isStable: boolean;
  getResult(): T | null | undefined;
}): T | null => {
  if (!indicator.isStable) {
    return null;
  }
  return indicator.getResult() ?? null;
};

/**
 * Indicator backend powered by the `trading-signals` streaming classes.
 *
 * RSI follows Wilder smoothing and Bollinger Bands use the population
 * standard deviation, as implemented by the library.
 */
export class ClientFasterIndicator implements IIndicatorBackend {
  readonly backendName = "faster";

  constructor(readonly params: IIndicatorParams) {}

  public rsi(closes: number[], period: number): IndicatorSeries {
    this.params.logger.debug("ClientFasterIndicator rsi", {
      period,
      length: closes.length,
    });
    const rsi = new RSI(period);
    let unchanged = 0;
    return closes.map((close, idx) => {
      rsi.update(close, false);
      unchanged = idx > 0 && close === closes[idx - 1] ? unchanged + 1 : 0;
      // no gains and no losses over the window: undefined, not 100
      if (unchanged >= period) {
        return null;
      }
      return READ_RESULT_FN(rsi);
    });
  }

  public macd(
    closes: number[],
    fast: number,
    slow: number,
    signal: number
  ): IMacdSeries {
    this.params.logger.debug("ClientFasterIndicator macd", {
      fast,
      slow,
      signal,
      length: closes.length,
    });
    const macd = new MACD(new EMA(fast), new EMA(slow), new EMA(signal));
    const result: IMacdSeries = { macd: [], signal: [], histogram: [] };
    for (const close of closes) {
      macd.update(close, false);
      const value = READ_RESULT_FN(macd);
      result.macd.push(value ? value.macd : null);
      result.signal.push(value ? value.signal : null);
      result.histogram.push(value ? value.histogram : null);
    }
    return result;
  }

  public bollinger(
    closes: number[],
    period: number,
    k: number
  ): IBollingerSeries {
    this.params.logger.debug("ClientFasterIndicator bollinger", {
      period,
      k,
      length: closes.length,
    });
    const bollinger = new BollingerBands(period, k);
    const result: IBollingerSeries = { upper: [], middle: [], lower: [] };
    for (const close of closes) {
      bollinger.update(close, false);
      const value = READ_RESULT_FN(bollinger);
      result.upper.push(value ? value.upper : null);
      result.middle.push(value ? value.middle : null);
      result.lower.push(value ? value.lower : null);
    }
    return result;
  }

  public sma(closes: number[], period: number): IndicatorSeries {
    this.params.logger.debug("ClientFasterIndicator sma", {
      period,
      length: closes.length,
    });
    const sma = new SMA(period);
    return closes.map((close) => {
      sma.update(close, false);
      return READ_RESULT_FN(sma);
    });
  }
}

export default ClientFasterIndicator;
