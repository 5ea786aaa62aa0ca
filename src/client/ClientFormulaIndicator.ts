import {
  IBollingerSeries,
  IIndicatorBackend,
  IIndicatorParams,
  IMacdSeries,
  IndicatorSeries,
} from "../interfaces/Indicator.interface";

/**
 * Simple moving average. `null` until `period` values are available.
 */
const SMA_FN = (values: number[], period: number): IndicatorSeries => {
  let sum = 0;
  return values.map((value, idx) => {
    sum += value;
    if (idx >= period) {
      sum -= values[idx - period];
    }
    return period > 0 && idx + 1 >= period ? sum / period : null;
  });
};

/**
 * Exponential moving average seeded with the SMA of the first `period` values.
 */
const EMA_FN = (values: number[], period: number): IndicatorSeries => {
  const alpha = 2 / (period + 1);
  const result: IndicatorSeries = [];
  let prev: number | null = null;
  for (let idx = 0; idx !== values.length; idx++) {
    if (period < 1 || idx + 1 < period) {
      result.push(null);
      continue;
    }
    if (prev === null) {
      const seed = values.slice(idx + 1 - period, idx + 1);
      prev = seed.reduce((acc, value) => acc + value, 0) / period;
    } else {
      prev = alpha * values[idx] + (1 - alpha) * prev;
    }
    result.push(prev);
  }
  return result;
};

/**
 * Sample standard deviation (n - 1) over a rolling window.
 */
const STDDEV_FN = (values: number[], period: number): IndicatorSeries =>
  values.map((_, idx) => {
    if (period < 2 || idx + 1 < period) {
      return null;
    }
    const window = values.slice(idx + 1 - period, idx + 1);
    const mean = window.reduce((acc, value) => acc + value, 0) / period;
    const squares = window.reduce((acc, value) => acc + (value - mean) ** 2, 0);
    return Math.sqrt(squares / (period - 1));
  });

/**
 * Indicator backend computing the textbook formulas directly.
 *
 * RSI uses plain rolling means of gains and losses (not Wilder smoothing).
 * A window without any movement yields NaN, which callers treat as a
 * computation failure.
 */
export class ClientFormulaIndicator implements IIndicatorBackend {
  readonly backendName = "formula";

  constructor(readonly params: IIndicatorParams) {}

  public rsi(closes: number[], period: number): IndicatorSeries {
    this.params.logger.debug("ClientFormulaIndicator rsi", {
      period,
      length: closes.length,
    });
    const gains = closes.map((close, idx) =>
      idx === 0 ? 0 : Math.max(close - closes[idx - 1], 0)
    );
    const losses = closes.map((close, idx) =>
      idx === 0 ? 0 : Math.max(closes[idx - 1] - close, 0)
    );
    return closes.map((_, idx) => {
      if (period < 1 || idx < period) {
        return null;
      }
      let gain = 0;
      let loss = 0;
      for (let j = idx - period + 1; j <= idx; j++) {
        gain += gains[j];
        loss += losses[j];
      }
      if (loss === 0) {
        return gain === 0 ? NaN : 100;
      }
      return 100 - 100 / (1 + gain / loss);
    });
  }

  public macd(
    closes: number[],
    fast: number,
    slow: number,
    signal: number
  ): IMacdSeries {
    this.params.logger.debug("ClientFormulaIndicator macd", {
      fast,
      slow,
      signal,
      length: closes.length,
    });
    const fastEma = EMA_FN(closes, fast);
    const slowEma = EMA_FN(closes, slow);
    const macd = closes.map((_, idx) => {
      const fastValue = fastEma[idx];
      const slowValue = slowEma[idx];
      return fastValue !== null && slowValue !== null
        ? fastValue - slowValue
        : null;
    });
    const start = macd.findIndex((value) => value !== null);
    const defined = start === -1 ? [] : macd.slice(start).map(Number);
    const signalLine: IndicatorSeries = [
      ...new Array<null>(start === -1 ? closes.length : start).fill(null),
      ...EMA_FN(defined, signal),
    ];
    const histogram = macd.map((value, idx) => {
      const signalValue = signalLine[idx];
      return value !== null && signalValue !== null
        ? value - signalValue
        : null;
    });
    return { macd, signal: signalLine, histogram };
  }

  public bollinger(
    closes: number[],
    period: number,
    k: number
  ): IBollingerSeries {
    this.params.logger.debug("ClientFormulaIndicator bollinger", {
      period,
      k,
      length: closes.length,
    });
    const middle = SMA_FN(closes, period);
    const deviation = STDDEV_FN(closes, period);
    const upper = middle.map((value, idx) => {
      const std = deviation[idx];
      return value !== null && std !== null ? value + k * std : null;
    });
    const lower = middle.map((value, idx) => {
      const std = deviation[idx];
      return value !== null && std !== null ? value - k * std : null;
    });
    return {
      upper,
      middle: middle.map((value, idx) => (deviation[idx] !== null ? value : null)),
      lower,
    };
  }

  public sma(closes: number[], period: number): IndicatorSeries {
    this.params.logger.debug("ClientFormulaIndicator sma", {
      period,
      length: closes.length,
    });
    return SMA_FN(closes, period);
  }
}

export default ClientFormulaIndicator;
