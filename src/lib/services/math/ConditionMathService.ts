import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import {
  BollingerPosition,
  IIndicatorSnapshot,
  MacdCondition,
  MacdCrossover,
  ObvTrend,
  RsiCondition,
  RsiTrend,
} from "../../../interfaces/Analysis.interface";
import { IIndicatorValues } from "../../../interfaces/Indicator.interface";
import { GLOBAL_CONFIG } from "../../../config/params";

const SNAP_ZERO_FN = (value: number, epsilon: number) =>
  Math.abs(value) <= epsilon ? 0 : value;

/**
 * Maps raw indicator readings to discrete condition labels using fixed cut-points.
 */
export class ConditionMathService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  public classifyRsi = (value: number): RsiCondition => {
    if (value > 80) {
      return "extremely_overbought";
    }
    if (value > 70) {
      return "overbought";
    }
    if (value > 60) {
      return "bullish";
    }
    if (value > 40) {
      return "neutral";
    }
    if (value > 30) {
      return "bearish";
    }
    if (value > 20) {
      return "oversold";
    }
    return "extremely_oversold";
  };

  public classifyRsiTrend = (
    value: number,
    previous: number | null
  ): RsiTrend => {
    if (previous === null || value === previous) {
      return "flat";
    }
    return value > previous ? "rising" : "falling";
  };

  /**
   * Differences within `epsilon` of zero are treated as zero.
   */
  public classifyMacd = (
    macd: number,
    signal: number,
    histogram: number,
    epsilon = 0
  ): MacdCondition => {
    const spread = SNAP_ZERO_FN(macd - signal, epsilon);
    const bar = SNAP_ZERO_FN(histogram, epsilon);
    if (spread > 0 && bar > 0) {
      return "bullish";
    }
    if (spread < 0 && bar < 0) {
      return "bearish";
    }
    return "neutral";
  };

  /**
   * Histogram sign flip versus the previous bar.
   */
  public classifyCrossover = (
    histogram: number,
    previousHistogram: number | null,
    epsilon = 0
  ): MacdCrossover => {
    if (previousHistogram === null) {
      return "none";
    }
    const current = SNAP_ZERO_FN(histogram, epsilon);
    const previous = SNAP_ZERO_FN(previousHistogram, epsilon);
    if (current > 0 && previous <= 0) {
      return "bullish_crossover";
    }
    if (current < 0 && previous >= 0) {
      return "bearish_crossover";
    }
    return "none";
  };

  public classifyBollinger = (
    price: number,
    upper: number,
    middle: number,
    lower: number
  ): BollingerPosition => {
    if (price > upper) {
      return "above_upper";
    }
    if (price > middle) {
      return "upper_half";
    }
    if (price > lower) {
      return "lower_half";
    }
    return "below_lower";
  };

  /**
   * True when the current width is below `CC_BOLLINGER_SQUEEZE_RATIO` times
   * the mean of the last `CC_BOLLINGER_SQUEEZE_LOOKBACK` widths.
   */
  public detectSqueeze = (widths: number[]): boolean => {
    const lookback = GLOBAL_CONFIG.CC_BOLLINGER_SQUEEZE_LOOKBACK;
    if (lookback < 1 || widths.length < lookback) {
      return false;
    }
    const recent = widths.slice(-lookback);
    const mean = recent.reduce((acc, width) => acc + width, 0) / lookback;
    return widths[widths.length - 1] < mean * GLOBAL_CONFIG.CC_BOLLINGER_SQUEEZE_RATIO;
  };

  public classifyObv = (value: number, previous: number): ObvTrend =>
    value > previous ? "accumulation" : "distribution";

  public classify = (values: IIndicatorValues): IIndicatorSnapshot => {
    this.loggerService.log("conditionMathService classify", {
      currentPrice: values.currentPrice,
    });
    const { rsi, macd, bollinger, obv } = values;
    const epsilon =
      GLOBAL_CONFIG.CC_MACD_EPSILON_RATIO * Math.abs(values.currentPrice);
    return {
      rsi: rsi && {
        value: rsi.value,
        condition: this.classifyRsi(rsi.value),
        trend: this.classifyRsiTrend(rsi.value, rsi.previous),
      },
      macd: macd && {
        macd: macd.macd,
        signal: macd.signal,
        histogram: macd.histogram,
        condition: this.classifyMacd(
          macd.macd,
          macd.signal,
          macd.histogram,
          epsilon
        ),
        crossover: this.classifyCrossover(
          macd.histogram,
          macd.previousHistogram,
          epsilon
        ),
      },
      bollinger: bollinger && {
        upper: bollinger.upper,
        middle: bollinger.middle,
        lower: bollinger.lower,
        width: bollinger.widths.length
          ? bollinger.widths[bollinger.widths.length - 1]
          : 0,
        position: this.classifyBollinger(
          values.currentPrice,
          bollinger.upper,
          bollinger.middle,
          bollinger.lower
        ),
        squeeze: this.detectSqueeze(bollinger.widths),
      },
      obv: obv && {
        value: obv.value,
        trend: this.classifyObv(obv.value, obv.previous),
      },
      sma20: values.sma20,
      sma50: values.sma50,
      levels: values.levels,
      volumeProfile: values.volumeProfile,
    };
  };
}

export default ConditionMathService;
