import { errorData, getErrorMessage } from "functools-kit";
import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import IndicatorConnectionService from "../connection/IndicatorConnectionService";
import { ICandleData } from "../../../interfaces/Exchange.interface";
import {
  IIndicatorValues,
  IndicatorSeries,
} from "../../../interfaces/Indicator.interface";
import { GLOBAL_CONFIG } from "../../../config/params";
import { isUnsafe, toSafe } from "../../../utils/isUnsafe";
import computeObv from "../../../utils/computeObv";
import findKeyLevels from "../../../utils/findKeyLevels";
import computeVolumeProfile from "../../../utils/computeVolumeProfile";
import InsufficientDataError from "../../../errors/InsufficientDataError";
import ComputationError from "../../../errors/ComputationError";
import EmptyInputError from "../../../errors/EmptyInputError";

/**
 * Latest value of a series, validated.
 *
 * @throws InsufficientDataError when the series has not warmed up
 * @throws ComputationError when the value is NaN or infinite
 */
const READ_LAST_FN = (
  indicator: string,
  series: IndicatorSeries,
  required: number
): number => {
  const value = series[series.length - 1];
  if (value === null || value === undefined) {
    throw new InsufficientDataError(indicator, required, series.length);
  }
  if (isUnsafe(value)) {
    throw new ComputationError(indicator, value);
  }
  return value;
};

/**
 * Computes the raw indicator readings of a candle series.
 *
 * Every indicator is contained on its own: a failure is logged and leaves
 * that indicator `null` while the others are still returned.
 */
export class IndicatorMathService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);
  private readonly indicatorConnectionService =
    inject<IndicatorConnectionService>(TYPES.indicatorConnectionService);

  private contain = <T>(indicator: string, fn: () => T): T | null => {
    try {
      return fn();
    } catch (error) {
      this.loggerService.warn(`indicatorMathService ${indicator} degraded`, {
        error: errorData(error),
        message: getErrorMessage(error),
      });
      return null;
    }
  };

  public getRsi = (closes: number[]) => {
    this.loggerService.log("indicatorMathService getRsi");
    const period = GLOBAL_CONFIG.CC_RSI_PERIOD;
    const series = this.indicatorConnectionService.rsi(closes, period);
    return {
      value: READ_LAST_FN("RSI", series, period + 1),
      previous: toSafe(series[series.length - 3]),
    };
  };

  public getMacd = (closes: number[]) => {
    this.loggerService.log("indicatorMathService getMacd");
    const {
      CC_MACD_FAST_PERIOD: fast,
      CC_MACD_SLOW_PERIOD: slow,
      CC_MACD_SIGNAL_PERIOD: signal,
    } = GLOBAL_CONFIG;
    const required = Math.max(fast, slow) + signal - 1;
    const series = this.indicatorConnectionService.macd(
      closes,
      fast,
      slow,
      signal
    );
    return {
      macd: READ_LAST_FN("MACD", series.macd, required),
      signal: READ_LAST_FN("MACD signal", series.signal, required),
      histogram: READ_LAST_FN("MACD histogram", series.histogram, required),
      previousHistogram: toSafe(series.histogram[series.histogram.length - 2]),
    };
  };

  public getBollinger = (closes: number[]) => {
    this.loggerService.log("indicatorMathService getBollinger");
    const { CC_BOLLINGER_PERIOD: period, CC_BOLLINGER_STDDEV: k } =
      GLOBAL_CONFIG;
    const series = this.indicatorConnectionService.bollinger(closes, period, k);
    const widths: number[] = [];
    series.middle.forEach((middle, idx) => {
      const upper = series.upper[idx];
      const lower = series.lower[idx];
      if (
        middle === null ||
        upper === null ||
        lower === null ||
        isUnsafe(middle) ||
        isUnsafe(upper) ||
        isUnsafe(lower)
      ) {
        return;
      }
      widths.push(upper - lower);
    });
    return {
      upper: READ_LAST_FN("Bollinger upper", series.upper, period),
      middle: READ_LAST_FN("Bollinger middle", series.middle, period),
      lower: READ_LAST_FN("Bollinger lower", series.lower, period),
      widths,
    };
  };

  public getObv = (candles: ICandleData[]) => {
    this.loggerService.log("indicatorMathService getObv");
    const lookback = GLOBAL_CONFIG.CC_OBV_TREND_LOOKBACK;
    if (candles.length <= lookback) {
      throw new InsufficientDataError("OBV", lookback + 1, candles.length);
    }
    const obv = computeObv(candles);
    const value = obv[obv.length - 1];
    const previous = obv[obv.length - 1 - lookback];
    if (isUnsafe(value) || isUnsafe(previous)) {
      throw new ComputationError("OBV", value);
    }
    return { value, previous };
  };

  public getSma = (closes: number[], period: number) => {
    this.loggerService.log("indicatorMathService getSma", { period });
    return READ_LAST_FN(
      `SMA(${period})`,
      this.indicatorConnectionService.sma(closes, period),
      period
    );
  };

  /**
   * Computes every indicator of a candle series.
   *
   * @throws EmptyInputError when `candles` is empty
   */
  public getIndicators = (candles: ICandleData[]): IIndicatorValues => {
    this.loggerService.log("indicatorMathService getIndicators", {
      length: candles.length,
    });
    if (!candles.length) {
      throw new EmptyInputError();
    }
    const closes = candles.map(({ close }) => close);
    const currentPrice = closes[closes.length - 1];
    return {
      currentPrice,
      rsi: this.contain("rsi", () => this.getRsi(closes)),
      macd: this.contain("macd", () => this.getMacd(closes)),
      bollinger: this.contain("bollinger", () => this.getBollinger(closes)),
      obv: this.contain("obv", () => this.getObv(candles)),
      sma20: this.contain("sma20", () =>
        this.getSma(closes, GLOBAL_CONFIG.CC_SMA_SHORT_PERIOD)
      ),
      sma50: this.contain("sma50", () =>
        this.getSma(closes, GLOBAL_CONFIG.CC_SMA_LONG_PERIOD)
      ),
      levels: findKeyLevels(candles, currentPrice, {
        window: GLOBAL_CONFIG.CC_SR_WINDOW,
        maxLevels: GLOBAL_CONFIG.CC_SR_MAX_LEVELS,
        minDistancePercent: GLOBAL_CONFIG.CC_SR_MIN_DISTANCE_PERCENT,
        fallbackPercent: GLOBAL_CONFIG.CC_SR_FALLBACK_PERCENT,
      }),
      volumeProfile: this.contain("volumeProfile", () =>
        computeVolumeProfile(
          candles,
          currentPrice,
          GLOBAL_CONFIG.CC_VOLUME_PROFILE_BINS,
          GLOBAL_CONFIG.CC_VOLUME_PROFILE_BALANCE_PERCENT
        )
      ),
    };
  };
}

export default IndicatorMathService;
