import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import { GLOBAL_CONFIG } from "../../../config/params";

const POSITIVE_INTEGER_KEYS = [
  "CC_CANDLE_LIMIT",
  "CC_RSI_PERIOD",
  "CC_MACD_FAST_PERIOD",
  "CC_MACD_SLOW_PERIOD",
  "CC_MACD_SIGNAL_PERIOD",
  "CC_BOLLINGER_PERIOD",
  "CC_BOLLINGER_SQUEEZE_LOOKBACK",
  "CC_SMA_SHORT_PERIOD",
  "CC_SMA_LONG_PERIOD",
  "CC_OBV_TREND_LOOKBACK",
  "CC_SR_WINDOW",
  "CC_SR_MAX_LEVELS",
  "CC_VOLUME_PROFILE_BINS",
  "CC_GET_CANDLES_RETRY_COUNT",
  "CC_REPORT_CHUNK_SIZE",
] as const;

const POSITIVE_NUMBER_KEYS = [
  "CC_BOLLINGER_STDDEV",
  "CC_BOLLINGER_SQUEEZE_RATIO",
  "CC_SR_FALLBACK_PERCENT",
  "CC_VOLUME_PROFILE_BALANCE_PERCENT",
  "CC_INTRADAY_STOP_PERCENT",
  "CC_INTRADAY_TARGET_PERCENT",
  "CC_SWING_STOP_PERCENT",
  "CC_SWING_TARGET_PERCENT",
  "CC_PLACEHOLDER_PRICE",
  "CC_MAX_RISK_PER_TRADE",
  "CC_ANALYSIS_INTERVAL_MINUTES",
  "CC_ERROR_RETRY_MINUTES",
] as const;

const NON_NEGATIVE_NUMBER_KEYS = [
  "CC_SR_MIN_DISTANCE_PERCENT",
  "CC_MACD_EPSILON_RATIO",
  "CC_MARKET_CONTEXT_THRESHOLD_PERCENT",
  "CC_GET_CANDLES_RETRY_DELAY_MS",
  "CC_REPORT_CHUNK_DELAY_MS",
] as const;

/**
 * Validates GLOBAL_CONFIG after setConfig() and reports every problem at once.
 */
export class ConfigValidationService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  /**
   * @throws Error listing every invalid parameter
   */
  public validate = () => {
    this.loggerService.log("configValidationService validate");

    const errors: string[] = [];

    for (const key of POSITIVE_INTEGER_KEYS) {
      const value = GLOBAL_CONFIG[key];
      if (!Number.isInteger(value) || value <= 0) {
        errors.push(`${key} must be a positive integer, got ${value}`);
      }
    }

    for (const key of POSITIVE_NUMBER_KEYS) {
      const value = GLOBAL_CONFIG[key];
      if (!Number.isFinite(value) || value <= 0) {
        errors.push(`${key} must be a positive number, got ${value}`);
      }
    }

    for (const key of NON_NEGATIVE_NUMBER_KEYS) {
      const value = GLOBAL_CONFIG[key];
      if (!Number.isFinite(value) || value < 0) {
        errors.push(`${key} must be a non-negative number, got ${value}`);
      }
    }

    if (GLOBAL_CONFIG.CC_MACD_FAST_PERIOD >= GLOBAL_CONFIG.CC_MACD_SLOW_PERIOD) {
      errors.push(
        `CC_MACD_FAST_PERIOD (${GLOBAL_CONFIG.CC_MACD_FAST_PERIOD}) must be less than ` +
          `CC_MACD_SLOW_PERIOD (${GLOBAL_CONFIG.CC_MACD_SLOW_PERIOD})`
      );
    }

    if (GLOBAL_CONFIG.CC_SMA_SHORT_PERIOD >= GLOBAL_CONFIG.CC_SMA_LONG_PERIOD) {
      errors.push(
        `CC_SMA_SHORT_PERIOD (${GLOBAL_CONFIG.CC_SMA_SHORT_PERIOD}) must be less than ` +
          `CC_SMA_LONG_PERIOD (${GLOBAL_CONFIG.CC_SMA_LONG_PERIOD})`
      );
    }

    if (!GLOBAL_CONFIG.CC_TIMEFRAMES.length) {
      errors.push(`CC_TIMEFRAMES must list at least one timeframe`);
    }

    if (
      GLOBAL_CONFIG.CC_INDICATOR_BACKEND !== "faster" &&
      GLOBAL_CONFIG.CC_INDICATOR_BACKEND !== "formula"
    ) {
      errors.push(
        `CC_INDICATOR_BACKEND must be "faster" or "formula", got ${GLOBAL_CONFIG.CC_INDICATOR_BACKEND}`
      );
    }

    if (errors.length > 0) {
      const errorMessage = `GLOBAL_CONFIG validation failed:\n${errors
        .map((e, i) => `  ${i + 1}. ${e}`)
        .join("\n")}`;
      this.loggerService.warn(errorMessage);
      throw new Error(errorMessage);
    }

    this.loggerService.log("configValidationService validation passed");
  };
}

export default ConfigValidationService;
