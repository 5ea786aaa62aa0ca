import { CandleInterval } from "../interfaces/Exchange.interface";
import { IndicatorBackendName } from "../interfaces/Indicator.interface";

declare function parseInt(value: unknown): number;

const DEFAULT_SYMBOLS: string[] = ["ETH/USDT", "BTC/USDT", "SOL/USDT"];

const DEFAULT_TIMEFRAMES: CandleInterval[] = ["15m", "1h", "4h", "1d"];

const INTRADAY_TIMEFRAME: CandleInterval = "15m";

const SWING_TIMEFRAME: CandleInterval = "1d";

const READ_BACKEND_FN = (value: unknown): IndicatorBackendName =>
  value === "formula" ? "formula" : "faster";

export const GLOBAL_CONFIG = {
  /**
   * Symbol analysed by the scheduler and by `GET /analyze`
   */
  CC_DEFAULT_SYMBOL: process.env.CC_DEFAULT_SYMBOL || "ETH/USDT",
  /**
   * Symbols listed on the status endpoint
   */
  CC_SYMBOLS: DEFAULT_SYMBOLS,
  /**
   * Timeframes fetched and analysed every cycle
   */
  CC_TIMEFRAMES: DEFAULT_TIMEFRAMES,
  /**
   * Timeframe driving the intraday trade levels and the short-term sentiment
   */
  CC_INTRADAY_TIMEFRAME: INTRADAY_TIMEFRAME,
  /**
   * Timeframe driving the swing trade levels and the long-term sentiment
   */
  CC_SWING_TIMEFRAME: SWING_TIMEFRAME,
  /**
   * Number of candles requested per timeframe
   */
  CC_CANDLE_LIMIT: 200,
  /**
   * Indicator engine: "faster" (trading-signals) or "formula"
   */
  CC_INDICATOR_BACKEND: READ_BACKEND_FN(process.env.CC_INDICATOR_BACKEND),

  CC_RSI_PERIOD: 14,
  CC_MACD_FAST_PERIOD: 12,
  CC_MACD_SLOW_PERIOD: 26,
  CC_MACD_SIGNAL_PERIOD: 9,
  /**
   * MACD differences within this share of the price count as zero
   */
  CC_MACD_EPSILON_RATIO: 1e-9,
  CC_BOLLINGER_PERIOD: 20,
  CC_BOLLINGER_STDDEV: 2,
  /**
   * Squeeze when the band width drops below this share of its recent mean
   */
  CC_BOLLINGER_SQUEEZE_RATIO: 0.8,
  /**
   * Number of band widths averaged for the squeeze test
   */
  CC_BOLLINGER_SQUEEZE_LOOKBACK: 20,
  CC_SMA_SHORT_PERIOD: 20,
  CC_SMA_LONG_PERIOD: 50,
  /**
   * OBV is compared with its value this many bars earlier
   */
  CC_OBV_TREND_LOOKBACK: 5,

  /**
   * Width of the centered window used for pivot detection
   */
  CC_SR_WINDOW: 20,
  /**
   * Most recent pivots kept per side
   */
  CC_SR_MAX_LEVELS: 3,
  /**
   * Pivots closer than this to the price (percent) are ignored
   */
  CC_SR_MIN_DISTANCE_PERCENT: 0.1,
  /**
   * Distance of the synthetic level used when no pivot qualifies (percent)
   */
  CC_SR_FALLBACK_PERCENT: 2,
  CC_VOLUME_PROFILE_BINS: 20,
  /**
   * Profile is balanced when the POC is within this distance of the price (percent)
   */
  CC_VOLUME_PROFILE_BALANCE_PERCENT: 2,

  CC_INTRADAY_STOP_PERCENT: 1.5,
  CC_INTRADAY_TARGET_PERCENT: 3,
  CC_SWING_STOP_PERCENT: 5,
  CC_SWING_TARGET_PERCENT: 10,
  /**
   * Entry used for trade levels when the anchor close is zero or missing
   */
  CC_PLACEHOLDER_PRICE: 100,
  /**
   * Printed in the risk section of the report (percent of equity)
   */
  CC_MAX_RISK_PER_TRADE: 2,
  CC_INTRADAY_LEVERAGE: 5,
  CC_SWING_LEVERAGE: 3,

  /**
   * 24h change (percent) beyond which the market context turns bullish or bearish
   */
  CC_MARKET_CONTEXT_THRESHOLD_PERCENT: 2,
  /**
   * Base URL of the CoinGecko REST API
   */
  CC_COINGECKO_URL:
    process.env.CC_COINGECKO_URL || "https://api.coingecko.com/api/v3",

  /**
   * Number of attempts per exchange request
   */
  CC_GET_CANDLES_RETRY_COUNT: 3,
  /**
   * Delay between attempts (in milliseconds)
   */
  CC_GET_CANDLES_RETRY_DELAY_MS: 5_000,

  /**
   * Pause between two scheduled analysis cycles
   */
  CC_ANALYSIS_INTERVAL_MINUTES:
    parseInt(process.env.CC_ANALYSIS_INTERVAL_MINUTES) || 60,
  /**
   * Pause after a failed cycle before the next attempt
   */
  CC_ERROR_RETRY_MINUTES: 5,

  /**
   * Longest message sent to a notifier in one part
   */
  CC_REPORT_CHUNK_SIZE: 4_000,
  CC_REPORT_CHUNK_DELAY_MS: 1_000,
  CC_TELEGRAM_BOT_TOKEN: process.env.CC_TELEGRAM_BOT_TOKEN || "",
  CC_TELEGRAM_CHAT_ID: process.env.CC_TELEGRAM_CHAT_ID || "",
  CC_TELEGRAM_API_URL:
    process.env.CC_TELEGRAM_API_URL || "https://api.telegram.org",
};

export const DEFAULT_CONFIG = Object.freeze({ ...GLOBAL_CONFIG });

/**
 * Type for global configuration object.
 */
export type GlobalConfig = typeof GLOBAL_CONFIG;

export const CC_WWWROOT_HOST = process.env.CC_WWWROOT_HOST || "0.0.0.0";
export const CC_WWWROOT_PORT = parseInt(process.env.CC_WWWROOT_PORT) || 8000;

export const CC_LOG_LEVEL = process.env.CC_LOG_LEVEL || "info";

