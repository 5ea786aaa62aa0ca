import market from "../lib";
import {
  CandleInterval,
  ICandleData,
} from "../interfaces/Exchange.interface";
import {
  IMarketAnalysis,
  IMarketAnalysisInput,
  TradeAction,
  TradeHorizon,
} from "../interfaces/Analysis.interface";
import { ITicker } from "../interfaces/Exchange.interface";
import { GET_ANCHOR_CANDLE_FN } from "../lib/services/logic/MarketLogicService";

const ANALYZE_MARKET_METHOD_NAME = "analyze.analyzeMarket";
const ANALYZE_TIMEFRAME_METHOD_NAME = "analyze.analyzeTimeframe";
const GET_INDICATORS_METHOD_NAME = "analyze.getIndicators";
const GET_TRADE_LEVELS_METHOD_NAME = "analyze.getTradeLevels";
const GET_ANCHOR_CANDLE_METHOD_NAME = "analyze.getAnchorCandle";
const GET_MARKET_CONTEXT_METHOD_NAME = "analyze.deriveMarketContext";
const GET_MARKET_DATA_METHOD_NAME = "analyze.getMarketData";
const GET_REPORT_METHOD_NAME = "analyze.getReport";

/**
 * Analyses a set of candle series, one per timeframe.
 *
 * Empty series are skipped and a failing timeframe is reported with
 * `status: "error"` while the others are still analysed.
 *
 * @throws EmptyInputError when `input.series` has no entries
 *
 * @example
 * ```typescript
 * const analysis = await analyzeMarket({
 *   symbol: "ETH/USDT",
 *   series: { "15m": candles15m, "1d": candles1d },
 * });
 * console.log(analysis.tradeLevels.intraday);
 * ```
 */
export async function analyzeMarket(input: IMarketAnalysisInput) {
  market.loggerService.info(ANALYZE_MARKET_METHOD_NAME, {
    symbol: input.symbol,
  });
  return await market.marketLogicService.analyzeMarket(input);
}

/**
 * Analyses a single candle series. Never throws.
 */
export function analyzeTimeframe(
  timeframe: CandleInterval,
  candles: ICandleData[]
) {
  market.loggerService.info(ANALYZE_TIMEFRAME_METHOD_NAME, { timeframe });
  return market.timeframeLogicService.analyzeTimeframe(timeframe, candles);
}

/**
 * Raw indicator readings of a candle series, before classification.
 *
 * @throws EmptyInputError when `candles` is empty
 */
export function getIndicators(candles: ICandleData[]) {
  market.loggerService.info(GET_INDICATORS_METHOD_NAME);
  return market.indicatorMathService.getIndicators(candles);
}

/**
 * Entry, stop-loss and take-profit for an anchor close and an action.
 */
export function getTradeLevels(
  price: number | null | undefined,
  action: TradeAction,
  horizon: TradeHorizon
) {
  market.loggerService.info(GET_TRADE_LEVELS_METHOD_NAME, {
    price,
    action,
    horizon,
  });
  return market.tradeLevelMathService.getTradeLevels(price, action, horizon);
}

/**
 * Latest completed candle of a series, `null` when it has fewer than two.
 */
export function getAnchorCandle(candles: ICandleData[]) {
  market.loggerService.info(GET_ANCHOR_CANDLE_METHOD_NAME);
  return GET_ANCHOR_CANDLE_FN(candles);
}

/**
 * Market context from a 24h change and volume.
 */
export function deriveMarketContext(change24h: number, volume24h: number | null) {
  market.loggerService.info(GET_MARKET_CONTEXT_METHOD_NAME, {
    change24h,
    volume24h,
  });
  return market.marketContextGlobalService.deriveMarketContext(
    change24h,
    volume24h
  );
}

/**
 * Candle series for every timeframe, served by the first registered
 * exchange able to return all of them.
 *
 * @throws Error listing each exchange failure when none succeeds
 */
export async function getMarketData(
  symbol: string,
  timeframes?: CandleInterval[],
  limit?: number
) {
  market.loggerService.info(GET_MARKET_DATA_METHOD_NAME, {
    symbol,
    timeframes,
    limit,
  });
  return await market.marketDataGlobalService.getMarketData(
    symbol,
    timeframes,
    limit
  );
}

/**
 * Markdown report of an analysis.
 */
export async function getReport(
  analysis: IMarketAnalysis,
  ticker: ITicker | null = null
) {
  market.loggerService.info(GET_REPORT_METHOD_NAME, {
    symbol: analysis.symbol,
  });
  return await market.reportMarkdownService.getReport(analysis, ticker);
}
