import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import TimeframeLogicService from "./TimeframeLogicService";
import TradeLevelMathService from "../math/TradeLevelMathService";
import ExecutionContextService from "../context/ExecutionContextService";
import {
  CandleInterval,
  ICandleData,
} from "../../../interfaces/Exchange.interface";
import {
  IMarketAnalysis,
  IMarketAnalysisInput,
  TimeframeResult,
} from "../../../interfaces/Analysis.interface";
import { GLOBAL_CONFIG } from "../../../config/params";
import EmptyInputError from "../../../errors/EmptyInputError";

const NEUTRAL_SENTIMENT = 0.5;

/**
 * Latest completed candle: the one before the possibly unfinished last candle.
 */
export const GET_ANCHOR_CANDLE_FN = (
  candles: ICandleData[] | undefined
): ICandleData | null =>
  candles && candles.length >= 2 ? candles[candles.length - 2] : null;

/**
 * Analyses every supplied timeframe independently and assembles the
 * multi-timeframe result with trade levels and sentiment.
 */
export class MarketLogicService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);
  private readonly timeframeLogicService = inject<TimeframeLogicService>(
    TYPES.timeframeLogicService
  );
  private readonly tradeLevelMathService = inject<TradeLevelMathService>(
    TYPES.tradeLevelMathService
  );

  /**
   * @throws EmptyInputError when no timeframe is supplied at all
   */
  public analyzeMarket = async ({
    symbol,
    series,
    anchor,
    context = null,
    when = new Date(),
  }: IMarketAnalysisInput): Promise<IMarketAnalysis> => {
    this.loggerService.log("marketLogicService analyzeMarket", {
      symbol,
      timeframes: Object.keys(series),
    });

    const entries = Object.entries(series).filter(
      (entry): entry is [CandleInterval, ICandleData[]] => !!entry[1]
    );

    if (!entries.length) {
      throw new EmptyInputError(`no candle series supplied for ${symbol}`);
    }

    const timeframes: Partial<Record<CandleInterval, TimeframeResult>> = {};

    for (const [timeframe, candles] of entries) {
      if (!candles.length) {
        this.loggerService.warn("marketLogicService analyzeMarket skip empty", {
          symbol,
          timeframe,
        });
        continue;
      }
      timeframes[timeframe] = await ExecutionContextService.runInContext(
        async () =>
          this.timeframeLogicService.analyzeTimeframe(timeframe, candles),
        { symbol, timeframe, when }
      );
    }

    const intraday = timeframes[GLOBAL_CONFIG.CC_INTRADAY_TIMEFRAME];
    const swing = timeframes[GLOBAL_CONFIG.CC_SWING_TIMEFRAME];

    const resolvedAnchor =
      anchor === undefined
        ? GET_ANCHOR_CANDLE_FN(series[GLOBAL_CONFIG.CC_INTRADAY_TIMEFRAME])
        : anchor;

    const analysis: IMarketAnalysis = {
      symbol,
      when,
      timeframes,
      anchor: resolvedAnchor,
      context,
      tradeLevels: {
        intraday: this.tradeLevelMathService.getTradeLevels(
          resolvedAnchor?.close,
          intraday?.status === "ok" ? intraday.action : "HOLD",
          "intraday"
        ),
        swing: this.tradeLevelMathService.getTradeLevels(
          resolvedAnchor?.close,
          swing?.status === "ok" ? swing.action : "HOLD",
          "swing"
        ),
      },
      sentiment: {
        shortTerm:
          intraday?.status === "ok" ? intraday.sentiment : NEUTRAL_SENTIMENT,
        longTerm: swing?.status === "ok" ? swing.sentiment : NEUTRAL_SENTIMENT,
      },
    };

    return analysis;
  };
}

export default MarketLogicService;
