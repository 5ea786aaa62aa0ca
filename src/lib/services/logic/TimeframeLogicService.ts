import { errorData, getErrorMessage } from "functools-kit";
import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import IndicatorMathService from "../math/IndicatorMathService";
import ConditionMathService from "../math/ConditionMathService";
import TrendMathService from "../math/TrendMathService";
import {
  CandleInterval,
  ICandleData,
} from "../../../interfaces/Exchange.interface";
import { TimeframeResult } from "../../../interfaces/Analysis.interface";

/**
 * Runs Compute, Classify and Aggregate over a single candle series.
 *
 * Never throws: any failure becomes an error marker for the timeframe.
 */
export class TimeframeLogicService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);
  private readonly indicatorMathService = inject<IndicatorMathService>(
    TYPES.indicatorMathService
  );
  private readonly conditionMathService = inject<ConditionMathService>(
    TYPES.conditionMathService
  );
  private readonly trendMathService = inject<TrendMathService>(
    TYPES.trendMathService
  );

  public analyzeTimeframe = (
    timeframe: CandleInterval,
    candles: ICandleData[]
  ): TimeframeResult => {
    this.loggerService.log("timeframeLogicService analyzeTimeframe", {
      timeframe,
      length: candles.length,
    });
    try {
      const values = this.indicatorMathService.getIndicators(candles);
      const indicators = this.conditionMathService.classify(values);
      const { trend, score } = this.trendMathService.getTrend(
        indicators,
        values.currentPrice
      );
      return {
        status: "ok",
        timeframe,
        currentPrice: values.currentPrice,
        indicators,
        trend,
        trendScore: score,
        confidence: this.trendMathService.getConfidence(indicators),
        sentiment: this.trendMathService.getSentiment(indicators, trend),
        action: this.trendMathService.getAction(indicators, trend),
      };
    } catch (error) {
      this.loggerService.warn("timeframeLogicService analyzeTimeframe failed", {
        timeframe,
        error: errorData(error),
      });
      return {
        status: "error",
        timeframe,
        error: getErrorMessage(error),
      };
    }
  };
}

export default TimeframeLogicService;
