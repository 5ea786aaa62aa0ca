import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import {
  IIndicatorSnapshot,
  MacdCondition,
  ObvTrend,
  RsiCondition,
  SignalBias,
  TradeAction,
  TrendLabel,
} from "../../../interfaces/Analysis.interface";
import clamp from "../../../utils/clamp";

const CONFIDENCE_BASE = 50;
const CONFIDENCE_RSI_BONUS = 15;
const CONFIDENCE_MACD_BONUS = 15;
const CONFIDENCE_CROSSOVER_BONUS = 10;
const CONFIDENCE_LEVEL_BONUS = 2;
const CONFIDENCE_LEVEL_CAP = 10;

const SENTIMENT_BASE = 0.5;
const SENTIMENT_TREND_WEIGHT = 0.15;
const SENTIMENT_RSI_WEIGHT = 0.125;
const SENTIMENT_MACD_WEIGHT = 0.125;
const SENTIMENT_OBV_WEIGHT = 0.1;

/**
 * RSI readings that vote in the trend score. The extremes do not.
 */
const RSI_TREND_SCORE: Record<RsiCondition, SignalBias> = {
  extremely_overbought: 0,
  overbought: -1,
  bullish: 1,
  neutral: 0,
  bearish: -1,
  oversold: 1,
  extremely_oversold: 0,
};

/**
 * Direction of an RSI reading for sentiment and action.
 */
const RSI_BIAS: Record<RsiCondition, SignalBias> = {
  extremely_overbought: -1,
  overbought: -1,
  bullish: 1,
  neutral: 0,
  bearish: -1,
  oversold: 1,
  extremely_oversold: 1,
};

const MACD_BIAS: Record<MacdCondition, SignalBias> = {
  bullish: 1,
  neutral: 0,
  bearish: -1,
};

const OBV_BIAS: Record<ObvTrend, SignalBias> = {
  accumulation: 1,
  distribution: -1,
};

const TREND_BIAS: Record<TrendLabel, SignalBias> = {
  strong_bullish: 1,
  bullish: 1,
  neutral: 0,
  bearish: -1,
  strong_bearish: -1,
};

/**
 * Turns classified indicators into a trend label, a 0..100 confidence,
 * a 0..1 sentiment and a BUY/SELL/HOLD action.
 *
 * Confidence and sentiment answer different questions and are kept apart.
 */
export class TrendMathService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  /**
   * Price position against the short and long SMA, in -2..2.
   */
  public getPriceScore = (
    price: number,
    sma20: number | null,
    sma50: number | null
  ): number => {
    if (sma20 === null) {
      return 0;
    }
    if (price > sma20 && sma50 !== null && sma20 > sma50) {
      return 2;
    }
    if (price > sma20) {
      return 1;
    }
    if (price < sma20 && sma50 !== null && sma20 < sma50) {
      return -2;
    }
    if (price < sma20) {
      return -1;
    }
    return 0;
  };

  public getTrendLabel = (score: number): TrendLabel => {
    if (score >= 3) {
      return "strong_bullish";
    }
    if (score >= 1) {
      return "bullish";
    }
    if (score <= -3) {
      return "strong_bearish";
    }
    if (score <= -1) {
      return "bearish";
    }
    return "neutral";
  };

  public getTrend = (snapshot: IIndicatorSnapshot, price: number) => {
    this.loggerService.log("trendMathService getTrend", { price });
    let score = this.getPriceScore(price, snapshot.sma20, snapshot.sma50);
    if (snapshot.rsi) {
      score += RSI_TREND_SCORE[snapshot.rsi.condition];
    }
    if (snapshot.macd) {
      score += MACD_BIAS[snapshot.macd.condition];
    }
    return {
      trend: this.getTrendLabel(score),
      score,
    };
  };

  public getConfidence = (snapshot: IIndicatorSnapshot): number => {
    this.loggerService.log("trendMathService getConfidence");
    let confidence = CONFIDENCE_BASE;
    if (snapshot.rsi && RSI_TREND_SCORE[snapshot.rsi.condition] !== 0) {
      confidence += CONFIDENCE_RSI_BONUS;
    }
    if (snapshot.macd && snapshot.macd.condition !== "neutral") {
      confidence += CONFIDENCE_MACD_BONUS;
    }
    if (snapshot.macd && snapshot.macd.crossover !== "none") {
      confidence += CONFIDENCE_CROSSOVER_BONUS;
    }
    confidence += Math.min(
      snapshot.levels.strength * CONFIDENCE_LEVEL_BONUS,
      CONFIDENCE_LEVEL_CAP
    );
    return clamp(confidence, 0, 100);
  };

  public getSentiment = (
    snapshot: IIndicatorSnapshot,
    trend: TrendLabel
  ): number => {
    this.loggerService.log("trendMathService getSentiment", { trend });
    let sentiment = SENTIMENT_BASE;
    sentiment += TREND_BIAS[trend] * SENTIMENT_TREND_WEIGHT;
    if (snapshot.rsi) {
      sentiment += RSI_BIAS[snapshot.rsi.condition] * SENTIMENT_RSI_WEIGHT;
    }
    if (snapshot.macd) {
      sentiment += MACD_BIAS[snapshot.macd.condition] * SENTIMENT_MACD_WEIGHT;
    }
    if (snapshot.obv) {
      sentiment += OBV_BIAS[snapshot.obv.trend] * SENTIMENT_OBV_WEIGHT;
    }
    return clamp(sentiment, 0, 1);
  };

  /**
   * Majority vote over directional signals. A tie is HOLD.
   */
  public voteAction = (signals: SignalBias[]): TradeAction => {
    const bullish = signals.filter((signal) => signal > 0).length;
    const bearish = signals.filter((signal) => signal < 0).length;
    if (bullish > bearish) {
      return "BUY";
    }
    if (bearish > bullish) {
      return "SELL";
    }
    return "HOLD";
  };

  public getAction = (
    snapshot: IIndicatorSnapshot,
    trend: TrendLabel
  ): TradeAction => {
    this.loggerService.log("trendMathService getAction", { trend });
    return this.voteAction([
      TREND_BIAS[trend],
      snapshot.rsi ? RSI_BIAS[snapshot.rsi.condition] : 0,
      snapshot.macd ? MACD_BIAS[snapshot.macd.condition] : 0,
    ]);
  };
}

export default TrendMathService;
