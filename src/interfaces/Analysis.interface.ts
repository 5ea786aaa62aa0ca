import { CandleInterval, ICandleData } from "./Exchange.interface";
import { IKeyLevels, IVolumeProfile } from "./Indicator.interface";
import { IMarketContext } from "./Context.interface";

export type RsiCondition =
  | "extremely_overbought"
  | "overbought"
  | "bullish"
  | "neutral"
  | "bearish"
  | "oversold"
  | "extremely_oversold";

export type RsiTrend = "rising" | "falling" | "flat";

export type MacdCondition = "bullish" | "bearish" | "neutral";

export type MacdCrossover = "bullish_crossover" | "bearish_crossover" | "none";

export type BollingerPosition =
  | "above_upper"
  | "upper_half"
  | "lower_half"
  | "below_lower";

export type ObvTrend = "accumulation" | "distribution";

export type TrendLabel =
  | "strong_bullish"
  | "bullish"
  | "neutral"
  | "bearish"
  | "strong_bearish";

export type TradeAction = "BUY" | "SELL" | "HOLD";

export type TradeHorizon = "intraday" | "swing";

/** Directional reading of a single signal. */
export type SignalBias = 1 | 0 | -1;

export interface IRsiResult {
  value: number;
  condition: RsiCondition;
  trend: RsiTrend;
}

export interface IMacdResult {
  macd: number;
  signal: number;
  histogram: number;
  condition: MacdCondition;
  crossover: MacdCrossover;
}

export interface IBollingerResult {
  upper: number;
  middle: number;
  lower: number;
  /** upper - lower */
  width: number;
  position: BollingerPosition;
  squeeze: boolean;
}

export interface IObvResult {
  value: number;
  trend: ObvTrend;
}

/**
 * Classified indicator readings of one timeframe.
 * A `null` entry means the indicator could not be computed and counts as neutral.
 */
export interface IIndicatorSnapshot {
  rsi: IRsiResult | null;
  macd: IMacdResult | null;
  bollinger: IBollingerResult | null;
  obv: IObvResult | null;
  sma20: number | null;
  sma50: number | null;
  levels: IKeyLevels;
  volumeProfile: IVolumeProfile | null;
}

export interface ITimeframeAnalysis {
  status: "ok";
  timeframe: CandleInterval;
  currentPrice: number;
  indicators: IIndicatorSnapshot;
  trend: TrendLabel;
  /** Raw weighted vote behind `trend` */
  trendScore: number;
  /** 0..100 */
  confidence: number;
  /** 0..1, independent of `confidence` */
  sentiment: number;
  action: TradeAction;
}

export interface ITimeframeError {
  status: "error";
  timeframe: CandleInterval;
  error: string;
}

export type TimeframeResult = ITimeframeAnalysis | ITimeframeError;

export interface ITradeLevels {
  horizon: TradeHorizon;
  action: TradeAction;
  entry: number;
  stopLoss: number;
  takeProfit: number;
  riskReward: number;
}

export interface IMarketAnalysisInput {
  symbol: string;
  series: Partial<Record<CandleInterval, ICandleData[]>>;
  /** Latest completed candle. Derived from the intraday series when omitted */
  anchor?: ICandleData | null;
  context?: IMarketContext | null;
  when?: Date;
}

export interface IMarketAnalysis {
  symbol: string;
  when: Date;
  timeframes: Partial<Record<CandleInterval, TimeframeResult>>;
  anchor: ICandleData | null;
  context: IMarketContext | null;
  tradeLevels: Record<TradeHorizon, ITradeLevels>;
  sentiment: {
    shortTerm: number;
    longTerm: number;
  };
}
