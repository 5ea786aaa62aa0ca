import { ILogger } from "./Logger.interface";

/**
 * Series aligned index-for-index with the input closes.
 * Leading entries are `null` until the indicator has enough history.
 */
export type IndicatorSeries = (number | null)[];

export interface IMacdSeries {
  macd: IndicatorSeries;
  signal: IndicatorSeries;
  histogram: IndicatorSeries;
}

export interface IBollingerSeries {
  upper: IndicatorSeries;
  middle: IndicatorSeries;
  lower: IndicatorSeries;
}

/**
 * Numeric engine behind RSI, MACD, Bollinger Bands and SMA.
 *
 * Two implementations exist: one backed by `trading-signals` and one
 * computing the textbook formulas directly. The active one is chosen by
 * `CC_INDICATOR_BACKEND`.
 */
export interface IIndicatorBackend {
  readonly backendName: IndicatorBackendName;
  rsi(closes: number[], period: number): IndicatorSeries;
  macd(
    closes: number[],
    fast: number,
    slow: number,
    signal: number
  ): IMacdSeries;
  bollinger(closes: number[], period: number, k: number): IBollingerSeries;
  sma(closes: number[], period: number): IndicatorSeries;
}

export type IndicatorBackendName = "faster" | "formula";

/**
 * Pivot based key levels around the current price, ascending.
 */
export interface IKeyLevels {
  support: number[];
  resistance: number[];
  /** Number of real (non synthetic) levels on both sides */
  strength: number;
}

export type VolumeDistribution = "balanced" | "skewed";

export interface IVolumeProfile {
  /** Point of control: centre of the price bin with the most volume */
  poc: number;
  totalVolume: number;
  distribution: VolumeDistribution;
}

/**
 * Constructor parameters shared by the indicator backends.
 */
export interface IIndicatorParams {
  logger: ILogger;
}

/**
 * Raw numeric readings of one candle series, before classification.
 * A `null` entry marks an indicator that could not be computed.
 */
export interface IIndicatorValues {
  currentPrice: number;
  rsi: {
    value: number;
    /** RSI two bars earlier */
    previous: number | null;
  } | null;
  macd: {
    macd: number;
    signal: number;
    histogram: number;
    previousHistogram: number | null;
  } | null;
  bollinger: {
    upper: number;
    middle: number;
    lower: number;
    /** Band widths `upper - lower`, oldest first, current last */
    widths: number[];
  } | null;
  obv: {
    value: number;
    /** OBV `CC_OBV_TREND_LOOKBACK` bars earlier */
    previous: number;
  } | null;
  sma20: number | null;
  sma50: number | null;
  levels: IKeyLevels;
  volumeProfile: IVolumeProfile | null;
}
