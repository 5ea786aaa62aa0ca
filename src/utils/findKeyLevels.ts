import { ICandleData } from "../interfaces/Exchange.interface";
import { IKeyLevels } from "../interfaces/Indicator.interface";

interface IKeyLevelParams {
  /** Width of the centered pivot window */
  window: number;
  /** Most recent pivots kept per side */
  maxLevels: number;
  /** Pivots within this distance of the price are ignored (percent) */
  minDistancePercent: number;
  /** Distance of the synthetic level used when a side is empty (percent) */
  fallbackPercent: number;
}

/**
 * Indices whose value equals the extreme of the centered window around them.
 * Indices without a complete window are never pivots.
 */
const FIND_PIVOTS_FN = (
  values: number[],
  window: number,
  pick: (a: number, b: number) => number
): number[] => {
  const before = Math.floor(window / 2);
  const after = window - before - 1;
  const pivots: number[] = [];
  for (let i = before; i + after < values.length; i++) {
    let extreme = values[i - before];
    for (let j = i - before + 1; j <= i + after; j++) {
      extreme = pick(extreme, values[j]);
    }
    if (values[i] === extreme) {
      pivots.push(values[i]);
    }
  }
  return pivots;
};

/**
 * Keeps the most recent distinct values, returned ascending.
 */
const TAKE_RECENT_FN = (values: number[], limit: number): number[] => {
  const result: number[] = [];
  for (let i = values.length - 1; i >= 0 && result.length < limit; i--) {
    if (!result.includes(values[i])) {
      result.push(values[i]);
    }
  }
  return result.sort((a, b) => a - b);
};

/**
 * Pivot based support and resistance around `price`.
 *
 * A side without a qualifying pivot gets one synthetic level at
 * `price ± fallbackPercent`, which does not count towards `strength`.
 */
export const findKeyLevels = (
  candles: ICandleData[],
  price: number,
  {
    window,
    maxLevels,
    minDistancePercent,
    fallbackPercent,
  }: IKeyLevelParams
): IKeyLevels => {
  const highs = candles.map(({ high }) => high);
  const lows = candles.map(({ low }) => low);

  const upperBound = price * (1 + minDistancePercent / 100);
  const lowerBound = price * (1 - minDistancePercent / 100);

  const resistance = TAKE_RECENT_FN(
    FIND_PIVOTS_FN(highs, window, Math.max).filter((high) => high > upperBound),
    maxLevels
  );
  const support = TAKE_RECENT_FN(
    FIND_PIVOTS_FN(lows, window, Math.min).filter((low) => low < lowerBound),
    maxLevels
  );

  const strength = resistance.length + support.length;

  return {
    support: support.length
      ? support
      : [price * (1 - fallbackPercent / 100)],
    resistance: resistance.length
      ? resistance
      : [price * (1 + fallbackPercent / 100)],
    strength,
  };
};

export default findKeyLevels;
