import { ICandleData } from "../interfaces/Exchange.interface";

export const START_TIMESTAMP = 1_700_000_000_000;
export const FIFTEEN_MINUTES = 900_000;

/**
 * Closes produced by repeating `steps` from `start`.
 */
export const buildCloses = (
  steps: number[],
  length: number,
  start = 100
): number[] => {
  const closes = [start];
  for (let i = 1; i < length; i++) {
    closes.push(closes[i - 1] + steps[(i - 1) % steps.length]);
  }
  return closes;
};

/**
 * Candles around the given closes: high and low half a point away, volume
 * cycling through 100, 110, 120, 130, 140.
 */
export const buildCandles = (
  closes: number[],
  step = FIFTEEN_MINUTES
): ICandleData[] =>
  closes.map((close, idx) => ({
    timestamp: START_TIMESTAMP + idx * step,
    open: close,
    high: close + 0.5,
    low: close - 0.5,
    close,
    volume: 100 + (idx % 5) * 10,
  }));

export const UPTREND_STEPS = [2, -1, 1, -1, 2, -1];
export const DOWNTREND_STEPS = [-3, 1, -2, 2, -4, 1];

export const uptrendCandles = (length = 80) =>
  buildCandles(buildCloses(UPTREND_STEPS, length));

export const downtrendCandles = (length = 80) =>
  buildCandles(buildCloses(DOWNTREND_STEPS, length));

export const flatCandles = (length = 60) =>
  buildCandles(new Array<number>(length).fill(100));
