import { ICandleData } from "../interfaces/Exchange.interface";

/**
 * On-Balance Volume as a single fold over the candles.
 *
 * The first candle seeds the total with its own volume. Later candles add
 * their volume on a higher close, subtract it on a lower close and leave the
 * total unchanged on an equal close.
 */
export const computeObv = (candles: ICandleData[]): number[] =>
  candles.reduce<number[]>((acc, candle, idx) => {
    if (idx === 0) {
      return [candle.volume];
    }
    const prevObv = acc[idx - 1];
    const prevClose = candles[idx - 1].close;
    if (candle.close > prevClose) {
      acc.push(prevObv + candle.volume);
    } else if (candle.close < prevClose) {
      acc.push(prevObv - candle.volume);
    } else {
      acc.push(prevObv);
    }
    return acc;
  }, []);

export default computeObv;
