import { ICandleData } from "../interfaces/Exchange.interface";
import { IVolumeProfile } from "../interfaces/Indicator.interface";

/**
 * Volume traded per close-price bin, reduced to its point of control.
 *
 * Closes are spread over `bins` equal-width bins between the lowest and the
 * highest close. Returns `null` for an empty series.
 */
export const computeVolumeProfile = (
  candles: ICandleData[],
  price: number,
  bins: number,
  balancePercent: number
): IVolumeProfile | null => {
  if (!candles.length || bins < 1) {
    return null;
  }
  const closes = candles.map(({ close }) => close);
  const min = Math.min(...closes);
  const max = Math.max(...closes);
  const width = (max - min) / bins;

  const volumes = new Array<number>(bins).fill(0);
  let totalVolume = 0;
  for (const { close, volume } of candles) {
    const idx = width > 0 ? Math.min(Math.floor((close - min) / width), bins - 1) : 0;
    volumes[idx] += volume;
    totalVolume += volume;
  }

  let pocIdx = 0;
  volumes.forEach((volume, idx) => {
    if (volume > volumes[pocIdx]) {
      pocIdx = idx;
    }
  });

  const poc = width > 0 ? min + (pocIdx + 0.5) * width : min;
  const distance = price > 0 ? (Math.abs(poc - price) / price) * 100 : Infinity;

  return {
    poc,
    totalVolume,
    distribution: distance < balancePercent ? "balanced" : "skewed",
  };
};

export default computeVolumeProfile;
