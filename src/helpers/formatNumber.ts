/**
 * Price with two decimals, or six below 1.
 */
export const formatPrice = (value: number) =>
  Math.abs(value) >= 1 ? value.toFixed(2) : value.toFixed(6);

/**
 * Signed percentage with two decimals, e.g. `+3.50%`.
 */
export const formatPercent = (value: number) =>
  `${value >= 0 ? "+" : ""}${value.toFixed(2)}%`;

export const formatVolume = (value: number) =>
  Math.round(value).toLocaleString("en-US");
