/**
 * Upper-cases a symbol and quotes it in USDT when no quote is given.
 *
 * @example
 * ```typescript
 * normalizeSymbol("eth") // "ETH/USDT"
 * normalizeSymbol("btc/eur") // "BTC/EUR"
 * ```
 */
export const normalizeSymbol = (symbol: string) => {
  const value = symbol.trim().toUpperCase();
  return value.includes("/") ? value : `${value}/USDT`;
};

export default normalizeSymbol;
