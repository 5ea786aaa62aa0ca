import { fetchApi } from "functools-kit";
import { addContext } from "../function/add";
import { GLOBAL_CONFIG } from "../config/params";
import { isUnsafe } from "../utils/isUnsafe";

const DEFAULT_COIN_ID = "ethereum";

const COIN_ID_MAP: Record<string, string> = {
  ETH: "ethereum",
  BTC: "bitcoin",
  SOL: "solana",
};

interface ICoinGeckoPrice {
  usd?: number;
  usd_24h_change?: number;
  usd_24h_vol?: number;
}

/**
 * CoinGecko coin id for the base asset of a symbol.
 *
 * @example
 * ```typescript
 * getCoinId("BTC/USDT") // "bitcoin"
 * getCoinId("DOGE/USDT") // "ethereum"
 * ```
 */
export const getCoinId = (symbol: string) => {
  const [base] = symbol.toUpperCase().split("/");
  return COIN_ID_MAP[base] ?? DEFAULT_COIN_ID;
};

const GET_MARKET_CONTEXT_FN = async (symbol: string) => {
  const coinId = getCoinId(symbol);
  const url = new URL(`${GLOBAL_CONFIG.CC_COINGECKO_URL}/simple/price`);
  url.searchParams.set("ids", coinId);
  url.searchParams.set("vs_currencies", "usd");
  url.searchParams.set("include_24hr_change", "true");
  url.searchParams.set("include_24hr_vol", "true");
  const response: Record<string, ICoinGeckoPrice | undefined> = await fetchApi(
    url.toString()
  );
  const price = response[coinId];
  if (!price || isUnsafe(price.usd_24h_change)) {
    throw new Error(`coingecko: no 24h change for id=${coinId}`);
  }
  return {
    change24h: Number(price.usd_24h_change),
    volume24h: Number(price.usd_24h_vol ?? 0),
  };
};

/**
 * Registers CoinGecko as the market context source.
 */
export const addCoinGeckoContext = () => {
  addContext({
    contextName: "coingecko",
    note: "CoinGecko simple price with 24h change",
    getMarketContext: GET_MARKET_CONTEXT_FN,
  });
};

export default addCoinGeckoContext;
