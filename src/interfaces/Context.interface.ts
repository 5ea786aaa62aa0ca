export type MarketSentiment = "bullish" | "bearish" | "neutral";

/**
 * Broad market mood for a symbol, derived from its 24h change.
 */
export interface IMarketContext {
  marketSentiment: MarketSentiment;
  /** 0..1 */
  sentimentStrength: number;
  change24h: number | null;
  volume24h: number | null;
  source: ContextName;
}

/**
 * Market context source registered via addContext().
 */
export interface IContextSchema {
  contextName: ContextName;
  note?: string;
  getMarketContext: (symbol: string) => Promise<{
    change24h: number;
    volume24h: number;
  }>;
}

export type ContextName = string;
