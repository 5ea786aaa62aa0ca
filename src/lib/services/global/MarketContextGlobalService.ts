import { errorData } from "functools-kit";
import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import ContextSchemaService from "../schema/ContextSchemaService";
import {
  ContextName,
  IMarketContext,
} from "../../../interfaces/Context.interface";
import { ITicker } from "../../../interfaces/Exchange.interface";
import { GLOBAL_CONFIG } from "../../../config/params";
import { isUnsafe } from "../../../utils/isUnsafe";
import clamp from "../../../utils/clamp";

const DEFAULT_CONTEXT_NAME = "default";

const NEUTRAL_CONTEXT: IMarketContext = {
  marketSentiment: "neutral",
  sentimentStrength: 0.5,
  change24h: null,
  volume24h: null,
  source: DEFAULT_CONTEXT_NAME,
};

/**
 * Market mood from the 24h change of a symbol.
 */
export class MarketContextGlobalService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);
  private readonly contextSchemaService = inject<ContextSchemaService>(
    TYPES.contextSchemaService
  );

  /**
   * Bullish above `+CC_MARKET_CONTEXT_THRESHOLD_PERCENT`, bearish below its
   * negative, neutral otherwise. Strength is `|change| / 10`, capped at 1.
   */
  public deriveMarketContext = (
    change24h: number,
    volume24h: number | null,
    source: ContextName = DEFAULT_CONTEXT_NAME
  ): IMarketContext => {
    this.loggerService.log("marketContextGlobalService deriveMarketContext", {
      change24h,
      volume24h,
      source,
    });
    if (isUnsafe(change24h)) {
      return { ...NEUTRAL_CONTEXT, source };
    }
    const threshold = GLOBAL_CONFIG.CC_MARKET_CONTEXT_THRESHOLD_PERCENT;
    return {
      marketSentiment:
        change24h > threshold
          ? "bullish"
          : change24h < -threshold
          ? "bearish"
          : "neutral",
      sentimentStrength: clamp(Math.abs(change24h) / 10, 0, 1),
      change24h,
      volume24h,
      source,
    };
  };

  /**
   * Asks registered context sources in order, then the ticker, and falls
   * back to a neutral context.
   */
  public getMarketContext = async (
    symbol: string,
    ticker: ITicker | null = null
  ): Promise<IMarketContext> => {
    this.loggerService.log("marketContextGlobalService getMarketContext", {
      symbol,
    });
    for (const { contextName, getMarketContext } of this.contextSchemaService.list()) {
      try {
        const { change24h, volume24h } = await getMarketContext(symbol);
        return this.deriveMarketContext(change24h, volume24h, contextName);
      } catch (error) {
        this.loggerService.warn(
          "marketContextGlobalService getMarketContext source failed",
          {
            contextName,
            symbol,
            error: errorData(error),
          }
        );
      }
    }
    if (ticker) {
      return this.deriveMarketContext(
        ticker.change24h,
        ticker.volume24h,
        ticker.source
      );
    }
    return { ...NEUTRAL_CONTEXT };
  };
}

export default MarketContextGlobalService;
