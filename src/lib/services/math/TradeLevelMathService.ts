import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import {
  ITradeLevels,
  TradeAction,
  TradeHorizon,
} from "../../../interfaces/Analysis.interface";
import { GLOBAL_CONFIG } from "../../../config/params";
import { isUnsafe } from "../../../utils/isUnsafe";

const GET_OFFSETS_FN = (horizon: TradeHorizon) =>
  horizon === "intraday"
    ? {
        stop: GLOBAL_CONFIG.CC_INTRADAY_STOP_PERCENT,
        target: GLOBAL_CONFIG.CC_INTRADAY_TARGET_PERCENT,
      }
    : {
        stop: GLOBAL_CONFIG.CC_SWING_STOP_PERCENT,
        target: GLOBAL_CONFIG.CC_SWING_TARGET_PERCENT,
      };

/**
 * Entry, stop-loss and take-profit from fixed percentage offsets.
 *
 * BUY places the stop below and the target above the entry. SELL and HOLD
 * mirror it. The anchor close falls back to `CC_PLACEHOLDER_PRICE` when it
 * is zero, negative or missing.
 */
export class TradeLevelMathService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  public getTradeLevels = (
    price: number | null | undefined,
    action: TradeAction,
    horizon: TradeHorizon
  ): ITradeLevels => {
    this.loggerService.log("tradeLevelMathService getTradeLevels", {
      price,
      action,
      horizon,
    });
    const entry =
      typeof price === "number" && !isUnsafe(price) && price > 0
        ? price
        : GLOBAL_CONFIG.CC_PLACEHOLDER_PRICE;
    const { stop, target } = GET_OFFSETS_FN(horizon);
    const direction = action === "BUY" ? 1 : -1;
    const stopLoss = entry * (1 - (direction * stop) / 100);
    const takeProfit = entry * (1 + (direction * target) / 100);
    const risk = Math.abs(stopLoss - entry);
    return {
      horizon,
      action,
      entry,
      stopLoss,
      takeProfit,
      riskReward: risk === 0 ? 1 : Math.abs(takeProfit - entry) / risk,
    };
  };
}

export default TradeLevelMathService;
