import { ITradeLevels } from "../interfaces/Analysis.interface";
import { ColumnModel } from "../model/Column.model";
import { GLOBAL_CONFIG } from "../config/params";
import { formatPrice } from "../helpers/formatNumber";

export const trade_columns: ColumnModel<ITradeLevels>[] = [
  {
    key: "horizon",
    label: "Horizon",
    format: (data) => (data.horizon === "intraday" ? "Intraday" : "Swing"),
    isVisible: () => true,
  },
  {
    key: "action",
    label: "Action",
    format: (data) => data.action,
    isVisible: () => true,
  },
  {
    key: "entry",
    label: "Entry",
    format: (data) => formatPrice(data.entry),
    isVisible: () => true,
  },
  {
    key: "stopLoss",
    label: "Stop Loss",
    format: (data) => formatPrice(data.stopLoss),
    isVisible: () => true,
  },
  {
    key: "takeProfit",
    label: "Take Profit",
    format: (data) => formatPrice(data.takeProfit),
    isVisible: () => true,
  },
  {
    key: "riskReward",
    label: "R:R",
    format: (data) => `1:${data.riskReward.toFixed(1)}`,
    isVisible: () => true,
  },
  {
    key: "leverage",
    label: "Leverage",
    format: (data) =>
      `${
        data.horizon === "intraday"
          ? GLOBAL_CONFIG.CC_INTRADAY_LEVERAGE
          : GLOBAL_CONFIG.CC_SWING_LEVERAGE
      }x`,
    isVisible: () => true,
  },
];
