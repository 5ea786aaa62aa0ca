import { ITimeframeAnalysis } from "../interfaces/Analysis.interface";
import { ColumnModel } from "../model/Column.model";
import { formatPrice } from "../helpers/formatNumber";

export const signal_columns: ColumnModel<ITimeframeAnalysis>[] = [
  {
    key: "timeframe",
    label: "Timeframe",
    format: (data) => data.timeframe,
    isVisible: () => true,
  },
  {
    key: "currentPrice",
    label: "Price",
    format: (data) => formatPrice(data.currentPrice),
    isVisible: () => true,
  },
  {
    key: "trend",
    label: "Trend",
    format: (data) => data.trend,
    isVisible: () => true,
  },
  {
    key: "confidence",
    label: "Confidence",
    format: (data) => `${data.confidence.toFixed(0)}%`,
    isVisible: () => true,
  },
  {
    key: "rsi",
    label: "RSI",
    format: ({ indicators: { rsi } }) =>
      rsi ? `${rsi.value.toFixed(1)} (${rsi.condition}, ${rsi.trend})` : "N/A",
    isVisible: () => true,
  },
  {
    key: "macd",
    label: "MACD",
    format: ({ indicators: { macd } }) =>
      macd
        ? macd.crossover === "none"
          ? macd.condition
          : `${macd.condition}, ${macd.crossover}`
        : "N/A",
    isVisible: () => true,
  },
  {
    key: "bollinger",
    label: "Bollinger",
    format: ({ indicators: { bollinger } }) =>
      bollinger
        ? `${bollinger.position}${bollinger.squeeze ? ", squeeze" : ""}`
        : "N/A",
    isVisible: () => true,
  },
  {
    key: "obv",
    label: "OBV",
    format: ({ indicators: { obv } }) => (obv ? obv.trend : "N/A"),
    isVisible: () => true,
  },
  {
    key: "volumeProfile",
    label: "Volume Profile",
    format: ({ indicators: { volumeProfile } }) =>
      volumeProfile
        ? `POC ${formatPrice(volumeProfile.poc)} (${volumeProfile.distribution})`
        : "N/A",
    isVisible: () => true,
  },
  {
    key: "action",
    label: "Action",
    format: (data) => data.action,
    isVisible: () => true,
  },
];
