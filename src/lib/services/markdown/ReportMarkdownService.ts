import { inject } from "../../core/di";
import LoggerService from "../base/LoggerService";
import TYPES from "../../core/types";
import {
  IMarketAnalysis,
  ITimeframeAnalysis,
  ITradeLevels,
} from "../../../interfaces/Analysis.interface";
import { ITicker } from "../../../interfaces/Exchange.interface";
import { ColumnModel } from "../../../model/Column.model";
import { trade_columns } from "../../../assets/trade.columns";
import { signal_columns } from "../../../assets/signal.columns";
import { GLOBAL_CONFIG } from "../../../config/params";
import {
  formatPercent,
  formatPrice,
  formatVolume,
} from "../../../helpers/formatNumber";

export type TradeColumns = ColumnModel<ITradeLevels>;
export type SignalColumns = ColumnModel<ITimeframeAnalysis>;

const RENDER_TABLE_FN = async <T extends object>(
  columns: ColumnModel<T>[],
  rows: T[]
): Promise<string> => {
  const visibleColumns: ColumnModel<T>[] = [];
  for (const col of columns) {
    if (await col.isVisible()) {
      visibleColumns.push(col);
    }
  }
  const header = visibleColumns.map((col) => col.label);
  const separator = visibleColumns.map(() => "---");
  const cells = await Promise.all(
    rows.map(async (row, index) =>
      Promise.all(visibleColumns.map((col) => col.format(row, index)))
    )
  );
  return [header, separator, ...cells]
    .map((row) => `| ${row.join(" | ")} |`)
    .join("\n");
};

/**
 * Renders an IMarketAnalysis as a markdown report.
 */
export class ReportMarkdownService {
  private readonly loggerService = inject<LoggerService>(TYPES.loggerService);

  private getAnchorSection = (analysis: IMarketAnalysis): string[] => {
    const { anchor } = analysis;
    if (!anchor) {
      return ["## Latest Completed Candle", "", "*No completed candle*"];
    }
    return [
      "## Latest Completed Candle",
      "",
      `> ${new Date(anchor.timestamp).toISOString()}`,
      "",
      "| Open | High | Low | Close | Volume |",
      "| --- | --- | --- | --- | --- |",
      `| ${formatPrice(anchor.open)} | ${formatPrice(anchor.high)} | ${formatPrice(anchor.low)} | ${formatPrice(anchor.close)} | ${formatVolume(anchor.volume)} |`,
    ];
  };

  private getLevelSection = (analysis: IMarketAnalysis): string[] => {
    const lines = ["## Key Levels"];
    for (const [timeframe, result] of Object.entries(analysis.timeframes)) {
      lines.push("", `### ${timeframe}`);
      if (!result || result.status !== "ok") {
        lines.push("- None identified");
        continue;
      }
      const { support, resistance, strength } = result.indicators.levels;
      lines.push(
        `- Resistance: ${resistance.map(formatPrice).join(", ")}`,
        `- Support: ${support.map(formatPrice).join(", ")}`,
        `- Strength: ${strength}`
      );
    }
    return lines;
  };

  private getSignalSection = async (
    analysis: IMarketAnalysis,
    columns: SignalColumns[]
  ): Promise<string[]> => {
    const rows: ITimeframeAnalysis[] = [];
    const errors: string[] = [];
    for (const result of Object.values(analysis.timeframes)) {
      if (!result) {
        continue;
      }
      if (result.status === "ok") {
        rows.push(result);
      } else {
        errors.push(`- ${result.timeframe}: ${result.error}`);
      }
    }
    const lines = ["## Technical Signals", ""];
    if (rows.length) {
      lines.push(await RENDER_TABLE_FN(columns, rows));
    } else {
      lines.push("*No timeframe could be analysed*");
    }
    if (errors.length) {
      lines.push("", "**Failed timeframes:**", ...errors);
    }
    return lines;
  };

  private getContextSection = (
    analysis: IMarketAnalysis,
    ticker: ITicker | null
  ): string[] => {
    const lines = ["## Market Context", ""];
    const { context } = analysis;
    if (context) {
      lines.push(
        `- Sentiment: ${context.marketSentiment} (strength ${context.sentimentStrength.toFixed(2)})`
      );
      context.change24h !== null &&
        lines.push(`- 24h change: ${formatPercent(context.change24h)}`);
      context.volume24h !== null &&
        lines.push(`- 24h volume: ${formatVolume(context.volume24h)}`);
      lines.push(`- Source: ${context.source}`);
    } else {
      lines.push("- Sentiment: unknown");
    }
    if (ticker) {
      lines.push(
        `- Last price: ${formatPrice(ticker.price)} (${ticker.source})`,
        `- 24h range: ${formatPrice(ticker.low24h)} - ${formatPrice(ticker.high24h)}`
      );
    }
    return lines;
  };

  public getReport = async (
    analysis: IMarketAnalysis,
    ticker: ITicker | null = null,
    tradeColumns: TradeColumns[] = trade_columns,
    signalColumns: SignalColumns[] = signal_columns
  ): Promise<string> => {
    this.loggerService.log("reportMarkdownService getReport", {
      symbol: analysis.symbol,
    });
    const tradeTable = await RENDER_TABLE_FN(tradeColumns, [
      analysis.tradeLevels.intraday,
      analysis.tradeLevels.swing,
    ]);
    return [
      `# Market Analysis: ${analysis.symbol}`,
      `> Generated: ${analysis.when.toISOString()}`,
      "",
      ...this.getAnchorSection(analysis),
      "",
      "## Trading Matrix",
      "",
      tradeTable,
      "",
      ...this.getLevelSection(analysis),
      "",
      ...(await this.getSignalSection(analysis, signalColumns)),
      "",
      "## Sentiment",
      "",
      `- Short-term: ${analysis.sentiment.shortTerm.toFixed(2)}`,
      `- Long-term: ${analysis.sentiment.longTerm.toFixed(2)}`,
      "",
      ...this.getContextSection(analysis, ticker),
      "",
      "## Risk Management",
      "",
      `- Max risk per trade: ${GLOBAL_CONFIG.CC_MAX_RISK_PER_TRADE}%`,
      `- Intraday leverage: ${GLOBAL_CONFIG.CC_INTRADAY_LEVERAGE}x`,
      `- Swing leverage: ${GLOBAL_CONFIG.CC_SWING_LEVERAGE}x`,
    ].join("\n");
  };
}

export default ReportMarkdownService;
