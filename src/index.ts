export {
  setLogger,
  setConfig,
  getConfig,
  getDefaultConfig,
} from "./function/setup";
export { addExchange, addContext, addNotifier } from "./function/add";
export {
  listenAnalysis,
  listenReport,
  listenReportOnce,
  listenError,
  listenExit,
  listenDone,
  listenDoneOnce,
} from "./function/event";
export {
  analyzeMarket,
  analyzeTimeframe,
  getIndicators,
  getTradeLevels,
  getAnchorCandle,
  deriveMarketContext,
  getMarketData,
  getReport,
} from "./function/analyze";

export {
  CandleInterval,
  ICandleData,
  ITicker,
  IExchangeSchema,
  IExchangeCallbacks,
  IMarketData,
  ExchangeName,
} from "./interfaces/Exchange.interface";
export {
  IMarketContext,
  IContextSchema,
  MarketSentiment,
  ContextName,
} from "./interfaces/Context.interface";
export { INotifierSchema, NotifierName } from "./interfaces/Notifier.interface";
export {
  IIndicatorBackend,
  IIndicatorValues,
  IKeyLevels,
  IVolumeProfile,
  IndicatorBackendName,
} from "./interfaces/Indicator.interface";
export {
  RsiCondition,
  RsiTrend,
  MacdCondition,
  MacdCrossover,
  BollingerPosition,
  ObvTrend,
  TrendLabel,
  TradeAction,
  TradeHorizon,
  IIndicatorSnapshot,
  ITimeframeAnalysis,
  ITimeframeError,
  TimeframeResult,
  ITradeLevels,
  IMarketAnalysisInput,
  IMarketAnalysis,
} from "./interfaces/Analysis.interface";
export { ILogger } from "./interfaces/Logger.interface";
export { ReportContract } from "./contract/Report.contract";
export { DoneContract } from "./contract/Done.contract";
export { ColumnModel } from "./model/Column.model";

export { InsufficientDataError } from "./errors/InsufficientDataError";
export { ComputationError } from "./errors/ComputationError";
export { EmptyInputError } from "./errors/EmptyInputError";

export { Monitor, IMonitorResult } from "./classes/Monitor";
export { addCcxtExchanges } from "./helpers/addCcxtExchanges";
export { addCoinGeckoContext } from "./helpers/addCoinGeckoContext";
export { addTelegramNotifier } from "./helpers/addTelegramNotifier";
export { handler } from "./config/router";

export { market as lib } from "./lib";
