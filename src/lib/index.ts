import "./core/provide";
import { inject, init } from "./core/di";
import TYPES from "./core/types";
import LoggerService from "./services/base/LoggerService";
import { TExecutionContextService } from "./services/context/ExecutionContextService";
import IndicatorConnectionService from "./services/connection/IndicatorConnectionService";
import ExchangeConnectionService from "./services/connection/ExchangeConnectionService";
import ExchangeSchemaService from "./services/schema/ExchangeSchemaService";
import ContextSchemaService from "./services/schema/ContextSchemaService";
import NotifierSchemaService from "./services/schema/NotifierSchemaService";
import IndicatorMathService from "./services/math/IndicatorMathService";
import ConditionMathService from "./services/math/ConditionMathService";
import TrendMathService from "./services/math/TrendMathService";
import TradeLevelMathService from "./services/math/TradeLevelMathService";
import TimeframeLogicService from "./services/logic/TimeframeLogicService";
import MarketLogicService from "./services/logic/MarketLogicService";
import MarketDataGlobalService from "./services/global/MarketDataGlobalService";
import MarketContextGlobalService from "./services/global/MarketContextGlobalService";
import NotifierGlobalService from "./services/global/NotifierGlobalService";
import ReportMarkdownService from "./services/markdown/ReportMarkdownService";
import ConfigValidationService from "./services/validation/ConfigValidationService";

const baseServices = {
  loggerService: inject<LoggerService>(TYPES.loggerService),
};

const contextServices = {
  executionContextService: inject<TExecutionContextService>(
    TYPES.executionContextService
  ),
};

const connectionServices = {
  indicatorConnectionService: inject<IndicatorConnectionService>(
    TYPES.indicatorConnectionService
  ),
  exchangeConnectionService: inject<ExchangeConnectionService>(
    TYPES.exchangeConnectionService
  ),
};

const schemaServices = {
  exchangeSchemaService: inject<ExchangeSchemaService>(
    TYPES.exchangeSchemaService
  ),
  contextSchemaService: inject<ContextSchemaService>(
    TYPES.contextSchemaService
  ),
  notifierSchemaService: inject<NotifierSchemaService>(
    TYPES.notifierSchemaService
  ),
};

const mathServices = {
  indicatorMathService: inject<IndicatorMathService>(
    TYPES.indicatorMathService
  ),
  conditionMathService: inject<ConditionMathService>(
    TYPES.conditionMathService
  ),
  trendMathService: inject<TrendMathService>(TYPES.trendMathService),
  tradeLevelMathService: inject<TradeLevelMathService>(
    TYPES.tradeLevelMathService
  ),
};

const logicServices = {
  timeframeLogicService: inject<TimeframeLogicService>(
    TYPES.timeframeLogicService
  ),
  marketLogicService: inject<MarketLogicService>(TYPES.marketLogicService),
};

const globalServices = {
  marketDataGlobalService: inject<MarketDataGlobalService>(
    TYPES.marketDataGlobalService
  ),
  marketContextGlobalService: inject<MarketContextGlobalService>(
    TYPES.marketContextGlobalService
  ),
  notifierGlobalService: inject<NotifierGlobalService>(
    TYPES.notifierGlobalService
  ),
};

const markdownServices = {
  reportMarkdownService: inject<ReportMarkdownService>(
    TYPES.reportMarkdownService
  ),
};

const validationServices = {
  configValidationService: inject<ConfigValidationService>(
    TYPES.configValidationService
  ),
};

export const market = {
  ...baseServices,
  ...contextServices,
  ...connectionServices,
  ...schemaServices,
  ...mathServices,
  ...logicServices,
  ...globalServices,
  ...markdownServices,
  ...validationServices,
};

init();

export default market;
