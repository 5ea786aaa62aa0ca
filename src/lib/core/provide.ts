import LoggerService from "../services/base/LoggerService";
import ExecutionContextService from "../services/context/ExecutionContextService";
import IndicatorConnectionService from "../services/connection/IndicatorConnectionService";
import ExchangeConnectionService from "../services/connection/ExchangeConnectionService";
import ExchangeSchemaService from "../services/schema/ExchangeSchemaService";
import ContextSchemaService from "../services/schema/ContextSchemaService";
import NotifierSchemaService from "../services/schema/NotifierSchemaService";
import IndicatorMathService from "../services/math/IndicatorMathService";
import ConditionMathService from "../services/math/ConditionMathService";
import TrendMathService from "../services/math/TrendMathService";
import TradeLevelMathService from "../services/math/TradeLevelMathService";
import TimeframeLogicService from "../services/logic/TimeframeLogicService";
import MarketLogicService from "../services/logic/MarketLogicService";
import MarketDataGlobalService from "../services/global/MarketDataGlobalService";
import MarketContextGlobalService from "../services/global/MarketContextGlobalService";
import NotifierGlobalService from "../services/global/NotifierGlobalService";
import ReportMarkdownService from "../services/markdown/ReportMarkdownService";
import ConfigValidationService from "../services/validation/ConfigValidationService";
import { provide } from "./di";
import TYPES from "./types";

{
    provide(TYPES.loggerService, () => new LoggerService());
}

{
    provide(TYPES.executionContextService, () => new ExecutionContextService());
}

{
    provide(TYPES.indicatorConnectionService, () => new IndicatorConnectionService());
    provide(TYPES.exchangeConnectionService, () => new ExchangeConnectionService());
}

{
    provide(TYPES.exchangeSchemaService, () => new ExchangeSchemaService());
    provide(TYPES.contextSchemaService, () => new ContextSchemaService());
    provide(TYPES.notifierSchemaService, () => new NotifierSchemaService());
}

{
    provide(TYPES.indicatorMathService, () => new IndicatorMathService());
    provide(TYPES.conditionMathService, () => new ConditionMathService());
    provide(TYPES.trendMathService, () => new TrendMathService());
    provide(TYPES.tradeLevelMathService, () => new TradeLevelMathService());
}

{
    provide(TYPES.timeframeLogicService, () => new TimeframeLogicService());
    provide(TYPES.marketLogicService, () => new MarketLogicService());
}

{
    provide(TYPES.marketDataGlobalService, () => new MarketDataGlobalService());
    provide(TYPES.marketContextGlobalService, () => new MarketContextGlobalService());
    provide(TYPES.notifierGlobalService, () => new NotifierGlobalService());
}

{
    provide(TYPES.reportMarkdownService, () => new ReportMarkdownService());
}

{
    provide(TYPES.configValidationService, () => new ConfigValidationService());
}
