const baseServices = {
    loggerService: Symbol('loggerService'),
};

const contextServices = {
    executionContextService: Symbol('executionContextService'),
};

const connectionServices = {
    indicatorConnectionService: Symbol('indicatorConnectionService'),
    exchangeConnectionService: Symbol('exchangeConnectionService'),
};

const schemaServices = {
    exchangeSchemaService: Symbol('exchangeSchemaService'),
    contextSchemaService: Symbol('contextSchemaService'),
    notifierSchemaService: Symbol('notifierSchemaService'),
};

const mathServices = {
    indicatorMathService: Symbol('indicatorMathService'),
    conditionMathService: Symbol('conditionMathService'),
    trendMathService: Symbol('trendMathService'),
    tradeLevelMathService: Symbol('tradeLevelMathService'),
};

const logicServices = {
    timeframeLogicService: Symbol('timeframeLogicService'),
    marketLogicService: Symbol('marketLogicService'),
};

const globalServices = {
    marketDataGlobalService: Symbol('marketDataGlobalService'),
    marketContextGlobalService: Symbol('marketContextGlobalService'),
    notifierGlobalService: Symbol('notifierGlobalService'),
};

const markdownServices = {
    reportMarkdownService: Symbol('reportMarkdownService'),
};

const validationServices = {
    configValidationService: Symbol('configValidationService'),
};

export const TYPES = {
    ...baseServices,
    ...contextServices,
    ...connectionServices,
    ...schemaServices,
    ...mathServices,
    ...logicServices,
    ...globalServices,
    ...markdownServices,
    ...validationServices,
}

export default TYPES;
