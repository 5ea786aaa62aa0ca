import { getErrorMessage } from "functools-kit";
import { DEFAULT_CONFIG, GLOBAL_CONFIG, GlobalConfig } from "../config/params";
import { ILogger } from "../interfaces/Logger.interface";
import market from "../lib";

/**
 * Sets custom logger implementation.
 *
 * Messages are forwarded with the execution context (symbol, timeframe, when)
 * appended when one is active.
 *
 * @example
 * ```typescript
 * setLogger({
 *   log: (topic, ...args) => console.log(topic, args),
 *   debug: (topic, ...args) => console.debug(topic, args),
 *   info: (topic, ...args) => console.info(topic, args),
 *   warn: (topic, ...args) => console.warn(topic, args),
 * });
 * ```
 */
export function setLogger(logger: ILogger) {
  market.loggerService.setLogger(logger);
}

/**
 * Overrides global configuration parameters.
 *
 * The change is validated and rolled back when invalid.
 *
 * @param config - Partial configuration object to override default settings
 * @param _unsafe - Skip config validations - required for testbed
 * @throws Error listing every invalid parameter
 *
 * @example
 * ```typescript
 * setConfig({
 *   CC_INDICATOR_BACKEND: "formula",
 *   CC_ANALYSIS_INTERVAL_MINUTES: 30,
 * });
 * ```
 */
export function setConfig(config: Partial<GlobalConfig>, _unsafe?: boolean) {
  const prevConfig = Object.assign({}, GLOBAL_CONFIG);
  try {
    Object.assign(GLOBAL_CONFIG, config);
    !_unsafe && market.configValidationService.validate();
  } catch (error) {
    market.loggerService.warn(
      `setConfig failed: ${getErrorMessage(error)}`,
      config
    );
    Object.assign(GLOBAL_CONFIG, prevConfig);
    throw error;
  }
}

/**
 * Shallow copy of the current global configuration.
 */
export function getConfig(): GlobalConfig {
  return Object.assign({}, GLOBAL_CONFIG);
}

/**
 * Frozen configuration defaults.
 */
export function getDefaultConfig(): Readonly<GlobalConfig> {
  return DEFAULT_CONFIG;
}
