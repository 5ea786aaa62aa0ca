import { scoped } from "di-scoped";
import { CandleInterval } from "../../../interfaces/Exchange.interface";

/**
 * Context of the analysis currently running.
 *
 * Propagated implicitly so log records carry the symbol and timeframe
 * without threading them through every call.
 */
export interface IExecutionContext {
  /** Trading pair symbol (e.g., "ETH/USDT") */
  symbol: string;
  /** Timeframe being analysed, `null` for market-wide steps */
  timeframe: CandleInterval | null;
  /** Timestamp of the analysis cycle */
  when: Date;
}

/**
 * Scoped service for execution context propagation.
 *
 * @example
 * ```typescript
 * ExecutionContextService.runInContext(
 *   () => market.timeframeLogicService.analyzeTimeframe("1h", candles),
 *   { symbol: "ETH/USDT", timeframe: "1h", when: new Date() }
 * );
 * ```
 */
export const ExecutionContextService = scoped(
  class {
    constructor(readonly context: IExecutionContext) {}
  }
);

export type TExecutionContextService = InstanceType<
  typeof ExecutionContextService
>;

export default ExecutionContextService;
