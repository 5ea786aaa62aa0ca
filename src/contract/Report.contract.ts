import { IMarketAnalysis } from "../interfaces/Analysis.interface";

/**
 * Payload of `reportEmitter`.
 */
export interface ReportContract {
  symbol: string;
  /** How the cycle was started */
  type: "scheduled" | "manual_request";
  report: string;
  analysis: IMarketAnalysis;
}

export default ReportContract;
