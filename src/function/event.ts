import { queued } from "functools-kit";
import market from "../lib";
import {
  analysisEmitter,
  doneSubject,
  errorEmitter,
  exitEmitter,
  reportEmitter,
} from "../config/emitters";
import { IMarketAnalysis } from "../interfaces/Analysis.interface";
import { ReportContract } from "../contract/Report.contract";
import { DoneContract } from "../contract/Done.contract";

const LISTEN_ANALYSIS_METHOD_NAME = "event.listenAnalysis";
const LISTEN_REPORT_METHOD_NAME = "event.listenReport";
const LISTEN_REPORT_ONCE_METHOD_NAME = "event.listenReportOnce";
const LISTEN_ERROR_METHOD_NAME = "event.listenError";
const LISTEN_EXIT_METHOD_NAME = "event.listenExit";
const LISTEN_DONE_METHOD_NAME = "event.listenDone";
const LISTEN_DONE_ONCE_METHOD_NAME = "event.listenDoneOnce";

/**
 * Subscribes to finished analyses with queued async processing.
 *
 * @returns Unsubscribe function to stop listening
 */
export function listenAnalysis(fn: (event: IMarketAnalysis) => void) {
  market.loggerService.log(LISTEN_ANALYSIS_METHOD_NAME);
  return analysisEmitter.subscribe(queued(async (event) => fn(event)));
}

/**
 * Subscribes to rendered reports with queued async processing.
 *
 * @returns Unsubscribe function to stop listening
 */
export function listenReport(fn: (event: ReportContract) => void) {
  market.loggerService.log(LISTEN_REPORT_METHOD_NAME);
  return reportEmitter.subscribe(queued(async (event) => fn(event)));
}

/**
 * Fires once for the first report matching the filter.
 */
export function listenReportOnce(
  filterFn: (event: ReportContract) => boolean,
  fn: (event: ReportContract) => void
) {
  market.loggerService.log(LISTEN_REPORT_ONCE_METHOD_NAME);
  return reportEmitter.filter(filterFn).once(fn);
}

/**
 * Subscribes to recoverable background errors. The loop keeps running.
 */
export function listenError(fn: (error: Error) => void) {
  market.loggerService.log(LISTEN_ERROR_METHOD_NAME);
  return errorEmitter.subscribe(queued(async (error) => fn(error)));
}

/**
 * Subscribes to errors that stopped a background loop.
 */
export function listenExit(fn: (error: Error) => void) {
  market.loggerService.log(LISTEN_EXIT_METHOD_NAME);
  return exitEmitter.subscribe(queued(async (error) => fn(error)));
}

export function listenDone(fn: (event: DoneContract) => void) {
  market.loggerService.log(LISTEN_DONE_METHOD_NAME);
  return doneSubject.subscribe(queued(async (event) => fn(event)));
}

export function listenDoneOnce(
  filterFn: (event: DoneContract) => boolean,
  fn: (event: DoneContract) => void
) {
  market.loggerService.log(LISTEN_DONE_ONCE_METHOD_NAME);
  return doneSubject.filter(filterFn).once(fn);
}
