import { Subject } from "functools-kit";
import { IMarketAnalysis } from "../interfaces/Analysis.interface";
import { DoneContract } from "../contract/Done.contract";
import { ReportContract } from "../contract/Report.contract";

/**
 * Emits every finished analysis, scheduled or manual.
 */
export const analysisEmitter = new Subject<IMarketAnalysis>();

/**
 * Emits the rendered report of every finished analysis.
 */
export const reportEmitter = new Subject<ReportContract>();

/**
 * Error emitter for recoverable failures inside the background loop.
 * The loop keeps running after emitting.
 */
export const errorEmitter = new Subject<Error>();

/**
 * Fatal errors that terminated a background loop.
 */
export const exitEmitter = new Subject<Error>();

/**
 * Emits once a background loop has stopped.
 */
export const doneSubject = new Subject<DoneContract>();
