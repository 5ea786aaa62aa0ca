/**
 * Destination of rendered reports registered via addNotifier().
 */
export interface INotifierSchema {
  notifierName: NotifierName;
  note?: string;
  /** Deliver one report. Resolves `false` when the notifier is not configured */
  send: (report: string, symbol: string) => Promise<boolean>;
}

export type NotifierName = string;
