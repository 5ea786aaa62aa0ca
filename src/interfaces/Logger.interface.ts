/**
 * Logging sink used by every service in the container.
 *
 * Install one with `setLogger()`. Until then messages are discarded.
 */
export interface ILogger {
  /** General-purpose message. */
  log(topic: string, ...args: unknown[]): void;

  /** Diagnostic detail. */
  debug(topic: string, ...args: unknown[]): void;

  /** High-level progress such as a finished analysis cycle. */
  info(topic: string, ...args: unknown[]): void;

  /** Recoverable failures: a degraded indicator, a retried request. */
  warn(topic: string, ...args: unknown[]): void;
}
