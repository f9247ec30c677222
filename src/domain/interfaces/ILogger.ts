/**
 * Logging port shared by the announce pipeline and the HTTP layer.
 * Trailing args carry structured fields for the file sink.
 */

export interface ILogger {
  log(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
