/**
 * Console logger implementation
 * Prefixes each message with a timestamp and level; structured arguments are
 * handed to the console as-is
 */

import { ILogger } from '../../domain/interfaces';
import { LogLevel, formatTimestamp } from './LogFormat';

export class ConsoleLogger implements ILogger {
  constructor(private now: () => Date = () => new Date()) { }

  log(message: string, ...args: unknown[]): void {
    console.log(this.prefix('LOG', message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(this.prefix('ERROR', message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(this.prefix('WARN', message), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    console.info(this.prefix('INFO', message), ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    console.debug(this.prefix('DEBUG', message), ...args);
  }

  private prefix(level: LogLevel, message: string): string {
    return `${formatTimestamp(this.now())} [${level}] ${message}`;
  }
}
