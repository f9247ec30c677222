/**
 * Composite logger that writes to both console and the rotating log file
 */

import { ILogger } from '../../domain/interfaces';
import { ConsoleLogger } from './ConsoleLogger';
import { FileLogger, FileLoggerOptions } from './FileLogger';

export class CompositeLogger implements ILogger {
  private consoleLogger: ConsoleLogger;
  private fileLogger: FileLogger;

  constructor(fileOptions: FileLoggerOptions) {
    this.consoleLogger = new ConsoleLogger(fileOptions.now);
    this.fileLogger = new FileLogger(fileOptions);
  }

  log(message: string, ...args: unknown[]): void {
    this.consoleLogger.log(message, ...args);
    this.fileLogger.log(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.consoleLogger.error(message, ...args);
    this.fileLogger.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.consoleLogger.warn(message, ...args);
    this.fileLogger.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.consoleLogger.info(message, ...args);
    this.fileLogger.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.consoleLogger.debug(message, ...args);
    this.fileLogger.debug(message, ...args);
  }

  get logFile(): string | null {
    return this.fileLogger.currentFile;
  }

  /**
   * Close file streams (call on application shutdown)
   */
  close(): Promise<void> {
    return this.fileLogger.close();
  }
}
