/**
 * File logger implementation
 * Writes to a dated file next to the configured log path, switching files
 * when the UTC date changes and deleting files past the retention window
 */

import fs from 'fs';
import path from 'path';
import { ILogger } from '../../domain/interfaces';
import { LogLevel, formatLine } from './LogFormat';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface FileLoggerOptions {
  /** e.g. ./logs/announce-proxy.log, written as ./logs/announce-proxy-2024-05-01.log */
  logFile: string;
  retentionDays: number;
  now?: () => Date;
}

export class FileLogger implements ILogger {
  private logDir: string;
  private baseName: string;
  private extension: string;
  private retentionDays: number;
  private now: () => Date;
  private activeDate: string | null = null;
  private writeStream: fs.WriteStream | null = null;
  private closed = false;
  private pendingEnds: Promise<void>[] = [];

  constructor(options: FileLoggerOptions) {
    const parsed = path.parse(path.resolve(options.logFile));
    this.logDir = parsed.dir;
    this.baseName = parsed.name;
    this.extension = parsed.ext || '.log';
    this.retentionDays = options.retentionDays;
    this.now = options.now ?? (() => new Date());

    try {
      fs.mkdirSync(this.logDir, { recursive: true });
    } catch (error) {
      throw new Error(`Failed to create log directory: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    this.rotateIfNeeded(this.now());
  }

  /**
   * Path of the file currently written to
   */
  get currentFile(): string | null {
    return this.activeDate ? this.fileFor(this.activeDate) : null;
  }

  log(message: string, ...args: unknown[]): void {
    this.write('LOG', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('ERROR', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('WARN', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('INFO', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('DEBUG', message, args);
  }

  /**
   * Deletes dated siblings older than the retention window
   * @returns Names of the deleted files
   */
  pruneExpired(today: Date = this.now()): string[] {
    const cutoff = startOfUtcDay(today) - this.retentionDays * MS_PER_DAY;
    const pattern = new RegExp(`^${escapeRegExp(this.baseName)}-(\\d{4}-\\d{2}-\\d{2})${escapeRegExp(this.extension)}$`);
    const removed: string[] = [];

    let names: string[];
    try {
      names = fs.readdirSync(this.logDir);
    } catch (error) {
      console.error('Failed to list log directory:', error);
      return removed;
    }

    for (const name of names) {
      const match = pattern.exec(name);
      if (!match || Date.parse(`${match[1]}T00:00:00Z`) >= cutoff) {
        continue;
      }
      try {
        fs.unlinkSync(path.join(this.logDir, name));
        removed.push(name);
      } catch (error) {
        console.error(`Failed to delete expired log ${name}:`, error);
      }
    }

    return removed;
  }

  /**
   * Flushes and closes the stream (call on application shutdown)
   */
  async close(): Promise<void> {
    const stream = this.writeStream;
    this.writeStream = null;
    this.closed = true;
    if (stream) {
      this.pendingEnds.push(endStream(stream));
    }
    await Promise.all(this.pendingEnds);
    this.pendingEnds = [];
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (this.closed) {
      return;
    }
    const now = this.now();
    this.rotateIfNeeded(now);

    const stream = this.writeStream;
    if (!stream || stream.destroyed || !stream.writable) {
      return;
    }

    try {
      stream.write(formatLine(now, level, message, args) + '\n');
    } catch (error) {
      // Logging must never take the proxy down
      console.error('Failed to write to log file:', error);
    }
  }

  private rotateIfNeeded(now: Date): void {
    const date = now.toISOString().slice(0, 10);
    if (date === this.activeDate) {
      return;
    }

    if (this.writeStream) {
      this.pendingEnds.push(endStream(this.writeStream));
    }
    this.activeDate = date;
    this.writeStream = fs.createWriteStream(this.fileFor(date), { flags: 'a' });
    this.writeStream.on('error', (err) => {
      console.error('Error writing to log file:', err);
    });

    this.pruneExpired(now);
  }

  private fileFor(date: string): string {
    return path.join(this.logDir, `${this.baseName}-${date}${this.extension}`);
  }
}

function endStream(stream: fs.WriteStream): Promise<void> {
  if (stream.destroyed) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    stream.end(() => resolve());
  });
}

function startOfUtcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
