export type LogLevel = 'LOG' | 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

/**
 * `2024-05-01 12:00:00` in UTC, the timestamp shape of every log line
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

export function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

/**
 * Single-line rendering: `<timestamp> [LEVEL] message arg1 arg2`
 */
export function formatLine(date: Date, level: LogLevel, message: string, args: unknown[]): string {
  const argsStr = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
  return `${formatTimestamp(date)} [${level}] ${message}${argsStr}`;
}
