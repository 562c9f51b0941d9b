/**
 * @module logger
 * Module-tagged console logger with a global level and a replaceable sink.
 *
 * Output is `[Module] message ...args`. Hosts that own stdout (the MCP stdio
 * server) swap the sink so every level goes to stderr.
 */

export const LogLevel = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3, SILENT: 4 } as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogSink = (level: LogLevel, ...args: unknown[]) => void;

const consoleSink: LogSink = (level, ...args) => {
  const fn =
    level === LogLevel.DEBUG
      ? console.debug
      : level === LogLevel.INFO
        ? console.info
        : level === LogLevel.WARN
          ? console.warn
          : console.error;
  fn(...args);
};

/** Sink that writes every level to stderr. */
export const stderrSink: LogSink = (_level, ...args) => {
  console.error(...args);
};

let currentLevel: LogLevel = LogLevel.INFO;
let currentSink: LogSink = consoleSink;

export class Logger {
  constructor(private readonly module: string) {}

  /** Set the minimum log level globally. Messages below this level are suppressed. */
  static setLevel(level: LogLevel): void {
    currentLevel = level;
  }

  static getLevel(): LogLevel {
    return currentLevel;
  }

  /** Replace the console output with a custom sink; `null` restores the console. */
  static setSink(sink: LogSink | null): void {
    currentSink = sink ?? consoleSink;
  }

  debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.WARN, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.ERROR, message, args);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (level < currentLevel) return;
    currentSink(level, `[${this.module}]`, message, ...args);
  }
}

/** Map a level name (case-insensitive) to a {@link LogLevel}, or `null` if unknown. */
export function parseLogLevel(name: string): LogLevel | null {
  switch (name.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return null;
  }
}
