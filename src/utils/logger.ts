import { Logger, LogLevel } from '../types/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🐛 [DEBUG]',
  [LogLevel.INFO]: 'ℹ️  [INFO] ',
  [LogLevel.WARN]: '⚠️  [WARN] ',
  [LogLevel.ERROR]: '❌ [ERROR]'
};

export type LogWriter = (line: string) => void;

/**
 * Console-based logger with support for different log levels.
 *
 * Every level writes to stderr: stdout carries command results
 * (`buildpath resolve --json`) and must stay parseable.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private readonly write: LogWriter;

  constructor(level: LogLevel = LogLevel.INFO, write: LogWriter = line => console.error(line)) {
    this.level = level;
    this.write = write;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private formatMessage(level: LogLevel, message: string, meta?: unknown): string {
    const timestamp = new Date().toISOString();
    let formatted = `${timestamp} ${LEVEL_PREFIX[level]} ${message}`;

    if (meta && typeof meta === 'object') {
      // Handle Error objects specifically since JSON.stringify(new Error()) is {}
      const metaToLog = meta instanceof Error ? {
        ...meta,
        name: meta.name,
        message: meta.message,
        stack: meta.stack
      } : meta;
      formatted += `\n${JSON.stringify(metaToLog, null, 2)}`;
    } else if (meta !== undefined && meta !== null && meta !== '') {
      formatted += ` ${String(meta)}`;
    }

    return formatted;
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (this.shouldLog(level)) {
      this.write(this.formatMessage(level, message, meta));
    }
  }

  debug(message: string, meta?: unknown): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

// Create and export a default logger instance
export const logger = new ConsoleLogger(
  process.env.BUILDPATH_VERBOSE === '1'
    ? LogLevel.DEBUG
    : process.env.NODE_ENV === 'development'
      ? LogLevel.INFO
      : LogLevel.ERROR
);
