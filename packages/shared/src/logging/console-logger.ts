/**
 * Console logger implementation
 * Logs to console.log/warn/error
 * Default logger for the store components and tests
 */

import type { Logger, LogEntry } from './types';
import { LogLevel } from './types';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/**
 * Console logger
 * Simple logger that outputs to console, optionally tagged with a component prefix
 */
export class ConsoleLogger implements Logger {
  private currentLevel: LogLevel = LogLevel.Info;

  constructor(
    level?: LogLevel,
    private readonly prefix?: string
  ) {
    if (level) {
      this.currentLevel = level;
    }
  }

  /**
   * Create a logger sharing this level with a component prefix, e.g. `[RecordStore]`
   */
  withPrefix(prefix: string): ConsoleLogger {
    return new ConsoleLogger(this.currentLevel, prefix);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.currentLevel];
  }

  formatMessage(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const tag = this.prefix ? `[${this.prefix}] ` : '';
    let message = `[${timestamp}] ${level} ${tag}${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      message += ` ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        message += `\n  Stack: ${entry.error.stack}`;
      }
    }

    return message;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error) {
    if (!this.shouldLog(level)) return;

    const line = this.formatMessage({ level, message, timestamp: Date.now(), context, error });
    switch (level) {
      case LogLevel.Warn:
        console.warn(line);
        break;
      case LogLevel.Error:
        console.error(line);
        break;
      default:
        console.log(line);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context, error);
  }

  setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }
}
