/**
 * Structured Logging with OpenTelemetry Integration
 *
 * Implements the shared Logger interface for the station and CLI.
 * Context is written as key=value pairs, and every line is also forwarded to
 * the OpenTelemetry diagnostic logger so an installed diag sink sees it.
 */

import { diag } from '@opentelemetry/api';
import { LogLevel, type Logger } from '@geoalerts/shared';

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  /** Minimum log level to output */
  minLevel?: LogLevel;
  /** Prefix for all log messages from this logger */
  prefix?: string;
  /** Default context to include in all log messages */
  defaultContext?: LogContext;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

/**
 * Structured Logger
 */
export class StructuredLogger implements Logger {
  private minLevel: LogLevel;
  private readonly prefix: string;
  private readonly defaultContext: LogContext;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? LogLevel.Info;
    this.prefix = options.prefix ?? '';
    this.defaultContext = options.defaultContext ?? {};
  }

  /**
   * Create a child logger with additional context or prefix
   */
  child(options: { prefix?: string; context?: LogContext }): StructuredLogger {
    return new StructuredLogger({
      minLevel: this.minLevel,
      prefix: options.prefix ? `${this.prefix}${options.prefix}` : this.prefix,
      defaultContext: { ...this.defaultContext, ...options.context },
    });
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log(LogLevel.Error, message, { ...context, ...this.extractErrorContext(error) });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const formattedMessage = this.formatMessage(level, message, { ...this.defaultContext, ...context });

    switch (level) {
      case LogLevel.Debug:
        console.debug(formattedMessage);
        diag.debug(formattedMessage);
        break;
      case LogLevel.Info:
        console.log(formattedMessage);
        diag.info(formattedMessage);
        break;
      case LogLevel.Warn:
        console.warn(formattedMessage);
        diag.warn(formattedMessage);
        break;
      case LogLevel.Error:
        console.error(formattedMessage);
        diag.error(formattedMessage);
        break;
    }
  }

  /**
   * `{iso} {LEVEL} [prefix] message key=value ...`
   */
  formatMessage(level: LogLevel, message: string, context: LogContext, now = new Date()): string {
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    const contextStr = Object.entries(context)
      .filter(([, value]) => value !== undefined && value !== null)
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(' ');

    const line = `${now.toISOString()} ${level.toUpperCase()} ${prefix}${message}`;
    return contextStr ? `${line} ${contextStr}` : line;
  }

  private extractErrorContext(error?: Error): LogContext {
    if (!error) {
      return {};
    }
    return {
      error_name: error.name,
      error_message: error.message,
      error_stack: error.stack,
    };
  }
}

let globalLogger: StructuredLogger | null = null;

/**
 * Get global logger instance
 */
export function getLogger(): StructuredLogger {
  globalLogger ??= new StructuredLogger({
    minLevel: process.env['NODE_ENV'] === 'production' ? LogLevel.Info : LogLevel.Debug,
  });
  return globalLogger;
}

/**
 * Create a logger with a specific prefix and context
 */
export function createLogger(prefix: string, context?: LogContext): StructuredLogger {
  return getLogger().child({ prefix, context });
}

/**
 * Configure global logger settings
 */
export function configureLogger(options: LoggerOptions): void {
  globalLogger = new StructuredLogger(options);
}
