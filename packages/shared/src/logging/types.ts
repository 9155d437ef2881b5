/**
 * Logging and error types shared by the store and its hosts.
 * The station supplies a structured logger; tests and embedders get ConsoleLogger.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * What store components log through. Messages start with `[Component]`.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;

  /** Entries below this level are dropped */
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

/**
 * Broad area a failure belongs to. Error handlers can subscribe by category.
 */
export enum ErrorCategory {
  /** Reads, writes, renames and lock waits under the alerts root */
  FileSystem = 'filesystem',

  /** Applying payloads received from other devices */
  Sync = 'sync',

  /** Active to expired transitions */
  Lifecycle = 'lifecycle',

  /** Coordinates, names and file formats */
  Validation = 'validation',
}

export interface ErrorContext {
  category?: ErrorCategory;
  /** Store operation that failed, e.g. `create` or `apply` */
  operation: string;
  /** Component that raised it, e.g. `RecordStore` */
  component: string;
  data?: Record<string, unknown>;
  /** A retry of the same operation may succeed */
  recoverable?: boolean;
}

export class AppError extends Error {
  constructor(
    message: string,
    public readonly context: ErrorContext,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AppError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Plain object for structured logs
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
      stack: this.stack,
    };
  }
}

export type ErrorHandler = (error: AppError | Error) => void;
