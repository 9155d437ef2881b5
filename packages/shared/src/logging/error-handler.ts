/**
 * Error reporting
 *
 * Some failures never reach a caller: a conflict the replicator preserved,
 * or a sync job the worker pool gave up on. Components report those here and
 * the host decides what to do with them.
 */

import { AppError, type ErrorCategory, type ErrorHandler } from './types';

export interface ErrorHandlerOptions {
  /** Only receive errors in these categories. Errors without a category skip filtered handlers. */
  categories?: readonly ErrorCategory[];
}

const handlers = new Map<ErrorHandler, ReadonlySet<ErrorCategory> | null>();

function categoryOf(error: AppError | Error): ErrorCategory | undefined {
  return error instanceof AppError ? error.context.category : undefined;
}

/**
 * Register a handler for reported errors. Returns a function that removes it.
 */
export function registerErrorHandler(handler: ErrorHandler, options: ErrorHandlerOptions = {}): () => void {
  handlers.set(handler, options.categories ? new Set(options.categories) : null);
  return () => unregisterErrorHandler(handler);
}

export function unregisterErrorHandler(handler: ErrorHandler): void {
  handlers.delete(handler);
}

/**
 * Pass an error to every matching handler. A handler that throws does not
 * stop the others.
 */
export function handleError(error: AppError | Error): void {
  const category = categoryOf(error);
  for (const [handler, categories] of [...handlers]) {
    if (categories && (category === undefined || !categories.has(category))) {
      continue;
    }
    try {
      handler(error);
    } catch (handlerError) {
      console.error('[ErrorHandler] Handler failed:', handlerError);
    }
  }
}
