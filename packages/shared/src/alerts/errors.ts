/**
 * Alert store errors
 *
 * Every failure surfaced by the store carries a kind. LockTimeout and IOError
 * are retryable; the rest describe input or state that a retry will not fix.
 */

import { AppError, ErrorCategory, type ErrorContext } from '../logging/types';

export type AlertErrorKind =
  | 'InvalidCoordinates'
  | 'SlugCollision'
  | 'PathTraversalRejected'
  | 'AttachmentExtensionRejected'
  | 'ConflictingContent'
  | 'LockTimeout'
  | 'IOError'
  | 'InvalidTransition'
  | 'NotFound'
  | 'Validation';

const RETRYABLE_KINDS: ReadonlySet<AlertErrorKind> = new Set(['LockTimeout', 'IOError']);

const CATEGORY_BY_KIND: Record<AlertErrorKind, ErrorCategory> = {
  InvalidCoordinates: ErrorCategory.Validation,
  SlugCollision: ErrorCategory.Validation,
  PathTraversalRejected: ErrorCategory.Validation,
  AttachmentExtensionRejected: ErrorCategory.Validation,
  ConflictingContent: ErrorCategory.Sync,
  LockTimeout: ErrorCategory.FileSystem,
  IOError: ErrorCategory.FileSystem,
  InvalidTransition: ErrorCategory.Lifecycle,
  NotFound: ErrorCategory.FileSystem,
  Validation: ErrorCategory.Validation,
};

export class AlertStoreError extends AppError {
  readonly retryable: boolean;

  constructor(
    public readonly kind: AlertErrorKind,
    message: string,
    context: Omit<ErrorContext, 'category' | 'recoverable'>,
    cause?: Error
  ) {
    const retryable = RETRYABLE_KINDS.has(kind);
    super(
      message,
      { ...context, category: CATEGORY_BY_KIND[kind], recoverable: retryable },
      cause
    );
    this.name = 'AlertStoreError';
    this.retryable = retryable;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), kind: this.kind, retryable: this.retryable };
  }
}

export function isAlertStoreError(error: unknown, kind?: AlertErrorKind): error is AlertStoreError {
  return error instanceof AlertStoreError && (kind === undefined || error.kind === kind);
}

/**
 * Whether a retry of the failed operation may succeed
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof AlertStoreError && error.retryable;
}

function errnoCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Wrap a raw error thrown by a FileSystemAdapter.
 * ENOENT becomes NotFound; anything else is a retryable IOError.
 */
export function toAlertStoreError(
  error: unknown,
  operation: string,
  component: string,
  data?: Record<string, unknown>
): AlertStoreError {
  if (error instanceof AlertStoreError) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  const kind: AlertErrorKind = errnoCode(cause) === 'ENOENT' ? 'NotFound' : 'IOError';
  return new AlertStoreError(kind, `${operation} failed: ${cause.message}`, { operation, component, data }, cause);
}
