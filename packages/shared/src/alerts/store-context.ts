/**
 * Shared wiring for the store components of one device
 */

import { ConsoleLogger } from '../logging/console-logger';
import type { Logger } from '../logging/types';
import type { FileSystemAdapter } from '../storage/types';
import { AlertStoreError, toAlertStoreError } from './errors';
import { RecordLock, withTimeout } from './record-lock';
import { resolveStoreConfig, type StoreConfig } from './store-config';

export interface StoreContext {
  fs: FileSystemAdapter;
  /** Absolute alerts root on this device */
  root: string;
  config: StoreConfig;
  logger: Logger;
  /** One lock per device, shared by every component that writes a record */
  lock: RecordLock;
}

export interface StoreContextOptions {
  config?: Partial<StoreConfig>;
  logger?: Logger;
}

export function createStoreContext(
  fs: FileSystemAdapter,
  root: string,
  options: StoreContextOptions = {}
): StoreContext {
  const config = resolveStoreConfig(options.config);
  return {
    fs,
    root,
    config,
    logger: options.logger ?? new ConsoleLogger(),
    lock: new RecordLock(config.lockTimeoutMs),
  };
}

/**
 * Absolute host path of a `/`-separated path relative to the alerts root
 */
export function resolvePath(ctx: StoreContext, relative: string): string {
  return ctx.fs.joinPath(ctx.root, ...relative.split('/'));
}

/**
 * List a directory with a bounded wait. A missing directory lists as empty.
 */
export async function listDir(ctx: StoreContext, absolutePath: string, component: string): Promise<string[]> {
  try {
    if (!(await ctx.fs.exists(absolutePath))) {
      return [];
    }
    return await withTimeout(
      ctx.fs.listFiles(absolutePath),
      ctx.config.scanTimeoutMs,
      () =>
        new AlertStoreError('IOError', `Directory scan timed out after ${ctx.config.scanTimeoutMs}ms`, {
          operation: 'listDir',
          component,
          data: { path: absolutePath },
        })
    );
  } catch (error) {
    throw toAlertStoreError(error, 'listDir', component, { path: absolutePath });
  }
}

/**
 * Throw a retryable error if the operation was cancelled
 */
export function checkAborted(signal: AbortSignal | undefined, operation: string, component: string): void {
  if (signal?.aborted) {
    throw new AlertStoreError('IOError', `${operation} cancelled`, { operation, component });
  }
}
