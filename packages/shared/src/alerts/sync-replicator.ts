/**
 * Sync replicator
 *
 * Writes data received from another device at the path and file name the
 * originating device chose. Names are checked against the grammar and never
 * generated here: this module must not call the path, attachment or comment
 * naming functions.
 *
 * Idempotent: a target that already holds the same bytes is left alone.
 * A target holding different bytes is kept, and the incoming copy is
 * preserved next to it as `{name}.conflict-{hash12}` and flagged.
 */

import { handleError } from '../logging/error-handler';
import { IMAGES_DIR, isValidAttachmentName } from './attachment-renamer';
import { isValidCommentName } from './comment-ledger';
import { hashContent } from './content-hash';
import { AlertStoreError, toAlertStoreError } from './errors';
import { parseRecordPath, recordKey } from './path-codec';
import { COMMENTS_DIR, MANIFEST_FILE, type RecordStore } from './record-store';
import { checkAborted, resolvePath, type StoreContext } from './store-context';
import { LifecycleState, type ApplyResult, type SyncPayload } from './types';

const COMPONENT = 'SyncReplicator';

export interface ApplyOptions {
  signal?: AbortSignal;
}

function reject(kind: 'Validation' | 'PathTraversalRejected', message: string, payload: SyncPayload): never {
  throw new AlertStoreError(kind, message, {
    operation: 'apply',
    component: COMPONENT,
    data: { path: payload.path, kind: payload.kind, filename: payload.filename },
  });
}

/**
 * Grammar check of a received payload. Returns the bytes for content kinds.
 */
export function validatePayload(payload: SyncPayload): Uint8Array | null {
  parseRecordPath(payload.path);

  if (payload.kind === 'lifecycle') {
    return null;
  }

  const bytes = payload.bytes;
  if (!bytes) {
    reject('Validation', `${payload.kind} payload has no bytes`, payload);
  }
  if (payload.contentHash !== undefined && payload.contentHash !== hashContent(bytes)) {
    reject('Validation', 'contentHash does not match the received bytes', payload);
  }

  const { filename } = payload;
  switch (payload.kind) {
    case 'record':
      if (filename !== undefined && filename !== MANIFEST_FILE) {
        reject('PathTraversalRejected', `Unexpected record file name: ${filename}`, payload);
      }
      break;
    case 'attachment':
      if (filename === undefined || !isValidAttachmentName(filename)) {
        reject('PathTraversalRejected', `Invalid attachment name: ${String(filename)}`, payload);
      }
      break;
    case 'comment':
      if (filename === undefined || !isValidCommentName(filename)) {
        reject('PathTraversalRejected', `Invalid comment name: ${String(filename)}`, payload);
      }
      break;
    default:
      reject('Validation', `Unknown payload kind: ${String(payload.kind)}`, payload);
  }
  return bytes;
}

export class SyncReplicator {
  constructor(
    private readonly ctx: StoreContext,
    private readonly records: RecordStore
  ) {}

  async apply(payload: SyncPayload, options: ApplyOptions = {}): Promise<ApplyResult> {
    const bytes = validatePayload(payload);
    checkAborted(options.signal, 'apply', COMPONENT);

    this.ctx.logger.debug(`[${COMPONENT}] Applying ${payload.kind}`, {
      path: payload.path,
      filename: payload.filename,
      origin: payload.header?.originDeviceId,
      sentAt: payload.header?.sentAt,
    });

    if (payload.kind === 'lifecycle' || !bytes) {
      return this.applyLifecycle(payload);
    }

    return this.ctx.lock.runExclusive(recordKey(payload.path), async () => {
      if (payload.kind === 'record') {
        return this.applyRecord(payload, bytes, options.signal);
      }

      const located = await this.records.locate(payload.path);
      if (!located) {
        throw new AlertStoreError('IOError', `Record ${payload.path} has not been replicated yet`, {
          operation: 'apply',
          component: COMPONENT,
          data: { path: payload.path, kind: payload.kind },
        });
      }
      const dir = payload.kind === 'attachment' ? IMAGES_DIR : COMMENTS_DIR;
      return this.writeOrCompare(`${located}/${dir}`, payload.filename ?? '', bytes, options.signal);
    });
  }

  private async applyRecord(payload: SyncPayload, bytes: Uint8Array, signal?: AbortSignal): Promise<ApplyResult> {
    const located = await this.records.locate(payload.path);
    if (located) {
      return this.writeOrCompare(located, MANIFEST_FILE, bytes, signal);
    }

    checkAborted(signal, 'apply', COMPONENT);
    await this.records.writeRecordSkeleton(payload.path, bytes, signal);
    this.ctx.logger.info(`[${COMPONENT}] Replicated record`, { path: payload.path });
    return { outcome: 'written', target: `${payload.path}/${MANIFEST_FILE}` };
  }

  /**
   * `path` is the record's new literal path. The record moves there from its
   * other state; a record already there is left alone.
   */
  private async applyLifecycle(payload: SyncPayload): Promise<ApplyResult> {
    const { state } = parseRecordPath(payload.path);
    if (state !== LifecycleState.Expired) {
      throw new AlertStoreError('InvalidTransition', `Lifecycle payload must target the expired state`, {
        operation: 'apply',
        component: COMPONENT,
        data: { path: payload.path },
      });
    }

    const located = await this.records.locate(payload.path);
    if (!located) {
      throw new AlertStoreError('IOError', `Record ${payload.path} has not been replicated yet`, {
        operation: 'apply',
        component: COMPONENT,
        data: { path: payload.path, kind: payload.kind },
      });
    }
    if (located === payload.path) {
      return { outcome: 'unchanged', target: payload.path };
    }

    const moved = await this.records.move(located, LifecycleState.Active, LifecycleState.Expired);
    return { outcome: 'moved', target: moved };
  }

  private async writeOrCompare(
    dirRelative: string,
    filename: string,
    bytes: Uint8Array,
    signal?: AbortSignal
  ): Promise<ApplyResult> {
    const target = `${dirRelative}/${filename}`;
    const absolute = resolvePath(this.ctx, target);
    const incomingHash = hashContent(bytes);

    try {
      if (await this.ctx.fs.exists(absolute)) {
        const existingHash = hashContent(await this.ctx.fs.readFile(absolute));
        if (existingHash === incomingHash) {
          return { outcome: 'unchanged', target };
        }
        return await this.preserveConflict(target, existingHash, incomingHash, bytes, signal);
      }

      checkAborted(signal, 'apply', COMPONENT);
      await this.ctx.fs.mkdir(resolvePath(this.ctx, dirRelative));
      await this.ctx.fs.writeFile(absolute, bytes, { signal });
    } catch (error) {
      throw toAlertStoreError(error, 'apply', COMPONENT, { target });
    }

    this.ctx.logger.info(`[${COMPONENT}] Replicated ${target}`);
    return { outcome: 'written', target };
  }

  private async preserveConflict(
    target: string,
    existingHash: string,
    incomingHash: string,
    bytes: Uint8Array,
    signal?: AbortSignal
  ): Promise<ApplyResult> {
    const conflictPath = `${target}.conflict-${incomingHash.slice(0, 12)}`;
    const absolute = resolvePath(this.ctx, conflictPath);
    if (!(await this.ctx.fs.exists(absolute))) {
      checkAborted(signal, 'apply', COMPONENT);
      await this.ctx.fs.writeFile(absolute, bytes, { signal });
    }

    const conflict = new AlertStoreError('ConflictingContent', `Divergent content at ${target}`, {
      operation: 'apply',
      component: COMPONENT,
      data: { target, conflictPath, existingHash, incomingHash },
    });
    this.ctx.logger.warn(`[${COMPONENT}] ${conflict.message}, kept incoming copy as ${conflictPath}`);
    handleError(conflict);

    return { outcome: 'conflict', target, conflictPath };
  }
}
