/**
 * Alert records: naming, storage, comments, lifecycle and replication
 */

export * from './types';
export * from './errors';
export * from './store-config';
export * from './timestamps';
export * from './path-codec';
export * from './attachment-renamer';
export * from './content-hash';
export * from './text-format';
export { RecordLock, withTimeout } from './record-lock';
export { createStoreContext, resolvePath, type StoreContext, type StoreContextOptions } from './store-context';
export { RecordStore, MANIFEST_FILE, COMMENTS_DIR, type RecordTreeEntry } from './record-store';
export { AttachmentStore } from './attachment-store';
export {
  CommentLedger,
  parseCommentFilename,
  isLegacyCommentFilename,
  isValidCommentName,
  nextCommentFilename,
  type ParsedCommentFilename,
} from './comment-ledger';
export {
  LifecycleManager,
  type ExpiryReason,
  type LifecycleChange,
  type SweepResult,
} from './lifecycle-manager';
export { SyncReplicator, validatePayload, type ApplyOptions } from './sync-replicator';
export {
  SyncWorkerPool,
  type PayloadApplier,
  type SyncPoolMetricsCallbacks,
  type SyncWorkerPoolOptions,
  type SyncPoolStats,
} from './sync-worker-pool';
export { AlertStore } from './alert-store';
