/**
 * One device's alert store: every component over one root and one lock
 */

import type { FileSystemAdapter } from '../storage/types';
import { AttachmentStore } from './attachment-store';
import { CommentLedger } from './comment-ledger';
import { LifecycleManager } from './lifecycle-manager';
import { RecordStore } from './record-store';
import { createStoreContext, type StoreContext, type StoreContextOptions } from './store-context';
import { SyncReplicator } from './sync-replicator';
import { SyncWorkerPool, type SyncWorkerPoolOptions } from './sync-worker-pool';

export class AlertStore {
  readonly context: StoreContext;
  readonly records: RecordStore;
  readonly attachments: AttachmentStore;
  readonly comments: CommentLedger;
  readonly lifecycle: LifecycleManager;
  readonly replicator: SyncReplicator;

  constructor(fs: FileSystemAdapter, root: string, options: StoreContextOptions = {}) {
    this.context = createStoreContext(fs, root, options);
    this.records = new RecordStore(this.context);
    this.attachments = new AttachmentStore(this.context, this.records);
    this.comments = new CommentLedger(this.context, this.records);
    this.lifecycle = new LifecycleManager(this.context, this.records);
    this.replicator = new SyncReplicator(this.context, this.records);
  }

  /**
   * A worker pool that feeds this store's replicator
   */
  createWorkerPool(options: SyncWorkerPoolOptions = {}): SyncWorkerPool {
    return new SyncWorkerPool(this.context, this.replicator, options);
  }
}
