/**
 * Inbox Watcher
 *
 * Watches a directory that a transport drops payload files into and feeds
 * each file to the sync worker pool. Applied files are deleted; files that
 * fail for good are moved to `failed/` so they are not picked up again.
 */

import {
  FileWatchEventType,
  type ApplyResult,
  type FileSystemAdapter,
  type FileWatcher,
  type FileWatchEvent,
  type Logger,
  type SyncWorkerPool,
} from '@geoalerts/shared';
import { decodePayload, isPayloadFileName } from './payload-file';

export const FAILED_DIR = 'failed';

export interface InboxWatcherOptions {
  fs: FileSystemAdapter;
  watcher: FileWatcher;
  pool: SyncWorkerPool;
  inboxPath: string;
  logger: Logger;
}

export type InboxFileOutcome =
  | { status: 'applied'; filename: string; result: ApplyResult }
  | { status: 'failed'; filename: string; error: Error }
  | { status: 'skipped'; filename: string };

export class InboxWatcher {
  private readonly inFlight = new Map<string, Promise<InboxFileOutcome>>();
  private intake: Promise<void> = Promise.resolve();
  private watching = false;

  constructor(private readonly options: InboxWatcherOptions) {}

  /**
   * Process whatever is already in the inbox, then watch for new files
   */
  async start(): Promise<InboxFileOutcome[]> {
    const { fs, inboxPath, watcher, logger } = this.options;
    await fs.mkdir(inboxPath);

    await watcher.watch(inboxPath, (event) => this.onEvent(event));
    this.watching = true;
    logger.info(`[InboxWatcher] Watching ${inboxPath}`);

    const existing = (await fs.listFiles(inboxPath)).filter(isPayloadFileName).sort();
    return Promise.all(existing.map((filename) => this.processFile(filename)));
  }

  async stop(): Promise<void> {
    if (this.watching) {
      await this.options.watcher.unwatch();
      this.watching = false;
    }
    await this.idle();
  }

  /**
   * Wait until every file picked up so far has been handled
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight.values()]);
    }
  }

  /**
   * Read, apply and clear one inbox file. Never rejects.
   * A file already being processed returns the same outcome.
   */
  processFile(filename: string): Promise<InboxFileOutcome> {
    if (!isPayloadFileName(filename)) {
      return Promise.resolve({ status: 'skipped', filename });
    }
    const current = this.inFlight.get(filename);
    if (current) {
      return current;
    }

    const outcome = this.applyFile(filename).finally(() => {
      this.inFlight.delete(filename);
    });
    this.inFlight.set(filename, outcome);
    return outcome;
  }

  private onEvent(event: FileWatchEvent): void {
    if (event.type === FileWatchEventType.Deleted) {
      return;
    }
    void this.processFile(event.filename);
  }

  private async applyFile(filename: string): Promise<InboxFileOutcome> {
    const { fs, inboxPath, logger } = this.options;
    const filePath = fs.joinPath(inboxPath, filename);

    // Files are read and submitted one at a time so the pool sees them in pick-up order
    const queued = this.intake.then(() => this.readAndSubmit(filePath, filename));
    this.intake = queued.then(
      () => undefined,
      () => undefined
    );

    try {
      const submission = await queued;
      if (!submission) {
        return { status: 'skipped', filename };
      }
      const result = await submission.result;
      await fs.deleteFile(filePath);
      logger.info(`[InboxWatcher] Applied ${filename}`, { outcome: result.outcome, target: result.target });
      return { status: 'applied', filename, result };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error(`[InboxWatcher] Failed to apply ${filename}`, err);
      await this.quarantine(filename);
      return { status: 'failed', filename, error: err };
    }
  }

  private async readAndSubmit(filePath: string, filename: string): Promise<{ result: Promise<ApplyResult> } | null> {
    const { fs, pool } = this.options;
    if (!(await fs.exists(filePath))) {
      return null;
    }
    const text = new TextDecoder().decode(await fs.readFile(filePath));
    return { result: pool.submit(decodePayload(text, filename), filename) };
  }

  private async quarantine(filename: string): Promise<void> {
    const { fs, inboxPath, logger } = this.options;
    const failedDir = fs.joinPath(inboxPath, FAILED_DIR);
    const target = fs.joinPath(failedDir, filename);
    try {
      await fs.mkdir(failedDir);
      if (await fs.exists(target)) {
        await fs.deleteFile(target);
      }
      await fs.rename(fs.joinPath(inboxPath, filename), target);
    } catch (error) {
      logger.warn(`[InboxWatcher] Could not move ${filename} to ${FAILED_DIR}/`, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
