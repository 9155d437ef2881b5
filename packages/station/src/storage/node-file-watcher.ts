/**
 * Node.js File Watcher using Chokidar
 *
 * Watches a directory for changes and triggers callbacks.
 * Uses chokidar for reliable cross-platform file watching.
 */

import chokidar, { type FSWatcher } from 'chokidar';
import { basename } from 'path';
import { FileWatchEventType, type FileWatcher, type FileWatchEvent, type Logger } from '@geoalerts/shared';
import { createLogger } from '../telemetry/logger';

export interface NodeFileWatcherOptions {
  /** Wait for writes to settle before reporting a file (ms); 0 disables */
  stabilityThresholdMs?: number;
  logger?: Logger;
}

export class NodeFileWatcher implements FileWatcher {
  private watcher: FSWatcher | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: NodeFileWatcherOptions = {}) {
    this.logger = options.logger ?? createLogger('FileWatcher');
  }

  async watch(path: string, callback: (event: FileWatchEvent) => void): Promise<void> {
    // Clean up existing watcher if any
    if (this.watcher) {
      await this.unwatch();
    }

    const stabilityThreshold = this.options.stabilityThresholdMs ?? 200;
    const watcher = chokidar.watch(path, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      // Transports that copy files in place need a settle window
      awaitWriteFinish: stabilityThreshold > 0 ? { stabilityThreshold, pollInterval: 50 } : false,
    });
    this.watcher = watcher;

    const emit = (type: FileWatchEventType) => (filepath: string) => {
      const filename = basename(filepath);
      this.logger.debug(`File ${type}: ${filename}`, { dir: path });
      callback({ type, path, filename });
    };

    watcher
      .on('add', emit(FileWatchEventType.Added))
      .on('change', emit(FileWatchEventType.Changed))
      .on('unlink', emit(FileWatchEventType.Deleted))
      .on('error', (error) => {
        this.logger.error('Error watching directory', error instanceof Error ? error : new Error(String(error)), {
          dir: path,
        });
      });

    // Wait for watcher to be ready
    await new Promise<void>((resolve) => {
      watcher.on('ready', () => {
        this.logger.info(`Ready to watch: ${path}`);
        resolve();
      });
    });
  }

  async unwatch(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }
}
