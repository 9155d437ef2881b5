/**
 * Node.js File System Adapter
 *
 * Implements FileSystemAdapter interface using Node.js fs module
 */

import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import { join, basename as pathBasename, dirname } from 'path';
import type { FileSystemAdapter, FileStats, WriteOptions } from '@geoalerts/shared';

export class NodeFileSystemAdapter implements FileSystemAdapter {
  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async mkdir(path: string): Promise<void> {
    await fs.mkdir(path, { recursive: true });
  }

  async readFile(path: string): Promise<Uint8Array> {
    const buffer = await fs.readFile(path);
    return new Uint8Array(buffer);
  }

  /**
   * Write to a hidden temp file in the same directory, then rename over the
   * target. An aborted or failed write removes the temp file.
   */
  async writeFile(path: string, data: Uint8Array, options: WriteOptions = {}): Promise<void> {
    const dir = dirname(path);
    await fs.mkdir(dir, { recursive: true });

    const tempPath = join(dir, `.${pathBasename(path)}.${randomBytes(4).toString('hex')}.tmp`);
    try {
      await fs.writeFile(tempPath, data, { signal: options.signal });
      options.signal?.throwIfAborted();
      await fs.rename(tempPath, path);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  async deleteFile(path: string): Promise<void> {
    await fs.unlink(path);
  }

  async listFiles(path: string): Promise<string[]> {
    return await fs.readdir(path);
  }

  /**
   * fs.rename replaces an existing file (or empty directory) on POSIX;
   * refuse instead so a record is never overwritten by a move.
   */
  async rename(from: string, to: string): Promise<void> {
    if (await this.exists(to)) {
      throw Object.assign(new Error(`EEXIST: file already exists, rename '${from}' -> '${to}'`), {
        code: 'EEXIST',
      });
    }
    await fs.rename(from, to);
  }

  joinPath(...segments: string[]): string {
    return join(...segments);
  }

  basename(path: string): string {
    return pathBasename(path);
  }

  async stat(path: string): Promise<FileStats> {
    const stats = await fs.stat(path);
    return {
      size: stats.size,
      mtimeMs: stats.mtimeMs,
      isDirectory: stats.isDirectory(),
    };
  }
}
