/**
 * File system abstraction types
 * These interfaces allow the alert store to run under different hosts
 * (Node.js for the station and CLI, anything else that can provide the operations)
 */

/**
 * File stats
 */
export interface FileStats {
  size: number;
  mtimeMs: number;
  isDirectory: boolean;
}

/**
 * Options for write operations
 */
export interface WriteOptions {
  /** Abort an in-flight write; the temp file is discarded */
  signal?: AbortSignal;
}

/**
 * File system operations abstraction
 * Platform-specific implementations must provide these operations
 */
export interface FileSystemAdapter {
  /**
   * Check if a path exists
   */
  exists(path: string): Promise<boolean>;

  /**
   * Create a directory (and parent directories if needed)
   */
  mkdir(path: string): Promise<void>;

  /**
   * Read a file as binary data
   */
  readFile(path: string): Promise<Uint8Array>;

  /**
   * Write a file atomically (with temp file + rename).
   * Readers never observe a partially written file.
   */
  writeFile(path: string, data: Uint8Array, options?: WriteOptions): Promise<void>;

  /**
   * Delete a file
   */
  deleteFile(path: string): Promise<void>;

  /**
   * List entry names (files and directories) in a directory
   */
  listFiles(path: string): Promise<string[]>;

  /**
   * Rename a file or directory. Fails if the target already exists.
   */
  rename(from: string, to: string): Promise<void>;

  /**
   * Get file stats
   */
  stat(path: string): Promise<FileStats>;

  /**
   * Join path segments
   */
  joinPath(...segments: string[]): string;

  /**
   * Get the base name of a path
   */
  basename(path: string): string;
}

/**
 * File watcher abstraction
 */
export interface FileWatcher {
  /**
   * Watch a directory for changes
   */
  watch(path: string, callback: (event: FileWatchEvent) => void): Promise<void>;

  /**
   * Stop watching
   */
  unwatch(): Promise<void>;
}

/**
 * File watch event types
 */
export enum FileWatchEventType {
  Added = 'added',
  Changed = 'changed',
  Deleted = 'deleted',
}

/**
 * File watch event
 */
export interface FileWatchEvent {
  type: FileWatchEventType;
  path: string;
  filename: string;
}
