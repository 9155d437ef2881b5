/**
 * Per-record serialization
 *
 * Operations that read-then-write a record's directory (attach, comment,
 * move, replicate) queue behind each other per key; different keys run
 * concurrently. Waiting is bounded: a caller that cannot get the lock in time
 * fails with a retryable LockTimeout instead of waiting forever.
 */

import { AlertStoreError } from './errors';

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class RecordLock {
  // key -> promise that settles when the last queued holder releases
  private tails = new Map<string, Promise<void>>();

  constructor(private readonly timeoutMs: number) {}

  /**
   * Run `fn` while holding the lock for `key`
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    try {
      await withTimeout(
        previous,
        this.timeoutMs,
        () =>
          new AlertStoreError('LockTimeout', `Timed out after ${this.timeoutMs}ms waiting for ${key}`, {
            operation: 'runExclusive',
            component: 'RecordLock',
            data: { key },
          })
      );
    } catch (error) {
      // Give up our slot; later waiters still run after `previous`
      release();
      throw error;
    }

    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Whether anyone holds or waits for `key`
   */
  isBusy(key: string): boolean {
    return this.tails.has(key);
  }
}
