/**
 * Lifecycle manager
 *
 * ACTIVE → EXPIRED, once, on the authoring device: either the TTL ran out or
 * the author closed the alert. The move keeps bucket and slug. The returned
 * payload carries the literal new path so that other devices perform the same
 * directory move without recomputing anything. Expired is terminal; reopening
 * an alert means creating a new record.
 */

import { AlertStoreError } from './errors';
import { parseRecordPath } from './path-codec';
import type { RecordStore } from './record-store';
import type { StoreContext } from './store-context';
import { LifecycleState, type AlertRecord, type RecordPath, type SyncPayload } from './types';

const COMPONENT = 'LifecycleManager';

export type ExpiryReason = 'ttl' | 'closed';

export interface LifecycleChange {
  previousPath: RecordPath;
  path: RecordPath;
  reason: ExpiryReason;
  /** Ready to hand to the transport */
  payload: SyncPayload;
}

export interface SweepResult {
  expired: LifecycleChange[];
  failures: Array<{ path: RecordPath; error: Error }>;
}

export class LifecycleManager {
  constructor(
    private readonly ctx: StoreContext,
    private readonly records: RecordStore
  ) {}

  /**
   * TTL for a record: its `ttl` metadata (seconds) if valid, else the configured default
   */
  ttlSeconds(record: AlertRecord): number {
    const entry = record.metadata.find(([key]) => key === 'ttl');
    const parsed = entry ? Number(entry[1]) : NaN;
    return Number.isInteger(parsed) && parsed > 0 ? parsed : this.ctx.config.defaultTtlSeconds;
  }

  isDue(record: AlertRecord, now: Date, ttlSeconds = this.ttlSeconds(record)): boolean {
    return now.getTime() >= record.createdAt.getTime() + ttlSeconds * 1000;
  }

  async expire(path: RecordPath, reason: ExpiryReason = 'ttl'): Promise<LifecycleChange> {
    const located = await this.records.locateOrThrow(path, 'expire');
    const newPath = await this.records.move(located, parseRecordPath(located).state, LifecycleState.Expired);
    if (newPath !== located) {
      this.ctx.logger.info(`[${COMPONENT}] Expired record`, { path: newPath, reason });
    }
    return {
      previousPath: located,
      path: newPath,
      reason,
      payload: { path: newPath, kind: 'lifecycle' },
    };
  }

  /**
   * Explicit close by the author
   */
  close(path: RecordPath): Promise<LifecycleChange> {
    return this.expire(path, 'closed');
  }

  reopen(path: RecordPath): never {
    throw new AlertStoreError('InvalidTransition', 'Expired records cannot be reopened; create a new record', {
      operation: 'reopen',
      component: COMPONENT,
      data: { path },
    });
  }

  /**
   * Expire every active record whose TTL has run out.
   * A failure on one record is logged and does not stop the others.
   */
  async sweep(now: Date): Promise<SweepResult> {
    const result: SweepResult = { expired: [], failures: [] };

    for (const path of await this.records.list(LifecycleState.Active)) {
      try {
        const record = await this.records.read(path);
        if (this.isDue(record, now)) {
          result.expired.push(await this.expire(path, 'ttl'));
        }
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.ctx.logger.error(`[${COMPONENT}] Failed to evaluate ${path}`, err);
        result.failures.push({ path, error: err });
      }
    }

    this.ctx.logger.info(`[${COMPONENT}] Sweep complete`, {
      expired: result.expired.length,
      failures: result.failures.length,
    });
    return result;
  }
}
