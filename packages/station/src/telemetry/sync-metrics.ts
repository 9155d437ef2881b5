/**
 * Sync Metrics Collection
 *
 * OpenTelemetry metrics for payload replication:
 * - Apply latency and attempts per payload
 * - Outcome counts (written, unchanged, conflict)
 * - Retry and failure counts
 */

import { metrics } from '@opentelemetry/api';
import type { Histogram, Counter } from '@opentelemetry/api';
import type { ApplyResult, SyncPayload, SyncPoolMetricsCallbacks } from '@geoalerts/shared';

/**
 * Sync Metrics Collector
 */
export class SyncMetrics {
  private meter = metrics.getMeter('geoalerts-sync');

  private applyLatencyMs: Histogram;
  private applyAttempts: Histogram;

  private applied: Counter;
  private unchanged: Counter;
  private conflicts: Counter;
  private retries: Counter;
  private failures: Counter;

  constructor() {
    this.applyLatencyMs = this.meter.createHistogram('sync.apply_latency_ms', {
      description: 'Time from submission to a settled apply',
      unit: 'ms',
    });

    this.applyAttempts = this.meter.createHistogram('sync.apply_attempts', {
      description: 'Attempts needed before an apply settles',
      unit: 'attempts',
    });

    this.applied = this.meter.createCounter('sync.applied', {
      description: 'Payloads that wrote or moved something',
      unit: 'payloads',
    });

    this.unchanged = this.meter.createCounter('sync.unchanged', {
      description: 'Payloads already present with identical bytes',
      unit: 'payloads',
    });

    this.conflicts = this.meter.createCounter('sync.conflicts', {
      description: 'Payloads whose bytes differed from the stored file',
      unit: 'payloads',
    });

    this.retries = this.meter.createCounter('sync.retries', {
      description: 'Retryable failures that were scheduled again',
      unit: 'retries',
    });

    this.failures = this.meter.createCounter('sync.failures', {
      description: 'Payloads given up on',
      unit: 'payloads',
    });
  }

  /**
   * Record a settled apply
   */
  recordApplied(result: ApplyResult, latencyMs: number, attempts: number, kind?: string): void {
    const attributes = { outcome: result.outcome, ...(kind ? { kind } : {}) };
    this.applyLatencyMs.record(latencyMs, attributes);
    this.applyAttempts.record(attempts, attributes);

    switch (result.outcome) {
      case 'unchanged':
        this.unchanged.add(1, attributes);
        break;
      case 'conflict':
        this.conflicts.add(1, attributes);
        break;
      default:
        this.applied.add(1, attributes);
    }
  }

  recordRetry(kind: string, attempt: number): void {
    this.retries.add(1, { kind, attempt });
  }

  recordFailure(kind: string, errorName: string): void {
    this.failures.add(1, { kind, error: errorName });
  }

  /**
   * Callbacks in the shape the worker pool accepts
   */
  asPoolCallbacks(): SyncPoolMetricsCallbacks {
    return {
      recordApplied: (result, latencyMs, attempts) => {
        this.recordApplied(result, latencyMs, attempts);
      },
      recordRetry: (payload: SyncPayload, attempt) => {
        this.recordRetry(payload.kind, attempt);
      },
      recordFailure: (payload: SyncPayload, error) => {
        this.recordFailure(payload.kind, error.name);
      },
    };
  }
}

let globalSyncMetrics: SyncMetrics | null = null;

/**
 * Get global Sync metrics instance
 */
export function getSyncMetrics(): SyncMetrics {
  globalSyncMetrics ??= new SyncMetrics();
  return globalSyncMetrics;
}
