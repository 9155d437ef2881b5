/**
 * Sync worker pool
 *
 * Applies received payloads with at most `maxWorkers` running at once.
 * Payloads for the same record run in submission order; payloads for
 * different records run in parallel. Retryable failures (lock timeouts, I/O,
 * records that have not arrived yet) are retried with backoff; a failing
 * payload never holds up unrelated records.
 */

import { handleError } from '../logging/error-handler';
import { AlertStoreError, isRetryable } from './errors';
import { recordKey } from './path-codec';
import type { StoreContext } from './store-context';
import type { ApplyOptions } from './sync-replicator';
import type { ApplyResult, SyncPayload } from './types';

const COMPONENT = 'SyncWorkerPool';

/**
 * Anything that can apply a payload (the replicator, or a wrapper around it)
 */
export interface PayloadApplier {
  apply(payload: SyncPayload, options?: ApplyOptions): Promise<ApplyResult>;
}

/**
 * Optional metrics hooks for telemetry
 */
export interface SyncPoolMetricsCallbacks {
  recordApplied?: (result: ApplyResult, latencyMs: number, attempts: number) => void;
  recordRetry?: (payload: SyncPayload, attempt: number) => void;
  recordFailure?: (payload: SyncPayload, error: Error) => void;
}

export interface SyncWorkerPoolOptions {
  maxWorkers?: number;
  retryDelaysMs?: number[];
  metrics?: SyncPoolMetricsCallbacks;
}

export interface SyncPoolStats {
  running: boolean;
  maxWorkers: number;
  activeWorkers: number;
  queuedJobs: number;
  completed: number;
  failed: number;
}

interface Job {
  id: string;
  payload: SyncPayload;
  controller: AbortController;
}

export class SyncWorkerPool {
  private readonly maxWorkers: number;
  private readonly retryDelaysMs: number[];
  private readonly metrics: SyncPoolMetricsCallbacks | undefined;

  private running = true;
  private active = 0;
  private waiting: Array<() => void> = [];
  private chains = new Map<string, Promise<void>>();
  private jobs = new Map<string, Job>();
  private pending = new Set<Promise<ApplyResult>>();
  private completed = 0;
  private failed = 0;
  private nextJobNumber = 1;

  constructor(
    private readonly ctx: StoreContext,
    private readonly applier: PayloadApplier,
    options: SyncWorkerPoolOptions = {}
  ) {
    this.maxWorkers = Math.max(1, options.maxWorkers ?? ctx.config.maxWorkers);
    this.retryDelaysMs = options.retryDelaysMs ?? ctx.config.retryDelaysMs;
    this.metrics = options.metrics;
  }

  /**
   * Queue a payload. Resolves with the apply result, rejects with the final error.
   */
  submit(payload: SyncPayload, jobId = `job_${this.nextJobNumber++}`): Promise<ApplyResult> {
    if (!this.running) {
      return Promise.reject(
        new AlertStoreError('IOError', 'Sync worker pool is stopped', { operation: 'submit', component: COMPONENT })
      );
    }

    let key: string;
    try {
      key = recordKey(payload.path);
    } catch (error) {
      return Promise.reject(error);
    }

    const job: Job = { id: jobId, payload, controller: new AbortController() };
    this.jobs.set(jobId, job);

    const previous = this.chains.get(key) ?? Promise.resolve();
    const result = previous.then(() => this.runJob(job));
    const settled = result.then(
      () => undefined,
      () => undefined
    );
    this.chains.set(key, settled);
    this.pending.add(result);

    void settled.then(() => {
      this.jobs.delete(jobId);
      this.pending.delete(result);
      if (this.chains.get(key) === settled) {
        this.chains.delete(key);
      }
    });

    return result;
  }

  /**
   * Cancel a queued or running job. Returns false if the job is unknown.
   */
  cancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job) {
      return false;
    }
    job.controller.abort();
    return true;
  }

  /**
   * Wait until every submitted job has settled
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  /**
   * Reject new work and cancel everything queued or running
   */
  async stop(): Promise<void> {
    this.running = false;
    for (const job of this.jobs.values()) {
      job.controller.abort();
    }
    await this.drain();
  }

  stats(): SyncPoolStats {
    return {
      running: this.running,
      maxWorkers: this.maxWorkers,
      activeWorkers: this.active,
      queuedJobs: this.jobs.size - this.active,
      completed: this.completed,
      failed: this.failed,
    };
  }

  private async runJob(job: Job): Promise<ApplyResult> {
    await this.acquireWorker();
    const startTime = Date.now();
    try {
      const { result, attempts } = await this.applyWithRetry(job);
      this.completed++;
      this.metrics?.recordApplied?.(result, Date.now() - startTime, attempts);
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.failed++;
      this.ctx.logger.error(`[${COMPONENT}] Giving up on ${job.payload.kind} for ${job.payload.path}`, err, {
        jobId: job.id,
        filename: job.payload.filename,
      });
      this.metrics?.recordFailure?.(job.payload, err);
      handleError(err);
      throw err;
    } finally {
      this.releaseWorker();
    }
  }

  private async applyWithRetry(job: Job): Promise<{ result: ApplyResult; attempts: number }> {
    const { signal } = job.controller;
    for (let attempt = 0; ; attempt++) {
      try {
        const result = await this.applier.apply(job.payload, { signal });
        return { result, attempts: attempt + 1 };
      } catch (error) {
        const delay = this.retryDelaysMs[attempt];
        if (!isRetryable(error) || delay === undefined || signal.aborted) {
          throw error;
        }
        this.ctx.logger.warn(
          `[${COMPONENT}] Attempt ${attempt + 1} failed for ${job.payload.path}, retrying after ${delay}ms`,
          { jobId: job.id, reason: error instanceof Error ? error.message : String(error) }
        );
        this.metrics?.recordRetry?.(job.payload, attempt + 1);
        await this.sleep(delay, signal);
      }
    }
  }

  private acquireWorker(): Promise<void> {
    if (this.active < this.maxWorkers) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private releaseWorker(): void {
    this.active--;
    this.waiting.shift()?.();
  }

  /**
   * Sleep, waking early if the job is cancelled
   */
  private sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(done, ms);
      function done() {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      }
      signal.addEventListener('abort', done, { once: true });
    });
  }
}
