/**
 * Alert store configuration
 */

export interface StoreConfig {
  /**
   * Maximum record folders (active + expired) in one bucket before
   * subsequent creates fan out to a finer bucket.
   * Default: 30 000
   */
  bucketCapacity: number;

  /**
   * Finest bucket precision (decimal digits) used on overflow.
   * Default: 2
   */
  maxBucketPrecision: number;

  /**
   * How long to wait for a per-record lock (ms)
   * Default: 10 seconds
   */
  lockTimeoutMs: number;

  /**
   * Upper bound for a single directory scan (ms)
   * Default: 10 seconds
   */
  scanTimeoutMs: number;

  /**
   * Lifetime of an alert before it expires, unless the record sets `ttl`
   * Default: 30 days
   */
  defaultTtlSeconds: number;

  /**
   * Concurrent sync workers
   * Default: 3
   */
  maxWorkers: number;

  /**
   * Backoff delays for retryable sync failures (ms). One retry per entry.
   */
  retryDelaysMs: number[];
}

export const DEFAULT_STORE_CONFIG: StoreConfig = {
  bucketCapacity: 30_000,
  maxBucketPrecision: 2,
  lockTimeoutMs: 10_000,
  scanTimeoutMs: 10_000,
  defaultTtlSeconds: 30 * 24 * 60 * 60, // 30 days
  maxWorkers: 3,
  retryDelaysMs: [100, 200, 500, 1000, 2000],
};

/**
 * Merge partial overrides onto the defaults
 */
export function resolveStoreConfig(overrides?: Partial<StoreConfig>): StoreConfig {
  return { ...DEFAULT_STORE_CONFIG, ...overrides };
}
