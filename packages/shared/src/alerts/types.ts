/**
 * Alert record types
 *
 * Directory layout under a device's alerts root:
 *
 * ```
 * {bucket}/{active|expired}/{slug}/
 *   manifest.txt
 *   images/photo1.jpg
 *   comments/2025-12-14_21-15-23_X13K0G.txt
 * ```
 */

/**
 * Lifecycle states. The value is also the path segment.
 */
export enum LifecycleState {
  Active = 'active',
  Expired = 'expired',
}

export interface Coordinates {
  lat: number;
  lon: number;
}

/**
 * Canonical relative path of a record: `{bucket}/{state}/{slug}`.
 * Always `/`-separated regardless of host.
 */
export type RecordPath = string;

export interface RecordPathParts {
  bucket: string;
  state: LifecycleState;
  slug: string;
}

/**
 * Ordered `key: value` pairs written as `--> key: value` lines
 */
export type MetadataEntries = ReadonlyArray<readonly [string, string]>;

/**
 * Input for creating a record on the authoring device
 */
export interface AlertDraft {
  title: string;
  /** Truncated to the second on write */
  createdAt: Date;
  coordinates: Coordinates;
  authorDeviceId: string;
  body: string;
  signature?: string;
  metadata?: MetadataEntries;
}

export interface AlertRecord {
  path: RecordPath;
  title: string;
  createdAt: Date;
  coordinates: Coordinates;
  authorDeviceId: string;
  lifecycleState: LifecycleState;
  body: string;
  signature?: string;
  /** Metadata other than the signature, in file order */
  metadata: MetadataEntries;
}

export interface CommentInput {
  /** Truncated to the second */
  createdAt: Date;
  authorCallsign: string;
  body: string;
  signature?: string;
  metadata?: MetadataEntries;
}

export interface AlertComment {
  filename: string;
  createdAt: Date;
  authorCallsign: string;
  /** 0 for the unsuffixed file */
  seq: number;
  body: string;
  signature?: string;
  metadata: MetadataEntries;
  /** File uses the legacy epoch-millisecond name */
  legacy: boolean;
}

export interface AttachmentResult {
  filename: string;
  /** Relative to the alerts root, e.g. `{recordPath}/images/photo1.jpg` */
  relativePath: string;
  /** Hex SHA-256 of the stored bytes */
  contentHash: string;
}

export type SyncPayloadKind = 'record' | 'attachment' | 'comment' | 'lifecycle';

/**
 * Transport-level hints. Informational only; never used to derive names.
 */
export interface SyncPayloadHeader {
  originDeviceId?: string;
  sentAt?: string;
}

/**
 * A replicated artifact as received from the transport.
 * `path` and `filename` were decided by the originating device.
 */
export interface SyncPayload {
  path: RecordPath;
  kind: SyncPayloadKind;
  filename?: string;
  bytes?: Uint8Array;
  contentHash?: string;
  header?: SyncPayloadHeader;
}

export type ApplyOutcome = 'written' | 'unchanged' | 'moved' | 'conflict';

export interface ApplyResult {
  outcome: ApplyOutcome;
  /** Relative path of the artifact that was written or compared */
  target: string;
  /** For conflicts: where the divergent copy was preserved */
  conflictPath?: string;
}
