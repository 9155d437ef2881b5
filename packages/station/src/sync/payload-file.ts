/**
 * Payload files
 *
 * A sync payload on disk is one JSON object per file, with the bytes in
 * base64. This is what `export` writes and what the inbox watcher reads.
 */

import {
  AlertStoreError,
  parseRecordPath,
  type SyncPayload,
  type SyncPayloadHeader,
  type SyncPayloadKind,
} from '@geoalerts/shared';

export const PAYLOAD_FILE_EXTENSION = '.payload.json';

const PAYLOAD_KINDS: readonly SyncPayloadKind[] = ['record', 'attachment', 'comment', 'lifecycle'];

interface PayloadFileJson {
  path: string;
  kind: SyncPayloadKind;
  filename?: string;
  bytes?: string;
  contentHash?: string;
  header?: SyncPayloadHeader;
}

function isPayloadKind(value: unknown): value is SyncPayloadKind {
  return PAYLOAD_KINDS.some((kind) => kind === value);
}

function malformed(message: string, source: string): AlertStoreError {
  return new AlertStoreError('Validation', `Malformed payload file ${source}: ${message}`, {
    operation: 'decodePayload',
    component: 'PayloadFile',
    data: { source },
  });
}

export function encodePayload(payload: SyncPayload): string {
  const json: PayloadFileJson = {
    path: payload.path,
    kind: payload.kind,
    filename: payload.filename,
    bytes: payload.bytes ? Buffer.from(payload.bytes).toString('base64') : undefined,
    contentHash: payload.contentHash,
    header: payload.header,
  };
  return `${JSON.stringify(json, null, 2)}\n`;
}

function optionalField(entries: Map<string, unknown>, key: string, source: string): string | undefined {
  const value = entries.get(key);
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw malformed(`${key} must be a string`, source);
  }
  return value;
}

/**
 * Parse a payload file. Structural checks only; naming and hash checks
 * happen when the replicator applies it.
 */
export function decodePayload(text: string, source: string): SyncPayload {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw malformed(error instanceof Error ? error.message : String(error), source);
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw malformed('expected a JSON object', source);
  }

  const entries = new Map<string, unknown>(Object.entries(data));
  const path = entries.get('path');
  const kind = entries.get('kind');
  if (typeof path !== 'string' || path.length === 0) {
    throw malformed('path is required', source);
  }
  if (!isPayloadKind(kind)) {
    throw malformed(`kind must be one of ${PAYLOAD_KINDS.join(', ')}`, source);
  }

  const payload: SyncPayload = { path, kind };

  const filename = optionalField(entries, 'filename', source);
  if (filename !== undefined) payload.filename = filename;

  const encoded = optionalField(entries, 'bytes', source);
  if (encoded !== undefined) {
    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(encoded)) {
      throw malformed('bytes must be base64', source);
    }
    payload.bytes = new Uint8Array(Buffer.from(encoded, 'base64'));
  }

  const contentHash = optionalField(entries, 'contentHash', source);
  if (contentHash !== undefined) payload.contentHash = contentHash;

  const header = entries.get('header');
  if (header !== undefined && header !== null) {
    if (typeof header !== 'object' || Array.isArray(header)) {
      throw malformed('header must be an object', source);
    }
    const headerEntries = new Map<string, unknown>(Object.entries(header));
    const originDeviceId = optionalField(headerEntries, 'originDeviceId', source);
    const sentAt = optionalField(headerEntries, 'sentAt', source);
    payload.header = {
      ...(originDeviceId !== undefined ? { originDeviceId } : {}),
      ...(sentAt !== undefined ? { sentAt } : {}),
    };
  }

  return payload;
}

/**
 * File name for the index-th payload of a record's export, e.g.
 * `38.7_-9.1.2025-12-14_15-32_road-closed.0003.comment.payload.json`.
 * Bucket and slug identify the record; sorting its names restores export order.
 */
export function payloadFileName(index: number, payload: SyncPayload): string {
  const { bucket, slug } = parseRecordPath(payload.path);
  return `${bucket}.${slug}.${String(index + 1).padStart(4, '0')}.${payload.kind}${PAYLOAD_FILE_EXTENSION}`;
}

export function isPayloadFileName(filename: string): boolean {
  return filename.endsWith(PAYLOAD_FILE_EXTENSION) && !filename.startsWith('.');
}
