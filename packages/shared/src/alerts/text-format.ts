/**
 * Text formats for manifest.txt and comment files
 *
 * Manifest:
 * ```
 * # ALERT: Test Alert With Photos
 *
 * CREATED: 2025-12-14T15:32:00Z
 * AUTHOR: X13K0G
 * COORDINATES: 38.7223,-9.1393
 *
 * Body text.
 *
 * --> npub: npub1...
 * --> signature: 3045...
 * ```
 *
 * Comment:
 * ```
 * > 2025-12-14 21:15_23 -- X13K0G
 * Comment text.
 * --> signature: 3045...
 * ```
 *
 * `--> key: value` metadata lines always come last, and the signature is the
 * last of them. A body line that starts with `--> ` is written with a leading
 * backslash (`\--> `) so it reads back as body text.
 */

import { AlertStoreError } from './errors';
import {
  formatHeaderTimestamp,
  formatIsoSeconds,
  parseHeaderTimestamp,
  parseIsoSeconds,
} from './timestamps';
import type { Coordinates, MetadataEntries } from './types';

const COMPONENT = 'TextFormat';
const META_PREFIX = '--> ';
const TITLE_PREFIX = '# ALERT: ';
const SIGNATURE_KEY = 'signature';
const METADATA_KEY_PATTERN = /^[A-Za-z0-9_.-]+$/;
const COMMENT_HEADER_PATTERN = /^> (.+) -- (\S+)$/;

function invalid(operation: string, message: string): AlertStoreError {
  return new AlertStoreError('Validation', message, { operation, component: COMPONENT });
}

const ESCAPED_META_PATTERN = /^\\*--> /;

function normalizeBody(body: string): string[] {
  const text = body.replace(/\r\n?/g, '\n').replace(/\n+$/, '');
  return text === '' ? [] : text.split('\n').map(escapeBodyLine);
}

function escapeBodyLine(line: string): string {
  return ESCAPED_META_PATTERN.test(line) ? `\\${line}` : line;
}

function unescapeBodyLine(line: string): string {
  return line.startsWith('\\') && ESCAPED_META_PATTERN.test(line) ? line.slice(1) : line;
}

function singleLine(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * `--> key: value` lines, signature last
 */
export function formatMetadataLines(metadata: MetadataEntries, signature?: string): string[] {
  const lines: string[] = [];
  for (const [key, value] of metadata) {
    if (!METADATA_KEY_PATTERN.test(key) || key === SIGNATURE_KEY) {
      throw invalid('formatMetadataLines', `Invalid metadata key: ${key}`);
    }
    lines.push(`${META_PREFIX}${key}: ${singleLine(value)}`);
  }
  if (signature !== undefined && signature !== '') {
    lines.push(`${META_PREFIX}${SIGNATURE_KEY}: ${singleLine(signature)}`);
  }
  return lines;
}

interface ParsedMetadata {
  metadata: Array<[string, string]>;
  signature?: string;
}

function parseMetadataLines(lines: string[]): ParsedMetadata {
  const result: ParsedMetadata = { metadata: [] };
  for (const line of lines) {
    const entry = line.slice(META_PREFIX.length);
    const colon = entry.indexOf(':');
    if (colon <= 0) {
      continue;
    }
    const key = entry.slice(0, colon).trim();
    const value = entry.slice(colon + 1).trim();
    if (key === SIGNATURE_KEY) {
      result.signature = value;
    } else {
      result.metadata.push([key, value]);
    }
  }
  return result;
}

/**
 * Split off the trailing block of metadata lines
 */
function splitTrailingMetadata(lines: string[]): { content: string[]; meta: string[] } {
  let start = lines.length;
  while (start > 0 && (lines[start - 1] ?? '').startsWith(META_PREFIX)) {
    start--;
  }
  return { content: lines.slice(0, start), meta: lines.slice(start) };
}

function splitLines(text: string): string[] {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export interface ManifestFields {
  title: string;
  createdAt: Date;
  authorDeviceId: string;
  coordinates: Coordinates;
  body: string;
  signature?: string;
  metadata: MetadataEntries;
}

export function formatManifest(fields: ManifestFields): string {
  const lines = [
    `${TITLE_PREFIX}${singleLine(fields.title)}`,
    '',
    `CREATED: ${formatIsoSeconds(fields.createdAt)}`,
    `AUTHOR: ${singleLine(fields.authorDeviceId)}`,
    `COORDINATES: ${fields.coordinates.lat},${fields.coordinates.lon}`,
  ];

  const body = normalizeBody(fields.body);
  if (body.length > 0) {
    lines.push('', ...body);
  }

  const meta = formatMetadataLines(fields.metadata, fields.signature);
  if (meta.length > 0) {
    lines.push('', ...meta);
  }

  return `${lines.join('\n')}\n`;
}

export function parseManifest(text: string): ManifestFields {
  const lines = splitLines(text);
  const titleLine = lines[0] ?? '';
  if (!titleLine.startsWith(TITLE_PREFIX)) {
    throw invalid('parseManifest', 'Manifest is missing the title line');
  }

  const headers = new Map<string, string>();
  let index = 1;
  while (index < lines.length && (lines[index] ?? '') === '') {
    index++;
  }
  for (; index < lines.length; index++) {
    const line = lines[index] ?? '';
    if (line === '') break;
    const colon = line.indexOf(':');
    if (colon > 0) {
      headers.set(line.slice(0, colon).trim(), line.slice(colon + 1).trim());
    }
  }

  const createdAt = parseIsoSeconds(headers.get('CREATED') ?? '');
  const author = headers.get('AUTHOR');
  const [lat, lon] = (headers.get('COORDINATES') ?? '').split(',').map((v) => Number(v.trim()));
  if (!createdAt || !author || lat === undefined || lon === undefined || Number.isNaN(lat) || Number.isNaN(lon)) {
    throw invalid('parseManifest', 'Manifest is missing CREATED, AUTHOR or COORDINATES');
  }

  const { content, meta } = splitTrailingMetadata(lines.slice(index + 1));
  while (content.length > 0 && content[content.length - 1] === '') {
    content.pop();
  }
  const parsedMeta = parseMetadataLines(meta);

  return {
    title: titleLine.slice(TITLE_PREFIX.length),
    createdAt,
    authorDeviceId: author,
    coordinates: { lat, lon },
    body: content.map(unescapeBodyLine).join('\n'),
    signature: parsedMeta.signature,
    metadata: parsedMeta.metadata,
  };
}

export interface CommentFields {
  createdAt: Date;
  authorCallsign: string;
  body: string;
  signature?: string;
  metadata: MetadataEntries;
}

export function formatComment(fields: CommentFields): string {
  const lines = [
    `> ${formatHeaderTimestamp(fields.createdAt)} -- ${fields.authorCallsign}`,
    ...normalizeBody(fields.body),
    ...formatMetadataLines(fields.metadata, fields.signature),
  ];
  return `${lines.join('\n')}\n`;
}

export function parseCommentText(text: string): CommentFields {
  const lines = splitLines(text);
  const match = COMMENT_HEADER_PATTERN.exec(lines[0] ?? '');
  const createdAt = match?.[1] ? parseHeaderTimestamp(match[1]) : null;
  const author = match?.[2];
  if (!createdAt || !author) {
    throw invalid('parseCommentText', 'Comment is missing the "> timestamp -- author" header');
  }

  const { content, meta } = splitTrailingMetadata(lines.slice(1));
  const parsedMeta = parseMetadataLines(meta);
  return {
    createdAt,
    authorCallsign: author,
    body: content.map(unescapeBodyLine).join('\n'),
    signature: parsedMeta.signature,
    metadata: parsedMeta.metadata,
  };
}
