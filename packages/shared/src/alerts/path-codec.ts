/**
 * Path codec
 *
 * Derives the canonical relative path of an alert record:
 *
 *   {bucket}/{active|expired}/{YYYY-MM-DD_HH-MM}_{title-slug}
 *
 * `derivePath` runs once, on the authoring device, when the record is created.
 * Every other participant receives the literal path and only checks it against
 * the grammar below (`parseRecordPath`); re-deriving on another device is never
 * done, because slug and rounding rules may differ between versions.
 */

import { AlertStoreError } from './errors';
import { formatSlugTimestamp } from './timestamps';
import {
  LifecycleState,
  type Coordinates,
  type RecordPath,
  type RecordPathParts,
} from './types';

const COMPONENT = 'PathCodec';

export const MAX_SLUG_LENGTH = 60;
export const UNTITLED_SLUG = 'untitled';
export const MIN_BUCKET_PRECISION = 1;
export const MAX_BUCKET_PRECISION = 6;

const BUCKET_PATTERN = /^-?\d{1,2}\.\d{1,6}_-?\d{1,3}\.\d{1,6}$/;
const SLUG_PATTERN = /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}_[a-z0-9]+(?:-[a-z0-9]+)*$/;
const STATES: ReadonlySet<string> = new Set(Object.values(LifecycleState));

export interface DerivePathOptions {
  /** Decimal digits kept in the bucket (1 unless the bucket overflowed) */
  bucketPrecision?: number;
  state?: LifecycleState;
}

/**
 * Reject coordinates outside the valid range
 */
export function validateCoordinates(coordinates: Coordinates): void {
  const { lat, lon } = coordinates;
  if (!Number.isFinite(lat) || !Number.isFinite(lon) || Math.abs(lat) > 90 || Math.abs(lon) > 180) {
    throw new AlertStoreError('InvalidCoordinates', `Invalid coordinates: ${lat}, ${lon}`, {
      operation: 'validateCoordinates',
      component: COMPONENT,
      data: { lat, lon },
    });
  }
}

/**
 * Positional decimal form of a non-negative number, without rounding.
 * `String()` gives the shortest round-trip digits but may use an exponent.
 */
function plainDecimal(value: number): string {
  const text = String(value);
  const match = /^(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }
  const [, whole = '', fraction = '', exponent = '0'] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) {
    return `0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return digits + '0'.repeat(point - digits.length);
  }
  return `${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Truncate toward zero, keeping `precision` decimal digits.
 *
 * Cuts the shortest decimal form instead of multiplying, so 4.35 truncates
 * to "4.3" and 38.79999999999999 to "38.7". A result of zero is unsigned.
 */
export function truncateToward(value: number, precision: number): string {
  const [intPart = '0', fracPart = ''] = plainDecimal(Math.abs(value)).split('.');
  const digits = fracPart.slice(0, precision).padEnd(precision, '0');
  const isZero = /^0+$/.test(intPart) && /^0*$/.test(digits);
  const sign = value < 0 && !isZero ? '-' : '';
  return `${sign}${intPart}.${digits}`;
}

/**
 * Geo bucket for coordinates, e.g. `38.7_-9.1` at precision 1
 */
export function bucketFor(coordinates: Coordinates, precision = MIN_BUCKET_PRECISION): string {
  if (!Number.isInteger(precision) || precision < MIN_BUCKET_PRECISION || precision > MAX_BUCKET_PRECISION) {
    throw new AlertStoreError('Validation', `Unsupported bucket precision: ${precision}`, {
      operation: 'bucketFor',
      component: COMPONENT,
    });
  }
  return `${truncateToward(coordinates.lat, precision)}_${truncateToward(coordinates.lon, precision)}`;
}

/**
 * Filesystem-safe slug of a free-text title
 */
export function slugify(title: string): string {
  const trimDashes = (s: string) => s.replace(/^-+|-+$/g, '');
  const collapsed = trimDashes(
    title
      .toLowerCase()
      .replace(/[^a-z0-9-]/g, '-')
      .replace(/-{2,}/g, '-')
  );
  const capped = trimDashes(collapsed.slice(0, MAX_SLUG_LENGTH));
  return capped || UNTITLED_SLUG;
}

/**
 * `{YYYY-MM-DD_HH-MM}_{title-slug}`
 */
export function recordSlug(createdAt: Date, title: string): string {
  return `${formatSlugTimestamp(createdAt)}_${slugify(title)}`;
}

export function joinRecordPath(parts: RecordPathParts): RecordPath {
  return `${parts.bucket}/${parts.state}/${parts.slug}`;
}

/**
 * Derive the canonical path of a new record. Author-side only.
 */
export function derivePath(
  coordinates: Coordinates,
  createdAt: Date,
  title: string,
  options: DerivePathOptions = {}
): RecordPath {
  validateCoordinates(coordinates);
  return joinRecordPath({
    bucket: bucketFor(coordinates, options.bucketPrecision ?? MIN_BUCKET_PRECISION),
    state: options.state ?? LifecycleState.Active,
    slug: recordSlug(createdAt, title),
  });
}

function rejectPath(path: string, reason: string): never {
  throw new AlertStoreError('PathTraversalRejected', `Rejected path "${path}": ${reason}`, {
    operation: 'parseRecordPath',
    component: COMPONENT,
    data: { path },
  });
}

/**
 * Split a literal record path and check it against the grammar.
 * Rejects traversal and anything non-canonical; never rewrites the input.
 */
export function parseRecordPath(path: string): RecordPathParts {
  if (path.includes('\\') || path.includes('\0')) {
    rejectPath(path, 'illegal character');
  }
  if (path.startsWith('/')) {
    rejectPath(path, 'absolute path');
  }

  const segments = path.split('/');
  if (segments.some((s) => s === '' || s === '.' || s === '..')) {
    rejectPath(path, 'empty or relative segment');
  }

  const [bucket, state, slug] = segments;
  if (segments.length !== 3 || bucket === undefined || state === undefined || slug === undefined) {
    rejectPath(path, 'expected bucket/state/slug');
  }
  if (!BUCKET_PATTERN.test(bucket)) {
    rejectPath(path, 'malformed bucket');
  }
  if (!isLifecycleState(state)) {
    rejectPath(path, 'unknown state');
  }
  if (!SLUG_PATTERN.test(slug) || slug.length > 'YYYY-MM-DD_HH-MM_'.length + MAX_SLUG_LENGTH) {
    rejectPath(path, 'malformed slug');
  }

  return { bucket, state, slug };
}

export function isLifecycleState(value: string): value is LifecycleState {
  return STATES.has(value);
}

export function isCanonicalRecordPath(path: string): boolean {
  try {
    parseRecordPath(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Replace only the state segment
 */
export function withState(path: RecordPath, state: LifecycleState): RecordPath {
  return joinRecordPath({ ...parseRecordPath(path), state });
}

/**
 * State-independent identity (`{bucket}/{slug}`), stable across active→expired
 */
export function recordKey(path: RecordPath): string {
  const { bucket, slug } = parseRecordPath(path);
  return `${bucket}/${slug}`;
}
