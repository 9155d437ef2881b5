/**
 * UTC timestamp formats used in names and file headers.
 * All formatting goes through getUTC* so the host time zone never leaks in.
 */

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

function dateParts(date: Date) {
  return {
    year: pad(date.getUTCFullYear(), 4),
    month: pad(date.getUTCMonth() + 1),
    day: pad(date.getUTCDate()),
    hour: pad(date.getUTCHours()),
    minute: pad(date.getUTCMinutes()),
    second: pad(date.getUTCSeconds()),
  };
}

/**
 * Drop milliseconds. Stored timestamps have second precision.
 */
export function truncateToSecond(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

/** `YYYY-MM-DD_HH-MM` (record slug prefix) */
export function formatSlugTimestamp(date: Date): string {
  const p = dateParts(date);
  return `${p.year}-${p.month}-${p.day}_${p.hour}-${p.minute}`;
}

/** `YYYY-MM-DD_HH-MM-SS` (comment filename prefix) */
export function formatCommentTimestamp(date: Date): string {
  const p = dateParts(date);
  return `${p.year}-${p.month}-${p.day}_${p.hour}-${p.minute}-${p.second}`;
}

/** `YYYY-MM-DD HH:MM_ss` (comment header line) */
export function formatHeaderTimestamp(date: Date): string {
  const p = dateParts(date);
  return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}_${p.second}`;
}

/** `YYYY-MM-DDTHH:MM:SSZ` (manifest CREATED line) */
export function formatIsoSeconds(date: Date): string {
  return truncateToSecond(date).toISOString().replace('.000Z', 'Z');
}

const ISO_SECONDS_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;
const HEADER_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})_(\d{2})$/;
const COMMENT_NAME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})_(\d{2})-(\d{2})-(\d{2})$/;

function fromMatch(match: RegExpExecArray | null): Date | null {
  if (!match) {
    return null;
  }
  const [, y, mo, d, h, mi, s] = match.map(Number);
  if ([y, mo, d, h, mi, s].some((n) => n === undefined || Number.isNaN(n))) {
    return null;
  }
  const date = new Date(Date.UTC(y ?? 0, (mo ?? 1) - 1, d ?? 1, h ?? 0, mi ?? 0, s ?? 0));
  return Number.isNaN(date.getTime()) ? null : date;
}

export function parseIsoSeconds(value: string): Date | null {
  return fromMatch(ISO_SECONDS_PATTERN.exec(value.trim()));
}

export function parseHeaderTimestamp(value: string): Date | null {
  return fromMatch(HEADER_PATTERN.exec(value.trim()));
}

export function parseCommentTimestamp(value: string): Date | null {
  return fromMatch(COMMENT_NAME_PATTERN.exec(value));
}
