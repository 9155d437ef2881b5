/**
 * Attachment naming
 *
 * Photos are stored as `images/photo{N}.{ext}` where N is one more than the
 * number of photos already present. The uploaded file's own name is only used
 * to pick the extension and is never persisted.
 */

export const IMAGES_DIR = 'images';

/** Extensions kept as-is */
export const ALLOWED_EXTENSIONS: readonly string[] = ['jpg', 'jpeg', 'png', 'webp', 'heic'];

/** Stored extension for anything outside the allow-list */
export const FALLBACK_EXTENSION = 'bin';

const ATTACHMENT_NAME_PATTERN = /^photo([1-9]\d*)\.([a-z0-9]+)$/;

export interface NormalizedExtension {
  extension: string;
  /** The requested extension was outside the allow-list */
  coerced: boolean;
}

/**
 * Lower-case the extension and map unknown ones to the fallback
 */
export function normalizeExtension(ext: string): NormalizedExtension {
  const cleaned = ext.trim().replace(/^\.+/, '').toLowerCase();
  if (ALLOWED_EXTENSIONS.includes(cleaned)) {
    return { extension: cleaned, coerced: false };
  }
  return { extension: FALLBACK_EXTENSION, coerced: true };
}

/**
 * Extension of an uploaded file name ("" when it has none)
 */
export function extensionOf(originalName: string): string {
  const base = originalName.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot + 1) : '';
}

/**
 * Next anonymized name: `photo{existingCount + 1}.{ext}`
 */
export function nextName(existingCount: number, ext: string): string {
  if (!Number.isInteger(existingCount) || existingCount < 0) {
    throw new RangeError(`existingCount must be a non-negative integer, got ${existingCount}`);
  }
  return `photo${existingCount + 1}.${normalizeExtension(ext).extension}`;
}

/**
 * Position of an attachment (photo3.png → 3), or null for other files
 */
export function attachmentIndex(filename: string): number | null {
  const match = ATTACHMENT_NAME_PATTERN.exec(filename);
  return match?.[1] ? Number(match[1]) : null;
}

/**
 * Grammar check for attachment names received from other devices
 */
export function isValidAttachmentName(filename: string): boolean {
  const match = ATTACHMENT_NAME_PATTERN.exec(filename);
  if (!match?.[2]) {
    return false;
  }
  return match[2] === FALLBACK_EXTENSION || ALLOWED_EXTENSIONS.includes(match[2]);
}

/**
 * Count attachments in an `images/` listing, ignoring temp and stray files
 */
export function countAttachments(listing: readonly string[]): number {
  return listing.filter((name) => isValidAttachmentName(name)).length;
}

/**
 * Sort attachment names by position (photo2 before photo10)
 */
export function sortAttachments(listing: readonly string[]): string[] {
  return listing
    .filter((name) => isValidAttachmentName(name))
    .sort((a, b) => (attachmentIndex(a) ?? 0) - (attachmentIndex(b) ?? 0));
}
