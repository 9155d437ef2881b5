import { createHash } from 'crypto';

/**
 * Hex SHA-256 of file content. Identical bytes give identical hashes on every device.
 */
export function hashContent(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

export function encodeText(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function decodeText(data: Uint8Array): string {
  return new TextDecoder().decode(data);
}
