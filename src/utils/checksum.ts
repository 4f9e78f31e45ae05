/**
 * SHA-256 digests for change detection and duplicate grouping.
 */
import { createHash } from 'node:crypto';

/**
 * Compute the SHA-256 hex digest of raw content.
 */
export function computeChecksum(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Checksum of content with every whitespace byte removed.
 * Files that differ only in indentation, line endings or spacing share it.
 */
export function computeNormalizedChecksum(content: Uint8Array): string {
  const hash = createHash('sha256');
  let start = -1;
  for (let i = 0; i < content.length; i++) {
    if (isWhitespaceByte(content[i])) {
      if (start !== -1) {
        hash.update(content.subarray(start, i));
        start = -1;
      }
    } else if (start === -1) {
      start = i;
    }
  }
  if (start !== -1) {
    hash.update(content.subarray(start));
  }
  return hash.digest('hex');
}

/**
 * Checksum of a value's canonical JSON (object keys sorted).
 */
export function computeObjectChecksum(value: unknown): string {
  return computeChecksum(canonicalJson(value));
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

function isWhitespaceByte(byte: number): boolean {
  // space, \t, \n, \v, \f, \r
  return byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);
}
