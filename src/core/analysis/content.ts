/**
 * Byte-level content helpers shared by the analyzer and rules.
 */

/** Bytes inspected when sniffing for binary content */
export const BINARY_SNIFF_BYTES = 8000;

/**
 * A NUL byte near the start marks content as binary.
 */
export function detectBinary(bytes: Uint8Array): boolean {
  const end = Math.min(bytes.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < end; i++) {
    if (bytes[i] === 0) return true;
  }
  return false;
}

const decoder = new TextDecoder('utf-8');

/**
 * Lenient UTF-8 decoding: malformed sequences become U+FFFD and a
 * leading BOM is dropped.
 */
export function decodeText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}
