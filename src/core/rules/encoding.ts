import type { FileContent, FileDescriptor, Finding, RuleSettings } from './types.js';
import { BaseFileRule, isTextFile } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';
import type { ExpectedEncoding } from '../config/schema.js';

export interface EncodingRuleOptions {
  expected: ExpectedEncoding;
  allowBom: boolean;
}

const UTF8_BOM = [0xef, 0xbb, 0xbf];

/**
 * Offset of the first byte that starts a malformed UTF-8 sequence, or -1.
 * Rejects overlong forms, surrogates and code points above U+10FFFF.
 */
export function findInvalidUtf8(bytes: Uint8Array, start = 0): number {
  let i = start;
  while (i < bytes.length) {
    const lead = bytes[i];
    if (lead <= 0x7f) {
      i++;
      continue;
    }

    let needed: number;
    let min = 0x80;
    let max = 0xbf;
    if (lead >= 0xc2 && lead <= 0xdf) {
      needed = 1;
    } else if (lead >= 0xe0 && lead <= 0xef) {
      needed = 2;
      if (lead === 0xe0) min = 0xa0;
      if (lead === 0xed) max = 0x9f;
    } else if (lead >= 0xf0 && lead <= 0xf4) {
      needed = 3;
      if (lead === 0xf0) min = 0x90;
      if (lead === 0xf4) max = 0x8f;
    } else {
      return i;
    }

    // Truncated at end of file
    if (i + needed >= bytes.length) {
      return i;
    }
    // First continuation byte carries the lead-specific range
    const first = bytes[i + 1];
    if (first < min || first > max) {
      return i;
    }
    for (let k = 2; k <= needed; k++) {
      const next = bytes[i + k];
      if (next < 0x80 || next > 0xbf) {
        return i;
      }
    }
    i += needed + 1;
  }
  return -1;
}

/**
 * Offset of the first byte above 0x7F, or -1.
 */
export function findNonAscii(bytes: Uint8Array, start = 0): number {
  for (let i = start; i < bytes.length; i++) {
    if (bytes[i] > 0x7f) return i;
  }
  return -1;
}

/**
 * 1-based line number containing a byte offset.
 * LF, CRLF and a lone CR each end a line.
 */
export function lineAtOffset(bytes: Uint8Array, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < bytes.length; i++) {
    if (bytes[i] === 0x0a || (bytes[i] === 0x0d && bytes[i + 1] !== 0x0a)) line++;
  }
  return line;
}

function hasBom(bytes: Uint8Array): boolean {
  return bytes.length >= 3 && UTF8_BOM.every((b, i) => bytes[i] === b);
}

/**
 * Flags text files whose bytes are not valid in the expected encoding.
 * Findings are always critical.
 */
export class EncodingRule extends BaseFileRule {
  readonly name = 'encoding';
  readonly description = 'File bytes are valid in the expected encoding';
  protected readonly code = ErrorCodes.INVALID_ENCODING;

  private readonly expected: ExpectedEncoding;
  private readonly allowBom: boolean;

  constructor(settings: RuleSettings, options: EncodingRuleOptions) {
    super(settings, { expected: options.expected, allowBom: options.allowBom });
    this.expected = options.expected;
    this.allowBom = options.allowBom;
  }

  protected appliesTo(file: FileDescriptor): boolean {
    return isTextFile(file);
  }

  evaluate(content: FileContent): Finding[] {
    const { bytes } = content;
    let start = 0;

    if (hasBom(bytes)) {
      if (!this.allowBom) {
        return [
          this.createFinding('critical', 'File starts with a byte order mark, which is not allowed', {
            line: 1,
            offset: 0,
          }),
        ];
      }
      start = UTF8_BOM.length;
    }

    const offset = this.expected === 'ascii'
      ? findNonAscii(bytes, start)
      : findInvalidUtf8(bytes, start);

    if (offset === -1) {
      return [];
    }

    const label = this.expected === 'ascii' ? 'ASCII' : 'UTF-8';
    const byte = bytes[offset].toString(16).padStart(2, '0');
    const line = lineAtOffset(bytes, offset);
    return [
      this.createFinding(
        'critical',
        `Invalid ${label} byte 0x${byte} at offset ${offset} (line ${line})`,
        { line, offset }
      ),
    ];
  }
}
