import type { FileContent, FileDescriptor, Finding, RuleSettings, Severity } from './types.js';
import { BaseFileRule } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';
import { formatBytes } from '../../utils/format.js';

export interface SizeRuleOptions {
  maxFileSizeBytes: number;
}

/**
 * Severity for a size/threshold ratio above 1.
 */
export function sizeSeverity(ratio: number): Severity {
  if (ratio <= 1.5) return 'low';
  if (ratio <= 2) return 'medium';
  if (ratio <= 4) return 'high';
  return 'critical';
}

/**
 * Flags files larger than a byte threshold. A file exactly at the
 * threshold passes; severity grows with the overage ratio.
 */
export class SizeRule extends BaseFileRule {
  readonly name = 'size';
  readonly description = 'File size stays within the configured byte limit';
  protected readonly code = ErrorCodes.FILE_TOO_LARGE;

  private readonly maxBytes: number;

  constructor(settings: RuleSettings, options: SizeRuleOptions) {
    super(settings, { maxFileSizeBytes: options.maxFileSizeBytes });
    this.maxBytes = options.maxFileSizeBytes;
  }

  evaluate(_content: FileContent, file: FileDescriptor): Finding[] {
    if (file.size <= this.maxBytes) {
      return [];
    }

    const ratio = file.size / this.maxBytes;
    return [
      this.createFinding(
        sizeSeverity(ratio),
        `File is ${formatBytes(file.size)} (${file.size} bytes), ${ratio.toFixed(2)}x the limit of ${this.maxBytes} bytes`
      ),
    ];
  }
}
