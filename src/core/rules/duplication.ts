import type { CrossFileSubject, Finding, RuleSettings } from './types.js';
import { BaseCrossFileRule } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';
import { compareStrings } from '../../utils/file-system.js';

export interface DuplicationRuleOptions {
  normalizeWhitespace: boolean;
  minSizeBytes: number;
}

/**
 * Groups files with identical content. Every member of a group except
 * the lexically-first path (the canonical copy) gets one finding.
 */
export class DuplicationRule extends BaseCrossFileRule {
  readonly name = 'duplication';
  readonly description = 'No two files share the same content';
  protected readonly code = ErrorCodes.DUPLICATE_CONTENT;

  /** Read by the analyzer when computing normalized fingerprints */
  readonly normalizeWhitespace: boolean;
  private readonly minSizeBytes: number;

  constructor(settings: RuleSettings, options: DuplicationRuleOptions) {
    super(settings, {
      normalizeWhitespace: options.normalizeWhitespace,
      minSizeBytes: options.minSizeBytes,
    });
    this.normalizeWhitespace = options.normalizeWhitespace;
    this.minSizeBytes = options.minSizeBytes;
  }

  evaluate(subjects: readonly CrossFileSubject[]): Map<string, Finding[]> {
    const groups = new Map<string, CrossFileSubject[]>();
    for (const subject of subjects) {
      if (subject.file.size < this.minSizeBytes) continue;
      const key = this.normalizeWhitespace ? subject.normalizedFingerprint : subject.fingerprint;
      const group = groups.get(key);
      if (group) {
        group.push(subject);
      } else {
        groups.set(key, [subject]);
      }
    }

    const findings = new Map<string, Finding[]>();
    for (const group of groups.values()) {
      if (group.length < 2) continue;

      const [canonical, ...copies] = [...group].sort((a, b) => compareStrings(a.file.path, b.file.path));
      for (const copy of copies) {
        findings.set(copy.file.path, [
          this.createFinding(
            'medium',
            `Duplicate of ${canonical.file.relativePath} (${group.length} files share this content)`
          ),
        ]);
      }
    }
    return findings;
  }
}
