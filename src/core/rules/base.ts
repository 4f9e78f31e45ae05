import type {
  CrossFileRule,
  CrossFileSubject,
  FileContent,
  FileDescriptor,
  FileRule,
  Finding,
  FindingLocation,
  RuleOptions,
  RuleSettings,
  Severity,
} from './types.js';
import { createPathMatcher, type PathMatcher } from '../../utils/path-matcher.js';

/**
 * Shared plumbing for built-in rules: identity, path applicability
 * and finding construction.
 */
abstract class RuleSupport {
  abstract readonly name: string;
  abstract readonly description: string;
  /** Finding code used by createFinding */
  protected abstract readonly code: string;

  readonly weight: number;
  readonly options: RuleOptions;
  private readonly matcher: PathMatcher;

  constructor(settings: RuleSettings, options: RuleOptions) {
    this.weight = settings.weight;
    this.matcher = createPathMatcher(settings.include, settings.exclude);
    this.options = Object.freeze({
      include: [...settings.include],
      exclude: [...settings.exclude],
      ...options,
    });
  }

  applies(file: FileDescriptor): boolean {
    return this.matcher.matches(file.relativePath) && this.appliesTo(file);
  }

  /**
   * Content-type restriction on top of path matching.
   * Override in subclasses (e.g. text-only rules).
   */
  protected appliesTo(_file: FileDescriptor): boolean {
    return true;
  }

  protected createFinding(
    severity: Severity,
    message: string,
    location?: FindingLocation,
    code: string = this.code
  ): Finding {
    return location
      ? { rule: this.name, code, severity, message, location }
      : { rule: this.name, code, severity, message };
  }
}

/**
 * Base class for rules evaluated one file at a time.
 */
export abstract class BaseFileRule extends RuleSupport implements FileRule {
  readonly kind = 'file' as const;

  abstract evaluate(content: FileContent, file: FileDescriptor): Finding[];
}

/**
 * Base class for rules that compare files across a run.
 */
export abstract class BaseCrossFileRule extends RuleSupport implements CrossFileRule {
  readonly kind = 'cross-file' as const;

  abstract evaluate(subjects: readonly CrossFileSubject[]): Map<string, Finding[]>;
}

/**
 * Restricts a rule to text content.
 */
export function isTextFile(file: FileDescriptor): boolean {
  return !file.binary;
}
