import type { FileContent, FileDescriptor, Finding, RuleSettings } from './types.js';
import { BaseFileRule } from './base.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { NamingCase } from '../config/schema.js';

export interface NamingRuleOptions {
  pattern: string;
  case: NamingCase;
  checkDirectories: boolean;
}

/**
 * Case patterns for naming conventions.
 * Each maps to a regex pattern that matches that naming style.
 */
const CASE_PATTERNS: Record<Exclude<NamingCase, 'any'>, RegExp> = {
  'kebab-case': /^[a-z][a-z0-9]*(?:-[a-z0-9]+)*$/,
  snake_case: /^[a-z][a-z0-9]*(?:_[a-z0-9]+)*$/,
  camelCase: /^[a-z][a-zA-Z0-9]*$/,
  PascalCase: /^[A-Z][a-zA-Z0-9]*$/,
  UPPER_CASE: /^[A-Z][A-Z0-9]*(?:_[A-Z0-9]+)*$/,
  lower: /^[a-z0-9._-]+$/,
};

/**
 * Name without extensions: `report.test.ts` → `report`.
 * Dotfiles keep their name: `.editorconfig` → `.editorconfig`.
 */
export function fileStem(name: string): string {
  if (name.startsWith('.')) {
    return name;
  }
  const dot = name.indexOf('.');
  return dot === -1 ? name : name.slice(0, dot);
}

/**
 * Flags file names (and optionally directory names) that break the
 * configured pattern or case convention.
 */
export class NamingRule extends BaseFileRule {
  readonly name = 'naming';
  readonly description = 'File and directory names follow the naming convention';
  protected readonly code = ErrorCodes.NAMING_VIOLATION;

  private readonly pattern: RegExp;
  private readonly casePattern: RegExp | null;
  private readonly caseName: NamingCase;
  private readonly checkDirectories: boolean;

  constructor(settings: RuleSettings, options: NamingRuleOptions) {
    super(settings, {
      pattern: options.pattern,
      case: options.case,
      checkDirectories: options.checkDirectories,
    });
    try {
      this.pattern = new RegExp(options.pattern);
    } catch (error) {
      throw new ConfigError(
        ErrorCodes.INVALID_PATTERN,
        `Invalid naming pattern '${options.pattern}': ${error instanceof Error ? error.message : 'Unknown error'}`,
        { pattern: options.pattern }
      );
    }
    this.caseName = options.case;
    this.casePattern = options.case === 'any' ? null : CASE_PATTERNS[options.case];
    this.checkDirectories = options.checkDirectories;
  }

  evaluate(_content: FileContent, file: FileDescriptor): Finding[] {
    const segments = file.relativePath.split('/');
    const fileName = segments[segments.length - 1];
    const findings: Finding[] = [];

    if (this.checkDirectories) {
      // '..' leads out of the root and is not a name to check
      for (const dir of segments.slice(0, -1).filter((segment) => segment !== '..')) {
        const problem = this.check(dir, dir);
        if (problem) {
          findings.push(this.createFinding('low', `Directory name '${dir}' ${problem}`));
        }
      }
    }

    const problem = this.check(fileName, fileStem(fileName));
    if (problem) {
      findings.push(this.createFinding('low', `File name '${fileName}' ${problem}`));
    }

    return findings;
  }

  private check(name: string, stem: string): string | null {
    if (!this.pattern.test(name)) {
      return `does not match pattern ${this.pattern.source}`;
    }
    if (this.casePattern && !stem.startsWith('.') && !this.casePattern.test(stem)) {
      return `is not ${this.caseName}`;
    }
    return null;
  }
}
