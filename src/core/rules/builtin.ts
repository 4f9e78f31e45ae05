/**
 * Built-in rules, assembled from configuration.
 */
import type { Config } from '../config/schema.js';
import type { RuleDefinition, RuleSettings } from './types.js';
import { SizeRule } from './size.js';
import { EncodingRule } from './encoding.js';
import { WhitespaceRule } from './whitespace.js';
import { NamingRule } from './naming.js';
import { DuplicationRule } from './duplication.js';
import { RuleRegistry } from './registry.js';

function settingsOf(rule: { weight: number; include: string[]; exclude: string[] }): RuleSettings {
  return { weight: rule.weight, include: rule.include, exclude: rule.exclude };
}

/**
 * Instantiate every enabled built-in rule, in canonical order:
 * size, encoding, whitespace, naming, duplication.
 */
export function createBuiltinRules(config: Config): RuleDefinition[] {
  const { size, encoding, whitespace, naming, duplication } = config.rules;
  const rules: RuleDefinition[] = [];

  if (size.enabled) {
    rules.push(new SizeRule(settingsOf(size), { maxFileSizeBytes: size.max_file_size_bytes }));
  }
  if (encoding.enabled) {
    rules.push(
      new EncodingRule(settingsOf(encoding), {
        expected: encoding.expected,
        allowBom: encoding.allow_bom,
      })
    );
  }
  if (whitespace.enabled) {
    rules.push(
      new WhitespaceRule(settingsOf(whitespace), {
        allowedLineEndings: whitespace.allowed_line_endings,
        trailingWhitespace: whitespace.trailing_whitespace,
        maxFindings: whitespace.max_findings,
      })
    );
  }
  if (naming.enabled) {
    rules.push(
      new NamingRule(settingsOf(naming), {
        pattern: naming.pattern,
        case: naming.case,
        checkDirectories: naming.check_directories,
      })
    );
  }
  if (duplication.enabled) {
    rules.push(
      new DuplicationRule(settingsOf(duplication), {
        normalizeWhitespace: duplication.normalize_whitespace,
        minSizeBytes: duplication.min_size_bytes,
      })
    );
  }

  return rules;
}

/**
 * Registry of the enabled built-in rules for a configuration.
 */
export function createRegistry(config: Config): RuleRegistry {
  return RuleRegistry.create(createBuiltinRules(config), {
    scoring: config.scoring,
    maxFindingsPerRule: config.analysis.max_findings_per_rule,
  });
}

/**
 * Whether duplicate detection compares whitespace-stripped content.
 */
export function normalizesWhitespace(config: Config): boolean {
  return config.rules.duplication.enabled && config.rules.duplication.normalize_whitespace;
}
