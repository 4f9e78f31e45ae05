/**
 * Rule registry - the ordered, immutable rule set of one analysis run.
 */
import type { CrossFileRule, FileDescriptor, FileRule, RuleDefinition } from './types.js';
import type { ScoringSettings } from '../config/schema.js';
import { getDefaultConfig } from '../config/loader.js';
import { computeObjectChecksum } from '../../utils/checksum.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { ENGINE_VERSION } from '../version.js';

/**
 * Run-wide settings that change what a cached result would contain,
 * and therefore feed into the rule-set version.
 */
export interface EvaluationSettings {
  scoring: ScoringSettings;
  maxFindingsPerRule: number;
}

/**
 * A rule that applies to a file. error is set when the rule's
 * predicate threw; the rule then stands for its own failure.
 */
export interface RuleMatch<R extends RuleDefinition> {
  rule: R;
  error?: unknown;
}

function defaultEvaluationSettings(): EvaluationSettings {
  const config = getDefaultConfig();
  return {
    scoring: config.scoring,
    maxFindingsPerRule: config.analysis.max_findings_per_rule,
  };
}

/**
 * Holds the enabled rules in registration order.
 * Never mutated: with() and without() return new registries.
 */
export class RuleRegistry {
  /** Changes whenever a rule, its configuration or the scoring setup changes */
  readonly version: string;
  readonly settings: Readonly<EvaluationSettings>;

  private readonly byName: ReadonlyMap<string, RuleDefinition>;
  private readonly order: ReadonlyMap<string, number>;

  private constructor(rules: readonly RuleDefinition[], settings: EvaluationSettings) {
    const byName = new Map<string, RuleDefinition>();
    for (const rule of rules) {
      if (byName.has(rule.name)) {
        throw new ConfigError(ErrorCodes.DUPLICATE_RULE, `Rule '${rule.name}' is registered twice`, {
          rule: rule.name,
        });
      }
      byName.set(rule.name, rule);
    }

    this.byName = byName;
    this.order = new Map(rules.map((rule, index) => [rule.name, index]));
    this.settings = Object.freeze({ ...settings });
    this.version = computeRuleSetVersion(rules, settings);
    Object.freeze(this);
  }

  static create(rules: readonly RuleDefinition[], settings?: EvaluationSettings): RuleRegistry {
    return new RuleRegistry(rules, settings ?? defaultEvaluationSettings());
  }

  /** All rules, in registration order. */
  get rules(): RuleDefinition[] {
    return [...this.byName.values()];
  }

  get(name: string): RuleDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** Registration index, used to order findings; -1 for unknown rules. */
  orderOf(name: string): number {
    return this.order.get(name) ?? -1;
  }

  /**
   * File rules that run on this file, in registration order.
   */
  applicableRules(file: FileDescriptor): RuleMatch<FileRule>[] {
    return matchRules(
      this.rules.filter((rule): rule is FileRule => rule.kind === 'file'),
      file
    );
  }

  /**
   * Cross-file rules that consider this file, in registration order.
   */
  applicableCrossFileRules(file: FileDescriptor): RuleMatch<CrossFileRule>[] {
    return matchRules(this.crossFileRules(), file);
  }

  /** Cross-file rules, in registration order. */
  crossFileRules(): CrossFileRule[] {
    return this.rules.filter((rule): rule is CrossFileRule => rule.kind === 'cross-file');
  }

  /**
   * New registry with the rule appended, or replacing the rule of the same name in place.
   */
  with(rule: RuleDefinition): RuleRegistry {
    const rules = this.has(rule.name)
      ? this.rules.map((existing) => (existing.name === rule.name ? rule : existing))
      : [...this.rules, rule];
    return new RuleRegistry(rules, this.settings);
  }

  without(name: string): RuleRegistry {
    return new RuleRegistry(this.rules.filter((rule) => rule.name !== name), this.settings);
  }
}

function matchRules<R extends RuleDefinition>(rules: readonly R[], file: FileDescriptor): RuleMatch<R>[] {
  const matches: RuleMatch<R>[] = [];
  for (const rule of rules) {
    try {
      if (rule.applies(file)) {
        matches.push({ rule });
      }
    } catch (error) {
      matches.push({ rule, error });
    }
  }
  return matches;
}

/**
 * Digest of everything that determines a file's result for given content.
 */
export function computeRuleSetVersion(
  rules: readonly RuleDefinition[],
  settings: EvaluationSettings
): string {
  return computeObjectChecksum({
    engine: ENGINE_VERSION,
    scoring: settings.scoring,
    maxFindingsPerRule: settings.maxFindingsPerRule,
    rules: rules.map((rule) => ({
      name: rule.name,
      kind: rule.kind,
      weight: rule.weight,
      maxFindings: rule.kind === 'file' ? rule.maxFindings : undefined,
      options: rule.options,
    })),
  });
}
