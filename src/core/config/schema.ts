import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

/** File discovery configuration. */
export const ScanSettingsSchema = z.object({
  /** Gitignore-style patterns a file must match (empty: everything) */
  include: z.array(z.string()).default([]),
  /** Gitignore-style patterns excluded from discovery; directories are pruned */
  exclude: z.array(z.string()).default([
    'node_modules/',
    '.git/',
    'dist/',
    'build/',
    'coverage/',
    '.filequal/',
  ]),
  /** Maximum directory nesting below the root (0: root's own files only) */
  max_depth: z.number().int().min(0).default(32),
  follow_symlinks: z.boolean().default(false),
  /** Also apply patterns from .filequalignore at the root */
  use_ignore_file: z.boolean().default(true),
});

/** Settings shared by every rule. */
const ruleCommon = {
  enabled: z.boolean().default(true),
  /** Multiplier applied to this rule's penalties when scoring */
  weight: z.number().min(0).default(1),
  /** Restrict the rule to matching paths (empty: all paths) */
  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
};

export const SizeRuleSchema = z.object({
  ...ruleCommon,
  max_file_size_bytes: z.number().int().positive().default(1024 * 1024),
});

export const ExpectedEncodingSchema = z.enum(['utf-8', 'ascii']);

export const EncodingRuleSchema = z.object({
  ...ruleCommon,
  expected: ExpectedEncodingSchema.default('utf-8'),
  allow_bom: z.boolean().default(true),
});

export const LineEndingSchema = z.enum(['lf', 'crlf', 'cr']);

export const WhitespaceRuleSchema = z.object({
  ...ruleCommon,
  allowed_line_endings: z.array(LineEndingSchema).min(1).default(['lf']),
  trailing_whitespace: z.boolean().default(true),
  max_findings: z.number().int().min(1).default(20),
});

export const NamingCaseSchema = z.enum([
  'any',
  'kebab-case',
  'snake_case',
  'camelCase',
  'PascalCase',
  'UPPER_CASE',
  'lower',
]);

export const NamingRuleSchema = z.object({
  ...ruleCommon,
  /** Regular expression the full file name must match */
  pattern: z.string().refine(isValidRegex, 'Invalid regular expression').default('^[A-Za-z0-9._-]+$'),
  /** Case convention for the file stem (name without extensions) */
  case: NamingCaseSchema.default('any'),
  check_directories: z.boolean().default(false),
});

export const DuplicationRuleSchema = z.object({
  ...ruleCommon,
  /** Compare content with all whitespace removed */
  normalize_whitespace: z.boolean().default(false),
  /** Files smaller than this never count as duplicates */
  min_size_bytes: z.number().int().min(0).default(1),
});

export const RulesConfigSchema = z.object({
  size: withDefaults(SizeRuleSchema),
  encoding: withDefaults(EncodingRuleSchema),
  whitespace: withDefaults(WhitespaceRuleSchema),
  naming: withDefaults(NamingRuleSchema),
  duplication: withDefaults(DuplicationRuleSchema),
});

export const SeverityWeightsSchema = z.object({
  info: z.number().min(0).default(0),
  low: z.number().min(0).default(2),
  medium: z.number().min(0).default(5),
  high: z.number().min(0).default(10),
  critical: z.number().min(0).default(25),
});

/** How per-file scores combine into the run score. */
export const AggregateModeSchema = z.enum(['mean', 'median', 'min']);

export const ScoringSettingsSchema = z.object({
  baseline: z.number().positive().default(100),
  severity_weights: withDefaults(SeverityWeightsSchema),
  aggregate: AggregateModeSchema.default('mean'),
  /** Files scoring at or above this pass */
  pass_threshold: z.number().min(0).default(80),
  /** Number of lowest-scoring files listed in the report summary */
  worst_offenders: z.number().int().min(0).default(10),
});

export const AnalysisSettingsSchema = z.object({
  /** Files analyzed in parallel (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
  read_timeout_ms: z.number().int().positive().default(10_000),
  max_findings_per_rule: z.number().int().min(1).default(100),
});

export const CacheSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  /** SQLite database, relative to the analysis root */
  path: z.string().default('.filequal/cache.db'),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  scan: withDefaults(ScanSettingsSchema),
  rules: withDefaults(RulesConfigSchema),
  scoring: withDefaults(ScoringSettingsSchema),
  analysis: withDefaults(AnalysisSettingsSchema),
  cache: withDefaults(CacheSettingsSchema),
});

/** A config file; an empty file means all defaults */
export const ConfigFileSchema = withDefaults(ConfigSchema);

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type RulesConfig = z.infer<typeof RulesConfigSchema>;
export type SizeRuleConfig = z.infer<typeof SizeRuleSchema>;
export type EncodingRuleConfig = z.infer<typeof EncodingRuleSchema>;
export type WhitespaceRuleConfig = z.infer<typeof WhitespaceRuleSchema>;
export type NamingRuleConfig = z.infer<typeof NamingRuleSchema>;
export type DuplicationRuleConfig = z.infer<typeof DuplicationRuleSchema>;
export type LineEnding = z.infer<typeof LineEndingSchema>;
export type NamingCase = z.infer<typeof NamingCaseSchema>;
export type ExpectedEncoding = z.infer<typeof ExpectedEncodingSchema>;
export type ScoringSettings = z.infer<typeof ScoringSettingsSchema>;
export type AggregateMode = z.infer<typeof AggregateModeSchema>;
export type AnalysisSettings = z.infer<typeof AnalysisSettingsSchema>;
export type CacheSettings = z.infer<typeof CacheSettingsSchema>;
