/**
 * Rule, finding and file descriptor type definitions.
 */

/** Severity ladder, lowest first. */
export const SEVERITY_LEVELS = ['info', 'low', 'medium', 'high', 'critical'] as const;

export type Severity = (typeof SEVERITY_LEVELS)[number];

/**
 * Order severities; positive when a is more severe than b.
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_LEVELS.indexOf(a) - SEVERITY_LEVELS.indexOf(b);
}

/**
 * Where in a file a finding applies. Lines and columns are 1-based,
 * offsets are 0-based byte offsets.
 */
export interface FindingLocation {
  line?: number;
  column?: number;
  offset?: number;
}

/**
 * A single reported quality issue, produced by one rule.
 */
export interface Finding {
  /** Name of the rule that produced it */
  readonly rule: string;
  /** Stable finding code (FQ001, ...) */
  readonly code: string;
  readonly severity: Severity;
  readonly message: string;
  readonly location?: FindingLocation;
}

/**
 * What a rule may know about a file besides its content.
 */
export interface FileDescriptor {
  /** Absolute, normalized path */
  readonly path: string;
  /** POSIX path relative to the analysis root */
  readonly relativePath: string;
  /** Lower-cased extension without the dot ('' when none) */
  readonly extension: string;
  readonly size: number;
  /** Content looks binary (NUL byte near the start) */
  readonly binary: boolean;
}

/**
 * File content handed to file rules.
 */
export interface FileContent {
  readonly bytes: Uint8Array;
  /** UTF-8 decoding of bytes; malformed sequences become U+FFFD */
  readonly text: string;
}

/**
 * Per-file facts a cross-file rule compares.
 */
export interface CrossFileSubject {
  readonly file: FileDescriptor;
  readonly fingerprint: string;
  readonly normalizedFingerprint: string;
}

/** JSON-compatible rule configuration; part of the rule-set version. */
export type RuleOptions = Readonly<Record<string, unknown>>;

interface RuleCapabilities {
  readonly name: string;
  readonly description: string;
  /** Multiplier applied to this rule's penalties when scoring */
  readonly weight: number;
  readonly options: RuleOptions;
  /** Whether the rule runs on this file */
  applies(file: FileDescriptor): boolean;
}

/**
 * A rule evaluated on one file at a time.
 * Must be pure: same content and descriptor, same findings.
 */
export interface FileRule extends RuleCapabilities {
  readonly kind: 'file';
  /** Per-file cap on this rule's findings, tighter than the run-wide cap */
  readonly maxFindings?: number;
  evaluate(content: FileContent, file: FileDescriptor): Finding[];
}

/**
 * A rule evaluated over every file of a run at once.
 * Returns findings keyed by absolute file path.
 */
export interface CrossFileRule extends RuleCapabilities {
  readonly kind: 'cross-file';
  evaluate(subjects: readonly CrossFileSubject[]): Map<string, Finding[]>;
}

export type RuleDefinition = FileRule | CrossFileRule;

/**
 * Settings every built-in rule accepts.
 */
export interface RuleSettings {
  weight: number;
  include: string[];
  exclude: string[];
}
