/**
 * Per-file results and the run report built from them.
 */
import type { Finding, Severity } from '../rules/types.js';

/** ungraded: no rule applied to the file */
export type FileStatus = 'pass' | 'fail' | 'ungraded';

export const FILE_STATUSES: readonly FileStatus[] = ['pass', 'fail', 'ungraded'];

/**
 * Outcome of analyzing one file. Replaced, never patched.
 */
export interface FileResult {
  /** Absolute, normalized path */
  readonly path: string;
  /** POSIX path relative to the run root */
  readonly relativePath: string;
  /** SHA-256 of the raw bytes ('' when the file could not be read) */
  readonly fingerprint: string;
  /** Fingerprint used for duplicate grouping */
  readonly normalizedFingerprint: string;
  readonly size: number;
  readonly extension: string;
  readonly binary: boolean;
  /** Ordered by rule registration */
  readonly findings: readonly Finding[];
  /** Findings dropped by per-rule caps, by rule name */
  readonly suppressed: Readonly<Record<string, number>>;
  readonly score: number;
  readonly status: FileStatus;
}

/**
 * A path discovery skipped (unreadable directory, broken link, missing list entry).
 */
export interface DiscoveryFinding {
  readonly path: string;
  readonly code: string;
  readonly message: string;
}

export interface ScoreBucket {
  /** Inclusive lower bound */
  readonly min: number;
  /** Exclusive upper bound, except for the last bucket */
  readonly max: number;
  readonly count: number;
}

export interface WorstOffender {
  readonly path: string;
  readonly relativePath: string;
  readonly score: number;
  readonly findings: number;
}

export interface RunSummary {
  readonly totalFiles: number;
  readonly gradedFiles: number;
  /** null when no file was graded */
  readonly aggregateScore: number | null;
  readonly severityCounts: Readonly<Record<Severity, number>>;
  readonly statusCounts: Readonly<Record<FileStatus, number>>;
  readonly findingsByRule: Readonly<Record<string, number>>;
  readonly distribution: readonly ScoreBucket[];
  /** Graded files with at least one finding */
  readonly flaggedFiles: number;
  readonly worstOffenders: readonly WorstOffender[];
}

/**
 * Immutable snapshot of one analysis pass.
 */
export interface RunReport {
  readonly formatVersion: number;
  /** ISO-8601; the only field that differs between identical runs */
  readonly timestamp: string;
  readonly root: string;
  /** false when the run was cancelled before every file was analyzed */
  readonly complete: boolean;
  readonly ruleSetVersion: string;
  /** Sorted by path */
  readonly files: readonly FileResult[];
  readonly discoveryFindings: readonly DiscoveryFinding[];
  readonly summary: RunSummary;
}
