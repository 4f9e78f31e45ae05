/**
 * Result cache contracts.
 */
import type { FileResult } from '../report/types.js';

/**
 * A persisted, versioned result. Served only when both the fingerprint
 * and the rule-set version match the current file and rule set.
 */
export interface CacheEntry {
  path: string;
  fingerprint: string;
  ruleSetVersion: string;
  result: FileResult;
  /** ISO-8601 */
  cachedAt: string;
}

export interface CacheStats {
  /** Entries currently stored */
  entries: number;
  hits: number;
  misses: number;
  /** Stored rows that failed validation and were treated as misses */
  corrupt: number;
}

/**
 * Keyed by path; one entry per path, updated atomically.
 */
export interface ResultCache {
  get(path: string, fingerprint: string, ruleSetVersion: string): FileResult | null;
  put(path: string, fingerprint: string, ruleSetVersion: string, result: FileResult): void;
  /** Drop entries whose path is not in keep; returns the number removed */
  prune(keep: ReadonlySet<string>): number;
  /** Drop every entry; returns the number removed */
  clear(): number;
  stats(): CacheStats;
  close(): void;
}
