/**
 * Analysis run types.
 */
import type { Config } from '../config/schema.js';
import type { RuleRegistry } from '../rules/registry.js';
import type { ResultCache } from '../cache/types.js';
import type { RunReport } from '../report/types.js';

export interface AnalyzerOptions {
  root: string;
  registry: RuleRegistry;
  /** null or omitted: no caching */
  cache?: ResultCache | null;
  /** Abort a single file read after this long */
  readTimeoutMs?: number;
  /** Group duplicates by whitespace-stripped content */
  normalizeWhitespace?: boolean;
}

export interface AnalysisOptions {
  root: string;
  config: Config;
  /** Explicit file list; bypasses the directory walk and its patterns */
  paths?: string[];
  /** Defaults to the built-in rules for config */
  registry?: RuleRegistry;
  /**
   * Omitted: open the persistent cache from config and close it afterwards.
   * null: run without a cache. A provided cache is left open.
   */
  cache?: ResultCache | null;
  /** Files analyzed in parallel; overrides config */
  concurrency?: number;
  signal?: AbortSignal;
  /** Report timestamp source */
  clock?: () => Date;
  /** Called after each batch with the running count of analyzed files */
  onProgress?: (analyzed: number) => void;
}

/**
 * Operational numbers for one run. Kept out of the report so that
 * identical inputs give identical reports.
 */
export interface RunStats {
  durationMs: number;
  filesAnalyzed: number;
  cacheHits: number;
  cacheMisses: number;
  cacheCorrupt: number;
  /** Cache entries dropped for files no longer present */
  cachePruned: number;
  discoveryIssues: number;
  cancelled: boolean;
}

export interface AnalysisRun {
  report: RunReport;
  stats: RunStats;
}
