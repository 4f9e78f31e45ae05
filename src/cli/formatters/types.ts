/**
 * Formatter type definitions.
 */
import type { FileResult, RunReport } from '../../core/report/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'compact'];

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Verbose output (finding codes, suppressed counts, score distribution) */
  verbose: boolean;
  /** Show files without findings (default: false) */
  showPassing: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Format a single file result.
   */
  formatResult(result: FileResult): string;

  /**
   * Format a whole run report.
   */
  formatReport(report: RunReport): string;
}
