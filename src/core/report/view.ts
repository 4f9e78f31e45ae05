/**
 * ReportView - read-only queries over a RunReport for presentation layers.
 */
import * as path from 'node:path';
import { compareSeverity, type Severity } from '../rules/types.js';
import type { FileResult, FileStatus, RunReport } from './types.js';
import { compareStrings } from '../../utils/file-system.js';

export interface ReportFilter {
  status?: FileStatus | readonly FileStatus[];
  /** Lower-cased, without the dot; '' matches files without an extension */
  extension?: string | readonly string[];
  /** Keep files with at least one finding of this severity or worse */
  severity?: Severity;
  /** Keep files with at least one finding from this rule */
  rule?: string;
}

export type SortOrder = 'asc' | 'desc';

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function asList<T>(value: T | readonly T[] | undefined): readonly T[] | undefined {
  if (value === undefined) return undefined;
  return isList(value) ? value : [value];
}

export class ReportView {
  private readonly byPath: ReadonlyMap<string, FileResult>;

  constructor(readonly report: RunReport) {
    this.byPath = new Map(report.files.map((f) => [f.path, f]));
  }

  get files(): readonly FileResult[] {
    return this.report.files;
  }

  /**
   * Look up a file by absolute path or by path relative to the report root.
   */
  file(filePath: string): FileResult | undefined {
    return this.byPath.get(path.resolve(this.report.root, filePath));
  }

  /** Files with at least one finding of exactly this severity. */
  bySeverity(severity: Severity): FileResult[] {
    return this.report.files.filter((f) => f.findings.some((finding) => finding.severity === severity));
  }

  /**
   * Files by score; ties keep path order.
   */
  sortedByScore(order: SortOrder = 'asc'): FileResult[] {
    const direction = order === 'asc' ? 1 : -1;
    return [...this.report.files].sort(
      (a, b) => direction * (a.score - b.score) || compareStrings(a.path, b.path)
    );
  }

  filter(criteria: ReportFilter): FileResult[] {
    const statuses = asList(criteria.status);
    const extensions = asList(criteria.extension)?.map((e) => e.replace(/^\./, '').toLowerCase());
    const minSeverity = criteria.severity;

    return this.report.files.filter((f) => {
      if (statuses && !statuses.includes(f.status)) return false;
      if (extensions && !extensions.includes(f.extension)) return false;
      if (minSeverity && !f.findings.some((x) => compareSeverity(x.severity, minSeverity) >= 0)) return false;
      if (criteria.rule && !f.findings.some((x) => x.rule === criteria.rule)) return false;
      return true;
    });
  }

  statusCounts(): Record<FileStatus, number> {
    return { ...this.report.summary.statusCounts };
  }

  /**
   * File count per extension, most common first ('' for no extension).
   */
  extensionDistribution(): Array<{ extension: string; count: number }> {
    const counts = new Map<string, number>();
    for (const file of this.report.files) {
      counts.set(file.extension, (counts.get(file.extension) ?? 0) + 1);
    }
    return [...counts]
      .map(([extension, count]) => ({ extension, count }))
      .sort((a, b) => b.count - a.count || compareStrings(a.extension, b.extension));
  }

  /**
   * The n lowest-scoring graded files that have findings.
   */
  worstOffenders(n: number): FileResult[] {
    return this.sortedByScore('asc')
      .filter((f) => f.status !== 'ungraded' && f.findings.length > 0)
      .slice(0, n);
  }
}
