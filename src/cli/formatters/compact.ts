/**
 * Compact output formatter for CI/pre-commit hooks.
 * Provides single-line per issue output for easy parsing.
 */
import type { Finding } from '../../core/rules/types.js';
import type { FileResult, RunReport } from '../../core/report/types.js';
import type { IFormatter } from './types.js';
import { formatScore, pluralize } from '../../utils/format.js';

/**
 * Format: file:line:column: SEVERITY [rule/code] message
 */
export class CompactFormatter implements IFormatter {
  formatResult(result: FileResult): string {
    return result.findings.map((f) => this.formatFinding(result.relativePath, f)).join('\n');
  }

  formatReport(report: RunReport): string {
    const lines: string[] = [];

    for (const issue of report.discoveryFindings) {
      lines.push(`${issue.path}:0:0: SKIPPED [discovery/${issue.code}] ${issue.message}`);
    }

    for (const result of report.files) {
      const formatted = this.formatResult(result);
      if (formatted) {
        lines.push(formatted);
      }
    }

    lines.push('');
    lines.push(this.formatSummary(report));

    return lines.join('\n');
  }

  private formatFinding(file: string, finding: Finding): string {
    const line = finding.location?.line ?? 0;
    const column = finding.location?.column ?? 0;
    return `${file}:${line}:${column}: ${finding.severity.toUpperCase()} [${finding.rule}/${finding.code}] ${finding.message}`;
  }

  private formatSummary(report: RunReport): string {
    const { summary } = report;
    const total = Object.values(summary.severityCounts).reduce((sum, n) => sum + n, 0);
    const score = summary.aggregateScore === null ? 'n/a' : formatScore(summary.aggregateScore);
    const partial = report.complete ? '' : ' [incomplete]';

    return `SUMMARY: ${pluralize(total, 'finding')} in ${pluralize(summary.flaggedFiles, 'file')} (${pluralize(summary.totalFiles, 'file')} checked), score ${score}${partial}`;
  }
}
