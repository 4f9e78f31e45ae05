import chalk from 'chalk';
import { SEVERITY_LEVELS, type Finding, type Severity } from '../../core/rules/types.js';
import type { FileResult, FileStatus, RunReport } from '../../core/report/types.js';
import type { RunStats } from '../../core/analysis/types.js';
import type { IFormatter, FormatOptions } from './types.js';
import { formatDuration, formatScore, pluralize } from '../../utils/format.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'magenta' | 'dim';

const SEVERITY_COLORS: Record<Severity, Color> = {
  info: 'dim',
  low: 'cyan',
  medium: 'yellow',
  high: 'magenta',
  critical: 'red',
};

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      showPassing: options.showPassing ?? options.verbose ?? false,
    };
  }

  formatResult(result: FileResult): string {
    const lines: string[] = [];

    const statusIcon = this.getStatusIcon(result.status);
    const score = result.status === 'ungraded' ? 'ungraded' : `score ${formatScore(result.score)}`;
    lines.push(`${statusIcon} ${result.relativePath} ${this.colorize(`(${score})`, 'dim')}`);

    for (const finding of result.findings) {
      lines.push(this.formatFinding(finding));
    }

    for (const [rule, count] of Object.entries(result.suppressed)) {
      lines.push(`      ${this.colorize(`… ${pluralize(count, 'more finding')} from ${rule} not shown`, 'dim')}`);
    }

    return lines.join('\n');
  }

  formatReport(report: RunReport): string {
    const lines: string[] = [];

    for (const result of report.files) {
      if (!this.options.showPassing && result.findings.length === 0) {
        continue;
      }
      lines.push(this.formatResult(result));
      lines.push('');
    }

    if (report.discoveryFindings.length > 0) {
      lines.push(this.colorize(`SKIPPED (${report.discoveryFindings.length}):`, 'yellow'));
      for (const issue of report.discoveryFindings) {
        lines.push(`   ${issue.path}: ${issue.message}`);
      }
      lines.push('');
    }

    lines.push(this.formatSummary(report));

    return lines.join('\n');
  }

  /**
   * One-line run statistics, printed below the summary.
   */
  formatStats(stats: RunStats): string {
    const cache = stats.cacheHits + stats.cacheMisses > 0
      ? `, ${stats.cacheHits} from cache`
      : '';
    return this.colorize(
      `Analyzed ${pluralize(stats.filesAnalyzed, 'file')} in ${formatDuration(stats.durationMs)}${cache}`,
      'dim'
    );
  }

  private formatFinding(finding: Finding): string {
    const location = finding.location?.line !== undefined
      ? `Line ${finding.location.line}${finding.location.column !== undefined ? `:${finding.location.column}` : ''}`
      : 'File';
    const severity = this.colorize(finding.severity.toUpperCase(), SEVERITY_COLORS[finding.severity]);
    const code = this.options.verbose ? ` ${this.colorize(finding.code, 'dim')}` : '';
    return `      ${location}: ${severity} [${finding.rule}]${code} ${finding.message}`;
  }

  private formatSummary(report: RunReport): string {
    const { summary } = report;
    const lines: string[] = [];

    lines.push('═'.repeat(60));

    const passedText = this.colorize(`${summary.statusCounts.pass} passed`, 'green');
    const failedText = this.colorize(`${summary.statusCounts.fail} failed`, 'red');
    const ungradedText = this.colorize(`${summary.statusCounts.ungraded} ungraded`, 'dim');
    lines.push(`SUMMARY: ${passedText}, ${failedText}, ${ungradedText}`);

    const score = summary.aggregateScore === null ? 'n/a' : formatScore(summary.aggregateScore);
    lines.push(`Score: ${score}   Files: ${summary.totalFiles}   Flagged: ${summary.flaggedFiles}`);

    const severities = SEVERITY_LEVELS
      .filter((severity) => summary.severityCounts[severity] > 0)
      .map((severity) => this.colorize(`${summary.severityCounts[severity]} ${severity}`, SEVERITY_COLORS[severity]));
    if (severities.length > 0) {
      lines.push(`Findings: ${severities.join(', ')}`);
    }

    if (this.options.verbose) {
      lines.push(
        `Distribution: ${summary.distribution
          .map((b) => `${formatScore(b.min)}-${formatScore(b.max)}: ${b.count}`)
          .join('  ')}`
      );
    }

    if (summary.worstOffenders.length > 0) {
      lines.push('Worst offenders:');
      for (const offender of summary.worstOffenders) {
        lines.push(`   ${formatScore(offender.score).padStart(5)}  ${offender.relativePath} (${pluralize(offender.findings, 'finding')})`);
      }
    }

    if (!report.complete) {
      lines.push(this.colorize('Run was cancelled; the report is incomplete.', 'yellow'));
    }

    return lines.join('\n');
  }

  private getStatusIcon(status: FileStatus): string {
    switch (status) {
      case 'pass':
        return this.colorize('✓', 'green');
      case 'fail':
        return this.colorize('✗', 'red');
      case 'ungraded':
        return this.colorize('·', 'dim');
    }
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'magenta':
        return chalk.magenta(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
