/**
 * CLI command for querying a saved report.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadReport } from '../../core/report/serializer.js';
import { ReportView, type ReportFilter, type SortOrder } from '../../core/report/view.js';
import type { FileResult } from '../../core/report/types.js';
import { HumanFormatter } from '../formatters/human.js';
import { formatScore, pluralize } from '../../utils/format.js';
import { logger as log } from '../../utils/logger.js';
import { parseInteger, parseSeverity, parseStatuses, splitList } from './helpers.js';

interface ReportOptions {
  status?: string;
  severity?: string;
  extension?: string;
  rule?: string;
  sort?: string;
  limit?: string;
  json?: boolean;
  color: boolean;
}

/**
 * Create the report command.
 */
export function createReportCommand(): Command {
  return new Command('report')
    .description('Query a report saved with analyze --output')
    .argument('<file>', 'Saved JSON report')
    .option('--status <statuses>', 'Filter by status (comma-separated: pass,fail,ungraded)')
    .option('--severity <level>', 'Files with a finding at or above this severity')
    .option('--extension <exts>', 'Filter by extension (comma-separated, without dots)')
    .option('--rule <name>', 'Files with a finding from this rule')
    .option('--sort <order>', 'Sort by score: asc or desc (default: path order)')
    .option('--limit <n>', 'Show at most n files')
    .option('--json', 'Output matching files as JSON')
    .option('--no-color', 'Disable colored output')
    .action(async (file: string, options: ReportOptions) => {
      try {
        await runReport(file, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

function parseSortOrder(value: string): SortOrder {
  if (value === 'asc' || value === 'desc') {
    return value;
  }
  throw new Error(`Invalid sort order: '${value}' (valid: asc, desc)`);
}

async function runReport(file: string, options: ReportOptions): Promise<void> {
  const filter: ReportFilter = {
    status: parseStatuses(options.status),
    severity: options.severity ? parseSeverity(options.severity) : undefined,
    extension: options.extension ? splitList(options.extension) : undefined,
    rule: options.rule,
  };
  const order = options.sort ? parseSortOrder(options.sort) : undefined;
  const limit = options.limit ? parseInteger(options.limit, 'limit', 0) : undefined;

  const view = new ReportView(await loadReport(file));
  const files = selectFiles(view, filter, order, limit);

  if (options.json) {
    console.log(JSON.stringify(files, null, 2));
    return;
  }

  printOverview(view, options.color);
  console.log();

  if (files.length === 0) {
    console.log('No files match.');
    return;
  }

  const formatter = new HumanFormatter({ colors: options.color });
  for (const result of files) {
    console.log(formatter.formatResult(result));
  }
  console.log();
  console.log(`${pluralize(files.length, 'file')} shown`);
}

/**
 * Apply filters, then the optional score ordering and limit.
 */
export function selectFiles(
  view: ReportView,
  filter: ReportFilter,
  order: SortOrder | undefined,
  limit: number | undefined
): FileResult[] {
  const matching = new Set(view.filter(filter));
  const ordered = order ? view.sortedByScore(order).filter((f) => matching.has(f)) : [...matching];
  return limit === undefined ? ordered : ordered.slice(0, limit);
}

function printOverview(view: ReportView, colors: boolean): void {
  const { report } = view;
  const paint = (text: string, color: (s: string) => string): string => (colors ? color(text) : text);
  const counts = view.statusCounts();
  const score = report.summary.aggregateScore === null ? 'n/a' : formatScore(report.summary.aggregateScore);

  console.log(paint(`Report for ${report.root}`, chalk.bold));
  console.log(paint(`Generated ${report.timestamp}${report.complete ? '' : ' (incomplete)'}`, chalk.dim));
  console.log(
    `Score: ${score}   ${paint(`${counts.pass} passed`, chalk.green)}, ${paint(`${counts.fail} failed`, chalk.red)}, ${counts.ungraded} ungraded`
  );

  const types = view.extensionDistribution()
    .map(({ extension, count }) => `${extension === '' ? '(none)' : extension}: ${count}`)
    .join(', ');
  if (types) {
    console.log(`File types: ${types}`);
  }
}
