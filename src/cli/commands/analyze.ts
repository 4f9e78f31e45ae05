/**
 * CLI command that runs an analysis pass and prints the report.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { runAnalysis } from '../../core/analysis/runner.js';
import type { AnalysisRun } from '../../core/analysis/types.js';
import type { Config } from '../../core/config/schema.js';
import { saveReport } from '../../core/report/serializer.js';
import { createFormatter, HumanFormatter, type OutputFormat } from '../formatters/index.js';
import { logger as log } from '../../utils/logger.js';
import {
  applyLogLevel,
  loadCommandConfig,
  parseInteger,
  parseOutputFormat,
  parseScore,
  type CommonOptions,
} from './helpers.js';

interface AnalyzeOptions extends CommonOptions {
  format: string;
  output?: string;
  cache: boolean;
  concurrency?: string;
  failUnder?: string;
  color: boolean;
}

/** Exit code when the aggregate score is below --fail-under */
export const EXIT_SCORE_BELOW_THRESHOLD = 2;

/**
 * Create the analyze command.
 */
export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Analyze files and report quality findings and scores')
    .argument('[paths...]', 'Explicit files to analyze (default: walk the root)')
    .option('-r, --root <dir>', 'Analysis root (default: current directory)')
    .option('-c, --config <path>', 'Path to config file, relative to the root')
    .option('-f, --format <format>', 'Output format: human, json, compact', 'human')
    .option('-o, --output <file>', 'Also save the report as JSON')
    .option('--no-cache', 'Ignore and do not update the result cache')
    .option('--concurrency <n>', 'Files analyzed in parallel')
    .option('--fail-under <score>', `Exit with code ${EXIT_SCORE_BELOW_THRESHOLD} when the aggregate score is lower`)
    .option('--no-color', 'Disable colored output')
    .option('-v, --verbose', 'Show debug output and finding codes')
    .option('-q, --quiet', 'Only print the report')
    .action(async (paths: string[], options: AnalyzeOptions) => {
      try {
        const exitCode = await runAnalyze(paths, options);
        if (exitCode !== 0) {
          process.exit(exitCode);
        }
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runAnalyze(paths: string[], options: AnalyzeOptions): Promise<number> {
  applyLogLevel(options);

  const format = parseOutputFormat(options.format);
  const concurrency = options.concurrency ? parseInteger(options.concurrency, 'concurrency', 1) : undefined;
  const failUnder = options.failUnder ? parseScore(options.failUnder) : undefined;
  const { root, config } = await loadCommandConfig(options);

  // First Ctrl+C finishes the current batch and reports what was done
  const controller = new AbortController();
  const onInterrupt = (): void => {
    log.warn('Interrupted; finishing the current batch');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  let run: AnalysisRun;
  try {
    run = await runAnalysis({
      root,
      config,
      paths: paths.length > 0 ? paths.map((p) => path.resolve(process.cwd(), p)) : undefined,
      cache: options.cache ? undefined : null,
      concurrency,
      signal: controller.signal,
    });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  printRun(run, format, options);

  if (options.output) {
    const outputPath = path.resolve(process.cwd(), options.output);
    await saveReport(run.report, outputPath);
    log.success(`Report saved to ${outputPath}`);
  }

  return exitCodeFor(run, config, failUnder);
}

function printRun(run: AnalysisRun, format: OutputFormat, options: AnalyzeOptions): void {
  const formatOptions = { colors: options.color, verbose: options.verbose ?? false };
  console.log(createFormatter(format, formatOptions).formatReport(run.report));

  if (format === 'human' && !options.quiet) {
    console.log(new HumanFormatter(formatOptions).formatStats(run.stats));
  }
}

/**
 * 0, or EXIT_SCORE_BELOW_THRESHOLD when --fail-under is not met.
 * A run with no graded files counts as a perfect score.
 */
export function exitCodeFor(run: AnalysisRun, config: Config, failUnder: number | undefined): number {
  if (failUnder === undefined) {
    return 0;
  }
  const score = run.report.summary.aggregateScore ?? config.scoring.baseline;
  return score < failUnder ? EXIT_SCORE_BELOW_THRESHOLD : 0;
}
