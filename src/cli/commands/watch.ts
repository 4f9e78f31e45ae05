/**
 * CLI command that re-runs the analysis when files under the root change.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import chokidar from 'chokidar';
import { runAnalysis } from '../../core/analysis/runner.js';
import { getConfigPath, loadConfig } from '../../core/config/loader.js';
import { getCacheFiles } from '../../core/cache/open.js';
import type { Config } from '../../core/config/schema.js';
import { createFormatter, type OutputFormat } from '../formatters/index.js';
import { createPathMatcher, type PathMatcher } from '../../utils/path-matcher.js';
import { relativePosixPath } from '../../utils/file-system.js';
import { loadIgnorePatterns } from '../../utils/ignore-file.js';
import { logger as log } from '../../utils/logger.js';
import { applyLogLevel, loadCommandConfig, parseInteger, parseOutputFormat, type CommonOptions } from './helpers.js';

interface WatchOptions extends CommonOptions {
  format: string;
  debounce: string;
  clear?: boolean;
  color: boolean;
}

/**
 * Create the watch command.
 */
export function createWatchCommand(): Command {
  return new Command('watch')
    .description('Watch the root and re-analyze on changes')
    .option('-r, --root <dir>', 'Analysis root (default: current directory)')
    .option('-c, --config <path>', 'Path to config file, relative to the root')
    .option('-f, --format <format>', 'Output format: human, json, compact', 'compact')
    .option('--debounce <ms>', 'Debounce delay in milliseconds', '300')
    .option('--clear', 'Clear terminal between runs')
    .option('--no-color', 'Disable colored output')
    .option('-v, --verbose', 'Show debug output')
    .action(async (options: WatchOptions) => {
      try {
        await runWatch(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

/**
 * Build the chokidar `ignored` predicate from the scan excludes.
 * The config file and the directories leading to it are always watched;
 * ignoredFiles (the result cache) never are.
 */
export function createIgnoredPredicate(
  root: string,
  matcher: PathMatcher,
  configPath: string,
  ignoredFiles: readonly string[] = []
): (filePath: string) => boolean {
  const skipped = new Set(ignoredFiles.map((file) => path.resolve(file)));
  return (filePath: string): boolean => {
    const resolved = path.resolve(filePath);
    if (skipped.has(resolved)) return true;
    if (resolved === configPath || configPath.startsWith(`${resolved}${path.sep}`)) return false;
    const relative = relativePosixPath(root, filePath);
    if (relative === '' || relative.startsWith('..')) return false;
    return matcher.isExcluded(relative) || matcher.isExcluded(`${relative}/`);
  };
}

async function buildMatcher(root: string, config: Config): Promise<PathMatcher> {
  const ignorePatterns = config.scan.use_ignore_file ? await loadIgnorePatterns(root) : [];
  return createPathMatcher([], [...config.scan.exclude, ...ignorePatterns]);
}

async function runWatch(options: WatchOptions): Promise<void> {
  applyLogLevel(options);
  const format: OutputFormat = parseOutputFormat(options.format);
  const debounceMs = parseInteger(options.debounce, 'debounce', 0);

  const loaded = await loadCommandConfig(options);
  const { root } = loaded;
  let config = loaded.config;
  let matcher = await buildMatcher(root, config);
  const configPath = getConfigPath(root, options.config);

  const timestamp = (): string => chalk.dim(`[${new Date().toLocaleTimeString()}]`);

  console.log();
  console.log(chalk.bold.cyan('filequal watch'));
  console.log(chalk.dim('─'.repeat(50)));
  console.log(chalk.dim(`Root:     ${root}`));
  console.log(chalk.dim(`Config:   ${path.relative(root, configPath)}`));
  console.log(chalk.dim(`Debounce: ${debounceMs}ms`));
  console.log(chalk.dim('Press Ctrl+C to stop'));
  console.log();

  let running = false;
  let rerun = false;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let configChanged = false;

  const analyze = async (): Promise<void> => {
    if (running) {
      rerun = true;
      return;
    }
    running = true;
    try {
      if (configChanged) {
        configChanged = false;
        try {
          config = await loadConfig(root, options.config);
          matcher = await buildMatcher(root, config);
          console.log(timestamp(), chalk.green('✓ Reloaded config'));
        } catch (error) {
          console.log(timestamp(), chalk.red('✗ Reload failed:'), error instanceof Error ? error.message : 'Unknown error');
        }
      }

      if (options.clear) {
        console.clear();
      }
      const run = await runAnalysis({ root, config });
      console.log(createFormatter(format, { colors: options.color, verbose: options.verbose ?? false }).formatReport(run.report));
      console.log();
    } finally {
      running = false;
    }
    if (rerun) {
      rerun = false;
      await analyze();
    }
  };

  const schedule = (): void => {
    if (timer) {
      clearTimeout(timer);
    }
    timer = setTimeout(() => {
      timer = null;
      analyze().catch((err) => {
        log.error(`Analysis failed: ${err instanceof Error ? err.message : 'Unknown'}`);
      });
    }, debounceMs);
  };

  const watcher = chokidar.watch(root, {
    ignored: (filePath: string) => createIgnoredPredicate(root, matcher, configPath, getCacheFiles(root, config.cache))(filePath),
    ignoreInitial: true,
    persistent: true,
  });

  const onEvent = (label: string) => (filePath: string): void => {
    if (path.resolve(filePath) === configPath) {
      configChanged = true;
    }
    console.log(timestamp(), chalk.yellow(label), relativePosixPath(root, filePath));
    schedule();
  };

  watcher
    .on('ready', () => {
      console.log(timestamp(), chalk.green('✓ Watching for file changes...'));
      console.log();
      schedule();
    })
    .on('add', onEvent('File added:'))
    .on('change', onEvent('Change detected:'))
    .on('unlink', onEvent('File removed:'))
    .on('error', (err: unknown) => {
      log.error(`Watcher error: ${err instanceof Error ? err.message : 'Unknown error'}`);
    });

  process.on('SIGINT', () => {
    console.log();
    console.log(chalk.dim('Stopping watch mode...'));
    if (timer) {
      clearTimeout(timer);
    }
    watcher
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        log.error(`Failed to close watcher: ${err instanceof Error ? err.message : 'Unknown'}`);
        process.exit(1);
      });
  });
}
