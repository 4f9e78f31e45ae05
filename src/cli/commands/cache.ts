import { Command } from 'commander';
import * as path from 'node:path';
import { getCachePath, openResultCache } from '../../core/cache/open.js';
import { getStats } from '../../utils/file-system.js';
import { formatBytes, pluralize } from '../../utils/format.js';
import { logger as log } from '../../utils/logger.js';
import { loadCommandConfig, type CommonOptions } from './helpers.js';

/**
 * Create the cache command (stats, clear).
 */
export function createCacheCommand(): Command {
  const command = new Command('cache').description('Inspect or clear the result cache');

  command
    .command('stats')
    .description('Show cache location and entry count')
    .option('-r, --root <dir>', 'Project root (default: current directory)')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: CommonOptions) => {
      try {
        await runCacheStats(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });

  command
    .command('clear')
    .description('Remove every cached result')
    .option('-r, --root <dir>', 'Project root (default: current directory)')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: CommonOptions) => {
      try {
        await runCacheClear(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });

  return command;
}

async function runCacheStats(options: CommonOptions): Promise<void> {
  const { root, config } = await loadCommandConfig(options);
  if (!config.cache.enabled) {
    console.log('Result cache is disabled in the configuration.');
    return;
  }

  const cache = openResultCache(root, config.cache);
  if (!cache) return;

  try {
    const dbPath = getCachePath(root, config.cache);
    const { entries } = cache.stats();
    const size = (await getStats(dbPath)).size;
    console.log(`Cache:   ${path.relative(root, dbPath)}`);
    console.log(`Entries: ${entries}`);
    console.log(`Size:    ${formatBytes(size)}`);
  } finally {
    cache.close();
  }
}

async function runCacheClear(options: CommonOptions): Promise<void> {
  const { root, config } = await loadCommandConfig(options);
  const cache = openResultCache(root, { ...config.cache, enabled: true });
  if (!cache) return;

  try {
    const removed = cache.clear();
    log.success(`Cleared ${pluralize(removed, 'cached result')}`);
  } finally {
    cache.close();
  }
}
