import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { configExists, getConfigPath, writeDefaultConfig } from '../../core/config/loader.js';
import { fileExists, writeFile } from '../../utils/file-system.js';
import { IGNORE_FILENAME, renderStarterIgnoreFile } from '../../utils/ignore-file.js';
import { logger as log } from '../../utils/logger.js';
import { resolveRoot } from './helpers.js';

interface InitOptions {
  root?: string;
  config?: string;
  force?: boolean;
}

/**
 * Create the init command.
 */
export function createInitCommand(): Command {
  return new Command('init')
    .description('Write a default configuration and ignore file')
    .option('-r, --root <dir>', 'Project root (default: current directory)')
    .option('-c, --config <path>', 'Config file to write, relative to the root')
    .option('--force', 'Overwrite existing configuration')
    .action(async (options: InitOptions) => {
      try {
        await runInit(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runInit(options: InitOptions): Promise<void> {
  const root = resolveRoot(options.root);

  if (!options.force && (await configExists(root, options.config))) {
    log.warn(`${path.relative(root, getConfigPath(root, options.config))} already exists. Use --force to overwrite.`);
    return;
  }

  console.log();
  console.log(chalk.bold('Initializing filequal...'));
  console.log();

  const configPath = await writeDefaultConfig(root, options.config);
  log.success(`Created ${path.relative(root, configPath)}`);

  const ignorePath = path.join(root, IGNORE_FILENAME);
  if (options.force || !(await fileExists(ignorePath))) {
    await writeFile(ignorePath, renderStarterIgnoreFile());
    log.success(`Created ${IGNORE_FILENAME}`);
  }

  console.log();
  console.log(`Run ${chalk.cyan('filequal analyze')} to check the project.`);
}
