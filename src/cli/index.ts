import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createReportCommand } from './commands/report.js';
import { createInitCommand } from './commands/init.js';
import { createCacheCommand } from './commands/cache.js';
import { createWatchCommand } from './commands/watch.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('filequal')
    .description('Score files for size, encoding, whitespace, naming and duplication problems')
    .version(readVersion());
  [createAnalyzeCommand, createReportCommand, createInitCommand, createCacheCommand, createWatchCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
