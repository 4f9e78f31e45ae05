/**
 * Option parsing shared by the CLI commands.
 */
import * as path from 'node:path';
import { logger } from '../../utils/logger.js';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { SEVERITY_LEVELS, type Severity } from '../../core/rules/types.js';
import { FILE_STATUSES, type FileStatus } from '../../core/report/types.js';
import { OUTPUT_FORMATS, type OutputFormat } from '../formatters/types.js';

export interface CommonOptions {
  root?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * --verbose turns on debug output, --quiet silences everything but the report.
 */
export function applyLogLevel(options: { verbose?: boolean; quiet?: boolean }): void {
  if (options.quiet) {
    logger.setLevel('silent');
  } else if (options.verbose) {
    logger.setLevel('debug');
  }
}

export function resolveRoot(root: string | undefined): string {
  return path.resolve(process.cwd(), root ?? '.');
}

export async function loadCommandConfig(options: CommonOptions): Promise<{ root: string; config: Config }> {
  const root = resolveRoot(options.root);
  return { root, config: await loadConfig(root, options.config) };
}

export function parseInteger(value: string, name: string, min: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`Invalid ${name}: '${value}' (expected an integer >= ${min})`);
  }
  return parsed;
}

export function parseScore(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid score: '${value}' (expected a non-negative number)`);
  }
  return parsed;
}

export function splitList(value: string | undefined): string[] {
  return value ? value.split(',').map((v) => v.trim()).filter(Boolean) : [];
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

export function isSeverity(value: string): value is Severity {
  return SEVERITY_LEVELS.some((s) => s === value);
}

export function isFileStatus(value: string): value is FileStatus {
  return FILE_STATUSES.some((s) => s === value);
}

export function parseOutputFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new Error(`Invalid format: '${value}' (valid: ${OUTPUT_FORMATS.join(', ')})`);
  }
  return value;
}

export function parseSeverity(value: string): Severity {
  if (!isSeverity(value)) {
    throw new Error(`Invalid severity: '${value}' (valid: ${SEVERITY_LEVELS.join(', ')})`);
  }
  return value;
}

export function parseStatuses(value: string | undefined): FileStatus[] | undefined {
  const requested = splitList(value);
  if (requested.length === 0) return undefined;
  const invalid = requested.filter((s) => !isFileStatus(s));
  if (invalid.length > 0) {
    throw new Error(`Invalid status: ${invalid.join(', ')} (valid: ${FILE_STATUSES.join(', ')})`);
  }
  return requested.filter(isFileStatus);
}
