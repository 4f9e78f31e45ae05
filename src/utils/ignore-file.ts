/**
 * .filequalignore support - gitignore-style patterns excluded from discovery.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { fileExists } from './file-system.js';
import { logger } from './logger.js';

export const IGNORE_FILENAME = '.filequalignore';

/**
 * Patterns written by `filequal init`. Not applied unless present in the file.
 */
const STARTER_PATTERNS = [
  'node_modules/',
  '.git/',
  'dist/',
  'build/',
  'coverage/',
  '.filequal/',
];

/**
 * Load ignore patterns from the analysis root.
 * Returns an empty list if no ignore file exists.
 */
export async function loadIgnorePatterns(root: string): Promise<string[]> {
  const ignorePath = join(root, IGNORE_FILENAME);

  if (!(await fileExists(ignorePath))) {
    return [];
  }

  try {
    const content = await readFile(ignorePath, 'utf-8');
    return parseIgnoreFile(content);
  } catch (error) {
    logger.warn(`Could not read ${IGNORE_FILENAME}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    return [];
  }
}

/**
 * Parse ignore file content.
 * Follows gitignore syntax:
 * - Lines starting with # are comments
 * - Empty lines are ignored
 * - Patterns starting with ! are negations
 */
export function parseIgnoreFile(content: string): string[] {
  const patterns: string[] = [];

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    patterns.push(trimmed);
  }

  return patterns;
}

/**
 * Content for a fresh ignore file.
 */
export function renderStarterIgnoreFile(): string {
  return [
    '# Paths excluded from file quality analysis (gitignore syntax)',
    ...STARTER_PATTERNS,
    '',
  ].join('\n');
}
