/**
 * Path matcher for include/exclude patterns (gitignore syntax).
 * Used by discovery and by per-rule applicability.
 */

import ignore, { type Ignore } from 'ignore';

/**
 * PathMatcher instance for filtering file paths.
 */
export interface PathMatcher {
  /**
   * Check if a file path matches the patterns.
   * Returns true if the path should be included.
   * @param filePath - Relative POSIX path from the analysis root
   */
  matches(filePath: string): boolean;

  /**
   * Check the exclude patterns only.
   * Directory paths should carry a trailing slash.
   */
  isExcluded(filePath: string): boolean;
}

/**
 * Paths that leave the root, or are absolute, are outside what the patterns describe.
 */
function isOutsideRoot(normalizedPath: string): boolean {
  return (
    normalizedPath === '..' ||
    normalizedPath.startsWith('../') ||
    normalizedPath.startsWith('/') ||
    /^[A-Za-z]:/.test(normalizedPath)
  );
}

/**
 * Create a PathMatcher for include/exclude pattern matching.
 *
 * Logic:
 * - If include is empty, all files are initially included
 * - If include has patterns, only files matching include are considered
 * - Exclude patterns then filter out files from the included set
 * - A path outside the root matches no pattern
 *
 * @param include - Glob patterns for files to include
 * @param exclude - Glob patterns for files to exclude
 */
export function createPathMatcher(
  include: string[] = [],
  exclude: string[] = []
): PathMatcher {
  const includeFilter: Ignore | null = include.length > 0 ? ignore().add(include) : null;
  const excludeFilter: Ignore = ignore().add(exclude);

  const normalize = (filePath: string): string => filePath.replace(/\\/g, '/').replace(/^\.\//, '');

  const isExcluded = (filePath: string): boolean => {
    const normalizedPath = normalize(filePath);
    if (normalizedPath === '' || isOutsideRoot(normalizedPath)) {
      return false;
    }
    return excludeFilter.ignores(normalizedPath);
  };

  const matches = (filePath: string): boolean => {
    const normalizedPath = normalize(filePath);
    if (normalizedPath === '') {
      return false;
    }
    if (isOutsideRoot(normalizedPath)) {
      return includeFilter === null;
    }

    // The ignore package's ignores() returns true if the path matches,
    // so for the include filter a hit means "keep"
    if (includeFilter && !includeFilter.ignores(normalizedPath)) {
      return false;
    }

    return !excludeFilter.ignores(normalizedPath);
  };

  return { matches, isExcluded };
}
