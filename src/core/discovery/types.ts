/**
 * File discovery types.
 */

export interface DiscoveredFile {
  /** Absolute, normalized path (as reached from the root, not the link target) */
  readonly path: string;
  /** POSIX path relative to the discovery root */
  readonly relativePath: string;
}

export interface DiscoveryOptions {
  root: string;
  /** Gitignore-style patterns a file must match (empty: all files) */
  include: string[];
  /** Gitignore-style patterns to skip; matching directories are not entered */
  exclude: string[];
  /** 0: only the root's own files */
  maxDepth: number;
  followSymlinks: boolean;
  /** Merge patterns from the root's ignore file into exclude */
  useIgnoreFile: boolean;
  /** Absolute paths never yielded by the walk, whatever the patterns say */
  skipFiles?: readonly string[];
  /** Stops the walk at the next directory boundary */
  signal?: AbortSignal;
}
