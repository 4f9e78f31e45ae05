/**
 * FileDiscoverer - walks an analysis root in deterministic order.
 */
import * as path from 'node:path';
import type { Dirent, Stats } from 'node:fs';
import type { ScanSettings } from '../config/schema.js';
import type { DiscoveryFinding } from '../report/types.js';
import type { DiscoveredFile, DiscoveryOptions } from './types.js';
import {
  canReadDirectory,
  compareStrings,
  getStats,
  readDirSorted,
  realPath,
  relativePosixPath,
} from '../../utils/file-system.js';
import { createPathMatcher, type PathMatcher } from '../../utils/path-matcher.js';
import { loadIgnorePatterns } from '../../utils/ignore-file.js';
import { AccessError, ErrorCodes } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

function describeError(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Yields the files under a root, lazily and in code-unit order of path
 * segments. Each real file is yielded once, so symlink loops terminate.
 * Subpaths that cannot be read are skipped and reported by getIssues().
 */
export class FileDiscoverer {
  private readonly root: string;
  private readonly options: DiscoveryOptions;
  private readonly issues: DiscoveryFinding[] = [];
  private readonly seen = new Set<string>();
  private readonly skipFiles: ReadonlySet<string>;

  constructor(options: DiscoveryOptions) {
    this.root = path.resolve(options.root);
    this.options = options;
    this.skipFiles = new Set((options.skipFiles ?? []).map((file) => path.resolve(this.root, file)));
  }

  static fromSettings(
    root: string,
    scan: ScanSettings,
    signal?: AbortSignal,
    skipFiles?: readonly string[]
  ): FileDiscoverer {
    return new FileDiscoverer({
      root,
      include: scan.include,
      exclude: scan.exclude,
      maxDepth: scan.max_depth,
      followSymlinks: scan.follow_symlinks,
      useIgnoreFile: scan.use_ignore_file,
      skipFiles,
      signal,
    });
  }

  /**
   * Paths skipped so far, in the order they were met.
   */
  getIssues(): DiscoveryFinding[] {
    return [...this.issues];
  }

  /**
   * Walk the root.
   * @throws AccessError when the root does not exist or cannot be listed
   */
  async *discover(): AsyncGenerator<DiscoveredFile> {
    const rootStats = await this.statRoot();

    if (rootStats.isFile()) {
      yield { path: this.root, relativePath: path.basename(this.root) };
      return;
    }
    if (!rootStats.isDirectory()) {
      throw new AccessError(ErrorCodes.ROOT_UNREADABLE, `Root is neither a file nor a directory: ${this.root}`, {
        root: this.root,
      });
    }
    if (!(await canReadDirectory(this.root))) {
      throw new AccessError(ErrorCodes.ROOT_UNREADABLE, `Root directory is not readable: ${this.root}`, {
        root: this.root,
      });
    }

    const exclude = [...this.options.exclude];
    if (this.options.useIgnoreFile) {
      exclude.push(...(await loadIgnorePatterns(this.root)));
    }
    const matcher = createPathMatcher(this.options.include, exclude);

    this.seen.add(await realPath(this.root));
    yield* this.walk(this.root, 0, matcher);
  }

  /**
   * Resolve an explicit file list against the root.
   * Include and exclude patterns do not apply; missing or non-regular
   * entries become discovery findings.
   */
  async discoverList(paths: readonly string[]): Promise<DiscoveredFile[]> {
    const files: DiscoveredFile[] = [];

    for (const entry of paths) {
      const absolute = path.resolve(this.root, entry);
      let stats: Stats;
      try {
        stats = await getStats(absolute);
      } catch (error) {
        this.record(absolute, `Cannot access file (${describeError(error)})`);
        continue;
      }
      if (!stats.isFile()) {
        this.record(absolute, 'Not a regular file');
        continue;
      }

      const real = await realPath(absolute);
      if (this.seen.has(real)) continue;
      this.seen.add(real);
      files.push({ path: absolute, relativePath: relativePosixPath(this.root, absolute) });
    }

    return files.sort((a, b) => compareStrings(a.path, b.path));
  }

  private async statRoot(): Promise<Stats> {
    try {
      return await getStats(this.root);
    } catch (error) {
      const code = describeError(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new AccessError(ErrorCodes.ROOT_NOT_FOUND, `Root does not exist: ${this.root}`, { root: this.root });
      }
      throw new AccessError(ErrorCodes.ROOT_UNREADABLE, `Cannot access root ${this.root} (${code})`, {
        root: this.root,
      });
    }
  }

  private async *walk(dir: string, depth: number, matcher: PathMatcher): AsyncGenerator<DiscoveredFile> {
    if (this.options.signal?.aborted) return;

    let entries: Dirent[];
    try {
      entries = await readDirSorted(dir);
    } catch (error) {
      this.record(dir, `Cannot read directory (${describeError(error)})`);
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const relativePath = relativePosixPath(this.root, fullPath);

      let isDir = entry.isDirectory();
      let isFile = entry.isFile();

      if (entry.isSymbolicLink()) {
        if (!this.options.followSymlinks) {
          log.debug(`Skipping symlink ${relativePath}`);
          continue;
        }
        let target: Stats;
        try {
          target = await getStats(fullPath);
        } catch (error) {
          this.record(fullPath, `Broken symlink (${describeError(error)})`);
          continue;
        }
        isDir = target.isDirectory();
        isFile = target.isFile();
      }

      if (isDir) {
        if (depth >= this.options.maxDepth || matcher.isExcluded(`${relativePath}/`)) {
          continue;
        }
        const real = await this.resolveReal(fullPath);
        if (real === null || this.seen.has(real)) continue;
        this.seen.add(real);
        yield* this.walk(fullPath, depth + 1, matcher);
      } else if (isFile) {
        if (this.skipFiles.has(fullPath) || !matcher.matches(relativePath)) continue;
        const real = await this.resolveReal(fullPath);
        if (real === null || this.seen.has(real)) continue;
        this.seen.add(real);
        yield { path: fullPath, relativePath };
      }
    }
  }

  private async resolveReal(fullPath: string): Promise<string | null> {
    try {
      return await realPath(fullPath);
    } catch (error) {
      this.record(fullPath, `Cannot resolve path (${describeError(error)})`);
      return null;
    }
  }

  private record(filePath: string, message: string): void {
    log.debug(`Discovery skipped ${filePath}: ${message}`);
    this.issues.push({ path: filePath, code: ErrorCodes.DISCOVERY_SKIPPED, message });
  }
}

