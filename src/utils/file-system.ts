/**
 * File system operations - reading, writing, and directory listing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file as raw bytes.
 * When timeoutMs is given the read is aborted after that many milliseconds.
 */
export async function readFileBytes(filePath: string, timeoutMs?: number): Promise<Buffer> {
  if (timeoutMs === undefined) {
    return fs.promises.readFile(filePath);
  }
  return fs.promises.readFile(filePath, { signal: AbortSignal.timeout(timeoutMs) });
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Write content through a temporary sibling and rename it into place,
 * so readers never observe a half-written file.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  await fs.promises.writeFile(tempPath, content, 'utf-8');
  try {
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * List a directory with entry types, sorted by name in code-unit order.
 */
export async function readDirSorted(dirPath: string): Promise<fs.Dirent[]> {
  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  return entries.sort((a, b) => compareStrings(a.name, b.name));
}

/**
 * Get the real path of a file (resolving symlinks).
 */
export async function realPath(filePath: string): Promise<string> {
  return fs.promises.realpath(filePath);
}

/**
 * Get file stats (follows symlinks).
 */
export async function getStats(filePath: string): Promise<fs.Stats> {
  return fs.promises.stat(filePath);
}

/**
 * Check that a directory can be listed.
 */
export async function canReadDirectory(dirPath: string): Promise<boolean> {
  try {
    await fs.promises.access(dirPath, fs.constants.R_OK | fs.constants.X_OK);
    return true;
  } catch { /* no permission */ }
  return false;
}

/**
 * Relative path from one path to another, with forward slashes.
 */
export function relativePosixPath(from: string, to: string): string {
  return toPosixPath(path.relative(from, to));
}

/**
 * Convert platform separators to forward slashes.
 */
export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Extension of a path, lower-cased, without the leading dot ('' when none).
 */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/**
 * Ordinal string comparison, independent of locale.
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
