import * as path from 'node:path';
import { mkdirSync } from 'node:fs';
import type { CacheSettings } from '../config/schema.js';
import type { ResultCache } from './types.js';
import { SqliteResultCache } from './sqlite-cache.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Resolve the cache database path for a root.
 */
export function getCachePath(root: string, settings: CacheSettings): string {
  return path.resolve(root, settings.path);
}

/**
 * The cache database and the journal files SQLite keeps beside it.
 */
export function getCacheFiles(root: string, settings: CacheSettings): string[] {
  const dbPath = getCachePath(root, settings);
  return [dbPath, `${dbPath}-journal`, `${dbPath}-shm`, `${dbPath}-wal`];
}

/**
 * Open the persistent cache for a root.
 * Returns null when caching is disabled or the database cannot be opened;
 * the run then proceeds without a cache.
 */
export function openResultCache(root: string, settings: CacheSettings): ResultCache | null {
  if (!settings.enabled) {
    return null;
  }

  const dbPath = getCachePath(root, settings);
  try {
    mkdirSync(path.dirname(dbPath), { recursive: true });
    return new SqliteResultCache(dbPath);
  } catch (error) {
    log.warn(
      `Result cache unavailable at ${dbPath}: ${error instanceof Error ? error.message : String(error)}. Continuing without cache.`
    );
    return null;
  }
}
