/**
 * SQLite-backed result cache.
 * One row per path; each put is a single upsert, so one entry is
 * replaced atomically without touching the others.
 */
import Database from 'better-sqlite3';
import type { FileResult } from '../report/types.js';
import type { CacheStats, ResultCache } from './types.js';
import { decodeCachedResult } from './decode.js';
import { CacheCorruptionError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

/** Current schema version */
export const CACHE_SCHEMA_VERSION = 1;

/** SQLite cache size in KB (negative means KB, positive means pages) */
const CACHE_SIZE_KB = -16000; // 16MB

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS results (
  path TEXT PRIMARY KEY,
  fingerprint TEXT NOT NULL,
  rule_set_version TEXT NOT NULL,
  result TEXT NOT NULL,
  cached_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT
);
`;

interface ResultRow {
  fingerprint: string;
  rule_set_version: string;
  result: string;
}

const cacheLog = log.child('cache');

export class SqliteResultCache implements ResultCache {
  private readonly db: Database.Database;
  private readonly selectStmt: Database.Statement<[string], ResultRow>;
  private readonly upsertStmt: Database.Statement<[string, string, string, string, string]>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private counters = { hits: 0, misses: 0, corrupt: 0 };

  /**
   * @param dbPath - Database file, or ':memory:'
   */
  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    try {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma(`cache_size = ${CACHE_SIZE_KB}`);
      this.initializeSchema();

      this.selectStmt = this.db.prepare<[string], ResultRow>(
        'SELECT fingerprint, rule_set_version, result FROM results WHERE path = ?'
      );
      this.upsertStmt = this.db.prepare<[string, string, string, string, string]>(`
        INSERT INTO results (path, fingerprint, rule_set_version, result, cached_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(path) DO UPDATE SET
          fingerprint = excluded.fingerprint,
          rule_set_version = excluded.rule_set_version,
          result = excluded.result,
          cached_at = excluded.cached_at
      `);
      this.deleteStmt = this.db.prepare<[string]>('DELETE FROM results WHERE path = ?');
    } catch (error) {
      this.db.close();
      throw error;
    }
  }

  get(path: string, fingerprint: string, ruleSetVersion: string): FileResult | null {
    const row = this.selectStmt.get(path);
    if (!row || row.fingerprint !== fingerprint || row.rule_set_version !== ruleSetVersion) {
      this.counters.misses++;
      return null;
    }

    try {
      const result = decodeCachedResult(path, row.result);
      this.counters.hits++;
      return result;
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) throw error;
      this.counters.corrupt++;
      this.counters.misses++;
      cacheLog.debug(error.message);
      return null;
    }
  }

  put(path: string, fingerprint: string, ruleSetVersion: string, result: FileResult): void {
    this.upsertStmt.run(path, fingerprint, ruleSetVersion, JSON.stringify(result), new Date().toISOString());
  }

  prune(keep: ReadonlySet<string>): number {
    const paths = this.db.prepare<[], { path: string }>('SELECT path FROM results').all();
    const stale = paths.filter((row) => !keep.has(row.path));
    const removeAll = this.db.transaction((rows: { path: string }[]) => {
      for (const row of rows) {
        this.deleteStmt.run(row.path);
      }
    });
    removeAll(stale);
    return stale.length;
  }

  clear(): number {
    return this.db.prepare('DELETE FROM results').run().changes;
  }

  stats(): CacheStats {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM results').get();
    return { entries: row?.count ?? 0, ...this.counters };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  /**
   * Create tables; a database written by another schema version is reset.
   */
  private initializeSchema(): void {
    this.db.exec(SCHEMA_SQL);
    const row = this.db
      .prepare<[string], { value: string | null }>('SELECT value FROM meta WHERE key = ?')
      .get('schema_version');
    const version = row?.value ? parseInt(row.value, 10) : 0;

    if (version !== CACHE_SCHEMA_VERSION) {
      if (version !== 0) {
        cacheLog.debug(`Cache schema v${version} replaced with v${CACHE_SCHEMA_VERSION}`);
      }
      this.db.exec('DELETE FROM results');
      this.db
        .prepare('INSERT OR REPLACE INTO meta (key, value) VALUES (?, ?)')
        .run('schema_version', String(CACHE_SCHEMA_VERSION));
    }
  }
}
