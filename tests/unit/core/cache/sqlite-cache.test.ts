import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import { SqliteResultCache, CACHE_SCHEMA_VERSION } from '../../../../src/core/cache/sqlite-cache.js';
import type { FileResult } from '../../../../src/core/report/types.js';

function createResult(overrides: Partial<FileResult> = {}): FileResult {
  return {
    path: '/project/a.txt',
    relativePath: 'a.txt',
    fingerprint: 'f1',
    normalizedFingerprint: 'f1',
    size: 12,
    extension: 'txt',
    binary: false,
    findings: [{ rule: 'whitespace', code: 'FQ005', severity: 'low', message: 'Trailing whitespace', location: { line: 2, column: 4 } }],
    suppressed: {},
    score: 98,
    status: 'pass',
    ...overrides,
  };
}

describe('SqliteResultCache', () => {
  let cache: SqliteResultCache;

  beforeEach(() => {
    cache = new SqliteResultCache(':memory:');
  });

  afterEach(() => {
    cache.close();
  });

  it('should return a stored result when fingerprint and version match', () => {
    const result = createResult();
    cache.put(result.path, 'f1', 'v1', result);

    expect(cache.get(result.path, 'f1', 'v1')).toEqual(result);
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 0, corrupt: 0 });
  });

  it('should miss on a different fingerprint', () => {
    cache.put('/project/a.txt', 'f1', 'v1', createResult());

    expect(cache.get('/project/a.txt', 'f2', 'v1')).toBeNull();
  });

  it('should miss on a different rule-set version', () => {
    cache.put('/project/a.txt', 'f1', 'v1', createResult());

    expect(cache.get('/project/a.txt', 'f1', 'v2')).toBeNull();
    expect(cache.stats().misses).toBe(1);
  });

  it('should miss for unknown paths', () => {
    expect(cache.get('/project/none.txt', 'f1', 'v1')).toBeNull();
  });

  it('should replace the entry for a path', () => {
    cache.put('/project/a.txt', 'f1', 'v1', createResult());
    cache.put('/project/a.txt', 'f2', 'v1', createResult({ fingerprint: 'f2', score: 100, findings: [] }));

    expect(cache.get('/project/a.txt', 'f1', 'v1')).toBeNull();
    expect(cache.get('/project/a.txt', 'f2', 'v1')?.score).toBe(100);
    expect(cache.stats().entries).toBe(1);
  });

  it('should prune entries outside the keep set', () => {
    cache.put('/project/a.txt', 'f1', 'v1', createResult());
    cache.put('/project/b.txt', 'f1', 'v1', createResult({ path: '/project/b.txt', relativePath: 'b.txt' }));

    expect(cache.prune(new Set(['/project/a.txt']))).toBe(1);
    expect(cache.get('/project/b.txt', 'f1', 'v1')).toBeNull();
    expect(cache.get('/project/a.txt', 'f1', 'v1')).not.toBeNull();
  });

  it('should clear everything', () => {
    cache.put('/project/a.txt', 'f1', 'v1', createResult());
    cache.put('/project/b.txt', 'f1', 'v1', createResult({ path: '/project/b.txt' }));

    expect(cache.clear()).toBe(2);
    expect(cache.stats().entries).toBe(0);
  });

  it('should tolerate closing twice', () => {
    cache.close();
    expect(() => cache.close()).not.toThrow();
  });
});

describe('SqliteResultCache on disk', () => {
  let dir: string;
  let dbPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'filequal-cache-'));
    dbPath = join(dir, 'cache.db');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should persist entries across instances', () => {
    const first = new SqliteResultCache(dbPath);
    first.put('/project/a.txt', 'f1', 'v1', createResult());
    first.close();

    const second = new SqliteResultCache(dbPath);
    try {
      expect(second.get('/project/a.txt', 'f1', 'v1')).toEqual(createResult());
    } finally {
      second.close();
    }
  });

  it('should treat a corrupt row as a miss', () => {
    const cache = new SqliteResultCache(dbPath);
    try {
      cache.put('/project/a.txt', 'f1', 'v1', createResult());

      const raw = new Database(dbPath);
      raw.prepare('UPDATE results SET result = ? WHERE path = ?').run('{"path": 42', '/project/a.txt');
      raw.close();

      expect(cache.get('/project/a.txt', 'f1', 'v1')).toBeNull();
      expect(cache.stats()).toMatchObject({ hits: 0, misses: 1, corrupt: 1 });
    } finally {
      cache.close();
    }
  });

  it('should treat a row that fails the result schema as a miss', () => {
    const cache = new SqliteResultCache(dbPath);
    try {
      cache.put('/project/a.txt', 'f1', 'v1', createResult());

      const raw = new Database(dbPath);
      raw
        .prepare('UPDATE results SET result = ? WHERE path = ?')
        .run(JSON.stringify({ ...createResult(), status: 'excellent' }), '/project/a.txt');
      raw.close();

      expect(cache.get('/project/a.txt', 'f1', 'v1')).toBeNull();
      expect(cache.stats().corrupt).toBe(1);
    } finally {
      cache.close();
    }
  });

  it('should reset a database written by another schema version', () => {
    const first = new SqliteResultCache(dbPath);
    first.put('/project/a.txt', 'f1', 'v1', createResult());
    first.close();

    const raw = new Database(dbPath);
    raw.prepare("UPDATE meta SET value = '99' WHERE key = 'schema_version'").run();
    raw.close();

    const second = new SqliteResultCache(dbPath);
    try {
      expect(second.stats().entries).toBe(0);
    } finally {
      second.close();
    }

    const check = new Database(dbPath);
    const row = check.prepare<[], { value: string }>("SELECT value FROM meta WHERE key = 'schema_version'").get();
    check.close();
    expect(row?.value).toBe(String(CACHE_SCHEMA_VERSION));
  });
});
