import { describe, it, expect } from 'vitest';
import { MemoryResultCache } from '../../../../src/core/cache/memory-cache.js';
import type { FileResult } from '../../../../src/core/report/types.js';

function createResult(overrides: Partial<FileResult> = {}): FileResult {
  return {
    path: '/project/a.txt',
    relativePath: 'a.txt',
    fingerprint: 'f1',
    normalizedFingerprint: 'f1',
    size: 3,
    extension: 'txt',
    binary: false,
    findings: [],
    suppressed: {},
    score: 100,
    status: 'pass',
    ...overrides,
  };
}

describe('MemoryResultCache', () => {
  it('should hit on matching fingerprint and version', () => {
    const cache = new MemoryResultCache();
    cache.put('/project/a.txt', 'f1', 'v1', createResult());

    expect(cache.get('/project/a.txt', 'f1', 'v1')).toEqual(createResult());
    expect(cache.get('/project/a.txt', 'f1', 'v2')).toBeNull();
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 1, corrupt: 0 });
  });

  it('should hand out copies', () => {
    const cache = new MemoryResultCache();
    cache.put('/project/a.txt', 'f1', 'v1', createResult());

    const first = cache.get('/project/a.txt', 'f1', 'v1');
    const second = cache.get('/project/a.txt', 'f1', 'v1');

    expect(first).not.toBe(second);
  });

  it('should treat an invalid payload as a corrupt miss', () => {
    const cache = new MemoryResultCache();
    cache.putRaw('/project/a.txt', 'f1', 'v1', 'not json');

    expect(cache.get('/project/a.txt', 'f1', 'v1')).toBeNull();
    expect(cache.stats()).toEqual({ entries: 1, hits: 0, misses: 1, corrupt: 1 });
  });

  it('should treat a payload for another path as corrupt', () => {
    const cache = new MemoryResultCache();
    cache.putRaw('/project/a.txt', 'f1', 'v1', JSON.stringify(createResult({ path: '/project/b.txt' })));

    expect(cache.get('/project/a.txt', 'f1', 'v1')).toBeNull();
    expect(cache.stats().corrupt).toBe(1);
  });

  it('should prune and clear', () => {
    const cache = new MemoryResultCache();
    cache.put('/project/a.txt', 'f1', 'v1', createResult());
    cache.put('/project/b.txt', 'f1', 'v1', createResult({ path: '/project/b.txt' }));
    cache.put('/project/c.txt', 'f1', 'v1', createResult({ path: '/project/c.txt' }));

    expect(cache.prune(new Set(['/project/b.txt']))).toBe(2);
    expect(cache.stats().entries).toBe(1);
    expect(cache.clear()).toBe(1);
    expect(cache.stats().entries).toBe(0);
  });
});
