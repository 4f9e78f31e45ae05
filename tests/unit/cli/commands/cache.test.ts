/**
 * Tests for the cache command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createCacheCommand } from '../../../../src/cli/commands/cache.js';
import { runAnalysis } from '../../../../src/core/analysis/runner.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';

const log = vi.hoisted(() => {
  const base = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), success: vi.fn(), debug: vi.fn() };
  return { ...base, child: vi.fn(() => base) };
});

vi.mock('../../../../src/utils/logger.js', () => ({ logger: log }));

describe('cache command', () => {
  let root: string;
  const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

  beforeEach(async () => {
    vi.clearAllMocks();
    root = mkdtempSync(join(tmpdir(), 'filequal-cache-cmd-'));
    writeFileSync(join(root, 'a.txt'), 'a\n');
    writeFileSync(join(root, 'b.txt'), 'b\n');
    await runAnalysis({ root, config: getDefaultConfig() });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should show the cache location and entry count', async () => {
    await createCacheCommand().parseAsync(['stats', '-r', root], { from: 'user' });

    const lines = consoleSpy.mock.calls.map((call) => String(call[0]));
    expect(lines[0]).toBe('Cache:   .filequal/cache.db');
    expect(lines[1]).toBe('Entries: 2');
    expect(lines[2]).toMatch(/^Size: {4}\d/);
  });

  it('should clear every entry', async () => {
    await createCacheCommand().parseAsync(['clear', '-r', root], { from: 'user' });
    expect(log.success).toHaveBeenCalledWith('Cleared 2 cached results');

    await createCacheCommand().parseAsync(['stats', '-r', root], { from: 'user' });
    expect(consoleSpy).toHaveBeenCalledWith('Entries: 0');
  });

  it('should say when the cache is disabled', async () => {
    mkdirSync(join(root, 'conf'));
    writeFileSync(join(root, 'conf', 'off.yaml'), 'cache:\n  enabled: false\n');

    await createCacheCommand().parseAsync(['stats', '-r', root, '-c', 'conf/off.yaml'], { from: 'user' });

    expect(consoleSpy).toHaveBeenCalledWith('Result cache is disabled in the configuration.');
  });
});
