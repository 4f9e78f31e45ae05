/**
 * Tests for the init command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createInitCommand } from '../../../../src/cli/commands/init.js';
import { getDefaultConfig, loadConfig } from '../../../../src/core/config/loader.js';

const log = vi.hoisted(() => {
  const base = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), success: vi.fn(), debug: vi.fn() };
  return { ...base, child: vi.fn(() => base) };
});

vi.mock('../../../../src/utils/logger.js', () => ({ logger: log }));

vi.spyOn(console, 'log').mockImplementation(() => {});

describe('init command', () => {
  let root: string;

  beforeEach(() => {
    vi.clearAllMocks();
    root = mkdtempSync(join(tmpdir(), 'filequal-init-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should write a default config and ignore file', async () => {
    await createInitCommand().parseAsync(['-r', root], { from: 'user' });

    expect(existsSync(join(root, '.filequal', 'config.yaml'))).toBe(true);
    expect(readFileSync(join(root, '.filequalignore'), 'utf-8')).toContain('node_modules/');
    expect(log.success).toHaveBeenCalledWith('Created .filequal/config.yaml');
    expect(log.success).toHaveBeenCalledWith('Created .filequalignore');
  });

  it('should write a config that loads back as the defaults', async () => {
    await createInitCommand().parseAsync(['-r', root], { from: 'user' });

    expect(await loadConfig(root)).toEqual(getDefaultConfig());
  });

  it('should honor a custom config path', async () => {
    await createInitCommand().parseAsync(['-r', root, '-c', 'quality.yaml'], { from: 'user' });

    expect(existsSync(join(root, 'quality.yaml'))).toBe(true);
    expect(log.success).toHaveBeenCalledWith('Created quality.yaml');
  });

  it('should not overwrite an existing config without --force', async () => {
    await createInitCommand().parseAsync(['-r', root], { from: 'user' });
    writeFileSync(join(root, '.filequal', 'config.yaml'), 'scoring:\n  baseline: 50\n');

    await createInitCommand().parseAsync(['-r', root], { from: 'user' });

    expect(log.warn).toHaveBeenCalledWith('.filequal/config.yaml already exists. Use --force to overwrite.');
    expect(readFileSync(join(root, '.filequal', 'config.yaml'), 'utf-8')).toBe('scoring:\n  baseline: 50\n');
  });

  it('should keep an existing ignore file unless forced', async () => {
    writeFileSync(join(root, '.filequalignore'), 'custom/\n');

    await createInitCommand().parseAsync(['-r', root], { from: 'user' });
    expect(readFileSync(join(root, '.filequalignore'), 'utf-8')).toBe('custom/\n');

    await createInitCommand().parseAsync(['-r', root, '--force'], { from: 'user' });
    expect(readFileSync(join(root, '.filequalignore'), 'utf-8')).not.toBe('custom/\n');
  });
});
