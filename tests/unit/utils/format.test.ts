/**
 * Tests for formatting helpers.
 */
import { describe, it, expect } from 'vitest';
import { formatBytes, formatDuration, formatScore, pluralize } from '../../../src/utils/format.js';

describe('formatDuration', () => {
  it('should format seconds with two decimals', () => {
    expect(formatDuration(2500)).toBe('2.50 s');
    expect(formatDuration(0)).toBe('0.00 s');
  });

  it('should switch to minutes at one minute', () => {
    expect(formatDuration(60_000)).toBe('1.0 min');
    expect(formatDuration(90_000)).toBe('1.5 min');
  });

  it('should switch to hours at one hour', () => {
    expect(formatDuration(4_500_000)).toBe('1.25 hr');
  });
});

describe('formatBytes', () => {
  it('should keep small sizes in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('should use binary units', () => {
    expect(formatBytes(1024)).toBe('1.0 KiB');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(1024 * 1024)).toBe('1.0 MiB');
    expect(formatBytes(3 * 1024 ** 3)).toBe('3.0 GiB');
  });
});

describe('formatScore', () => {
  it('should print integers without decimals', () => {
    expect(formatScore(100)).toBe('100');
    expect(formatScore(0)).toBe('0');
  });

  it('should round fractions to one decimal', () => {
    expect(formatScore(97.5)).toBe('97.5');
    expect(formatScore(200 / 3)).toBe('66.7');
  });
});

describe('pluralize', () => {
  it('should use the singular for one', () => {
    expect(pluralize(1, 'file')).toBe('1 file');
  });

  it('should use the plural otherwise', () => {
    expect(pluralize(0, 'file')).toBe('0 files');
    expect(pluralize(3, 'file')).toBe('3 files');
  });

  it('should accept an irregular plural', () => {
    expect(pluralize(2, 'entry', 'entries')).toBe('2 entries');
  });
});
