import { describe, it, expect } from 'vitest';
import {
  parseInteger,
  parseOutputFormat,
  parseScore,
  parseSeverity,
  parseStatuses,
  resolveRoot,
  splitList,
} from '../../../../src/cli/commands/helpers.js';

describe('command helpers', () => {
  it('should resolve the root against the working directory', () => {
    expect(resolveRoot('/abs/dir')).toBe('/abs/dir');
    expect(resolveRoot(undefined)).toBe(process.cwd());
  });

  describe('parseInteger', () => {
    it('should accept integers at or above the minimum', () => {
      expect(parseInteger('4', 'concurrency', 1)).toBe(4);
      expect(parseInteger('0', 'limit', 0)).toBe(0);
    });

    it('should reject other values', () => {
      expect(() => parseInteger('0', 'concurrency', 1)).toThrow("Invalid concurrency: '0' (expected an integer >= 1)");
      expect(() => parseInteger('2.5', 'limit', 0)).toThrow("Invalid limit: '2.5'");
      expect(() => parseInteger('many', 'limit', 0)).toThrow("Invalid limit: 'many'");
    });
  });

  describe('parseScore', () => {
    it('should accept non-negative numbers', () => {
      expect(parseScore('80')).toBe(80);
      expect(parseScore('72.5')).toBe(72.5);
    });

    it('should reject blanks, negatives and words', () => {
      expect(() => parseScore('')).toThrow("Invalid score: ''");
      expect(() => parseScore('-1')).toThrow("Invalid score: '-1'");
      expect(() => parseScore('high')).toThrow("Invalid score: 'high'");
    });
  });

  it('should split comma-separated lists', () => {
    expect(splitList(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
    expect(splitList(undefined)).toEqual([]);
  });

  it('should validate output formats', () => {
    expect(parseOutputFormat('compact')).toBe('compact');
    expect(() => parseOutputFormat('xml')).toThrow("Invalid format: 'xml' (valid: human, json, compact)");
  });

  it('should validate severities', () => {
    expect(parseSeverity('high')).toBe('high');
    expect(() => parseSeverity('urgent')).toThrow("Invalid severity: 'urgent' (valid: info, low, medium, high, critical)");
  });

  describe('parseStatuses', () => {
    it('should return undefined when nothing is requested', () => {
      expect(parseStatuses(undefined)).toBeUndefined();
      expect(parseStatuses('')).toBeUndefined();
    });

    it('should parse known statuses', () => {
      expect(parseStatuses('fail,ungraded')).toEqual(['fail', 'ungraded']);
    });

    it('should name the invalid ones', () => {
      expect(() => parseStatuses('pass,bad,worse')).toThrow(
        'Invalid status: bad, worse (valid: pass, fail, ungraded)'
      );
    });
  });
});
