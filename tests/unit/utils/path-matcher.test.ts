/**
 * Tests for path-matcher utility.
 */
import { describe, it, expect } from 'vitest';
import { createPathMatcher } from '../../../src/utils/path-matcher.js';

describe('createPathMatcher', () => {
  describe('matches', () => {
    it('should match all files when no include/exclude patterns', () => {
      const matcher = createPathMatcher([], []);

      expect(matcher.matches('src/a.ts')).toBe(true);
      expect(matcher.matches('README.md')).toBe(true);
    });

    it('should only include files matching include patterns', () => {
      const matcher = createPathMatcher(['src/**/*.ts'], []);

      expect(matcher.matches('src/a.ts')).toBe(true);
      expect(matcher.matches('src/sub/b.ts')).toBe(true);
      expect(matcher.matches('lib/c.ts')).toBe(false);
      expect(matcher.matches('src/d.js')).toBe(false);
    });

    it('should match unanchored patterns at any depth', () => {
      const matcher = createPathMatcher(['*.md'], []);

      expect(matcher.matches('README.md')).toBe(true);
      expect(matcher.matches('docs/guide/intro.md')).toBe(true);
      expect(matcher.matches('docs/intro.txt')).toBe(false);
    });

    it('should exclude files matching exclude patterns', () => {
      const matcher = createPathMatcher([], ['*.test.ts', 'node_modules/']);

      expect(matcher.matches('src/a.ts')).toBe(true);
      expect(matcher.matches('src/a.test.ts')).toBe(false);
      expect(matcher.matches('node_modules/pkg/index.ts')).toBe(false);
    });

    it('should let exclude win over include', () => {
      const matcher = createPathMatcher(['src/'], ['*.log']);

      expect(matcher.matches('src/a.ts')).toBe(true);
      expect(matcher.matches('src/debug.log')).toBe(false);
      expect(matcher.matches('lib/b.ts')).toBe(false);
    });

    it('should honor negated exclude patterns', () => {
      const matcher = createPathMatcher([], ['*.log', '!keep.log']);

      expect(matcher.matches('a.log')).toBe(false);
      expect(matcher.matches('keep.log')).toBe(true);
    });

    it('should normalize Windows separators and a leading ./', () => {
      const matcher = createPathMatcher(['src/**/*.ts'], []);

      expect(matcher.matches('src\\sub\\file.ts')).toBe(true);
      expect(matcher.matches('./src/file.ts')).toBe(true);
    });

    it('should never match the empty path', () => {
      expect(createPathMatcher([], []).matches('')).toBe(false);
    });
  });

  describe('isExcluded', () => {
    it('should check exclude patterns only', () => {
      const matcher = createPathMatcher(['*.ts'], ['dist/']);

      expect(matcher.isExcluded('dist/')).toBe(true);
      expect(matcher.isExcluded('README.md')).toBe(false);
    });

    it('should only match directory patterns for paths with a trailing slash', () => {
      const matcher = createPathMatcher([], ['build/']);

      expect(matcher.isExcluded('build/')).toBe(true);
      expect(matcher.isExcluded('build')).toBe(false);
    });
  });

  describe('paths outside the root', () => {
    it('should not be excluded by any pattern', () => {
      const matcher = createPathMatcher([], ['*.md', '**/*']);

      expect(matcher.isExcluded('../README.md')).toBe(false);
      expect(matcher.isExcluded('/tmp/notes.md')).toBe(false);
      expect(matcher.matches('../README.md')).toBe(true);
      expect(matcher.matches('../../docs/guide.md')).toBe(true);
    });

    it('should not match include patterns', () => {
      const matcher = createPathMatcher(['*.md'], []);

      expect(matcher.matches('../README.md')).toBe(false);
      expect(matcher.matches('README.md')).toBe(true);
    });

    it('should treat a dot-dot prefix in a file name as inside the root', () => {
      const matcher = createPathMatcher([], ['..notes']);

      expect(matcher.isExcluded('..notes')).toBe(true);
    });
  });
});
