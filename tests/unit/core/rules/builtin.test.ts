import { describe, it, expect } from 'vitest';
import { createBuiltinRules, createRegistry, normalizesWhitespace } from '../../../../src/core/rules/builtin.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { ConfigSchema } from '../../../../src/core/config/schema.js';
import { WhitespaceRule } from '../../../../src/core/rules/whitespace.js';

describe('createBuiltinRules', () => {
  it('should create every rule in canonical order', () => {
    expect(createBuiltinRules(getDefaultConfig()).map((r) => r.name)).toEqual([
      'size',
      'encoding',
      'whitespace',
      'naming',
      'duplication',
    ]);
  });

  it('should skip disabled rules', () => {
    const config = ConfigSchema.parse({ rules: { naming: { enabled: false }, size: { enabled: false } } });

    expect(createBuiltinRules(config).map((r) => r.name)).toEqual(['encoding', 'whitespace', 'duplication']);
  });

  it('should map configuration onto rule options', () => {
    const config = ConfigSchema.parse({
      rules: {
        size: { max_file_size_bytes: 4096, weight: 2, include: ['*.json'] },
        whitespace: { max_findings: 5, allowed_line_endings: ['crlf'] },
      },
    });
    const [size, , whitespace] = createBuiltinRules(config);

    expect(size.options).toEqual({ include: ['*.json'], exclude: [], maxFileSizeBytes: 4096 });
    expect(size.weight).toBe(2);
    expect(whitespace).toBeInstanceOf(WhitespaceRule);
    expect(whitespace.options).toEqual({
      include: [],
      exclude: [],
      allowedLineEndings: ['crlf'],
      trailingWhitespace: true,
      maxFindings: 5,
    });
  });
});

describe('createRegistry', () => {
  it('should carry run-wide evaluation settings', () => {
    const config = ConfigSchema.parse({ analysis: { max_findings_per_rule: 7 }, scoring: { baseline: 10 } });
    const registry = createRegistry(config);

    expect(registry.settings.maxFindingsPerRule).toBe(7);
    expect(registry.settings.scoring.baseline).toBe(10);
  });
});

describe('normalizesWhitespace', () => {
  it('should require an enabled duplication rule', () => {
    expect(normalizesWhitespace(getDefaultConfig())).toBe(false);
    expect(normalizesWhitespace(ConfigSchema.parse({ rules: { duplication: { normalize_whitespace: true } } }))).toBe(true);
    expect(
      normalizesWhitespace(ConfigSchema.parse({ rules: { duplication: { enabled: false, normalize_whitespace: true } } }))
    ).toBe(false);
  });
});
