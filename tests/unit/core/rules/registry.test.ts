import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { RuleRegistry, computeRuleSetVersion } from '../../../../src/core/rules/registry.js';
import { SizeRule } from '../../../../src/core/rules/size.js';
import { NamingRule } from '../../../../src/core/rules/naming.js';
import { DuplicationRule } from '../../../../src/core/rules/duplication.js';
import { createRegistry } from '../../../../src/core/rules/builtin.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { ConfigSchema } from '../../../../src/core/config/schema.js';
import { ConfigError } from '../../../../src/utils/errors.js';
import type { FileDescriptor, FileRule } from '../../../../src/core/rules/types.js';

const settings = { weight: 1, include: [], exclude: [] };

function size(max = 100, weight = 1): SizeRule {
  return new SizeRule({ ...settings, weight }, { maxFileSizeBytes: max });
}

function naming(): NamingRule {
  return new NamingRule({ ...settings, include: ['*.ts'] }, { pattern: '.*', case: 'any', checkDirectories: false });
}

function duplication(): DuplicationRule {
  return new DuplicationRule(settings, { normalizeWhitespace: false, minSizeBytes: 1 });
}

function file(relativePath: string): FileDescriptor {
  return { path: `/root/${relativePath}`, relativePath, extension: '', size: 1, binary: false };
}

describe('RuleRegistry', () => {
  it('should keep registration order', () => {
    const registry = RuleRegistry.create([naming(), size(), duplication()]);

    expect(registry.rules.map((r) => r.name)).toEqual(['naming', 'size', 'duplication']);
    expect(registry.orderOf('size')).toBe(1);
    expect(registry.orderOf('unknown')).toBe(-1);
  });

  it('should look rules up by name', () => {
    const registry = RuleRegistry.create([size()]);

    expect(registry.has('size')).toBe(true);
    expect(registry.get('size')?.name).toBe('size');
    expect(registry.get('naming')).toBeUndefined();
  });

  it('should reject duplicate rule names', () => {
    expect(() => RuleRegistry.create([size(), size(200)])).toThrow(ConfigError);
    expect(() => RuleRegistry.create([size(), size(200)])).toThrow("Rule 'size' is registered twice");
  });

  it('should list applicable rules by kind', () => {
    const registry = RuleRegistry.create([size(), naming(), duplication()]);
    const names = (matches: { rule: { name: string } }[]): string[] => matches.map((m) => m.rule.name);

    expect(names(registry.applicableRules(file('src/a.ts')))).toEqual(['size', 'naming']);
    expect(names(registry.applicableRules(file('README.md')))).toEqual(['size']);
    expect(names(registry.applicableCrossFileRules(file('README.md')))).toEqual(['duplication']);
    expect(registry.crossFileRules().map((r) => r.name)).toEqual(['duplication']);
  });

  it('should keep a rule whose predicate throws, with the error', () => {
    const failure = new Error('cannot decide');
    const picky: FileRule = {
      kind: 'file',
      name: 'picky',
      description: 'Throws from applies',
      weight: 1,
      options: {},
      applies: () => {
        throw failure;
      },
      evaluate: () => [],
    };
    const registry = RuleRegistry.create([picky, size()]);

    expect(registry.applicableRules(file('a.txt'))).toEqual([{ rule: picky, error: failure }, { rule: registry.get('size') }]);
  });

  it('should be immutable', () => {
    const registry = RuleRegistry.create([size()]);

    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry.settings)).toBe(true);
    registry.rules.pop();
    expect(registry.rules).toHaveLength(1);
  });

  it('should default settings from the default configuration', () => {
    const registry = RuleRegistry.create([]);
    const defaults = getDefaultConfig();

    expect(registry.settings.scoring).toEqual(defaults.scoring);
    expect(registry.settings.maxFindingsPerRule).toBe(100);
  });

  describe('with / without', () => {
    it('should replace a rule in place', () => {
      const registry = RuleRegistry.create([size(100), naming()]);
      const updated = registry.with(size(500));

      expect(updated.rules.map((r) => r.name)).toEqual(['size', 'naming']);
      expect(updated.get('size')?.options).toMatchObject({ maxFileSizeBytes: 500 });
      expect(registry.get('size')?.options).toMatchObject({ maxFileSizeBytes: 100 });
    });

    it('should append a new rule', () => {
      const updated = RuleRegistry.create([size()]).with(naming());

      expect(updated.rules.map((r) => r.name)).toEqual(['size', 'naming']);
    });

    it('should remove a rule', () => {
      const registry = RuleRegistry.create([size(), naming()]);

      expect(registry.without('size').rules.map((r) => r.name)).toEqual(['naming']);
      expect(registry.without('missing').version).toBe(registry.version);
    });
  });

  describe('version', () => {
    it('should be a SHA-256 hex digest', () => {
      expect(RuleRegistry.create([size()]).version).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should be equal for equal rule sets', () => {
      expect(RuleRegistry.create([size(), naming()]).version).toBe(RuleRegistry.create([size(), naming()]).version);
    });

    it('should change with rule options, weights and order', () => {
      const base = RuleRegistry.create([size(100), naming()]).version;

      expect(RuleRegistry.create([size(101), naming()]).version).not.toBe(base);
      expect(RuleRegistry.create([size(100, 2), naming()]).version).not.toBe(base);
      expect(RuleRegistry.create([naming(), size(100)]).version).not.toBe(base);
    });

    it('should change with scoring settings', () => {
      const rules = [size()];
      const defaults = getDefaultConfig();
      const a = computeRuleSetVersion(rules, { scoring: defaults.scoring, maxFindingsPerRule: 100 });
      const b = computeRuleSetVersion(rules, {
        scoring: { ...defaults.scoring, pass_threshold: 90 },
        maxFindingsPerRule: 100,
      });
      const c = computeRuleSetVersion(rules, { scoring: defaults.scoring, maxFindingsPerRule: 50 });

      expect(new Set([a, b, c]).size).toBe(3);
    });

    it('should be a function of configuration', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 1 << 30 }), fc.integer({ min: 1, max: 1000 }), (maxBytes, cap) => {
          const config = ConfigSchema.parse({
            rules: { size: { max_file_size_bytes: maxBytes } },
            analysis: { max_findings_per_rule: cap },
          });
          return createRegistry(config).version === createRegistry(config).version;
        })
      );
    });

    it('should separate different size limits', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 1 << 30 }), fc.integer({ min: 1, max: 1 << 30 }), (a, b) => {
          fc.pre(a !== b);
          return RuleRegistry.create([size(a)]).version !== RuleRegistry.create([size(b)]).version;
        })
      );
    });
  });
});
