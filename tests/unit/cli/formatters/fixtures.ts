import { Aggregator } from '../../../../src/core/report/aggregator.js';
import { RuleRegistry } from '../../../../src/core/rules/registry.js';
import type { FileResult, RunReport } from '../../../../src/core/report/types.js';

function createResult(name: string, overrides: Partial<FileResult> = {}): FileResult {
  return {
    path: `/project/${name}`,
    relativePath: name,
    fingerprint: `fp-${name}`,
    normalizedFingerprint: `fp-${name}`,
    size: 10,
    extension: name.slice(name.lastIndexOf('.') + 1),
    binary: false,
    findings: [],
    suppressed: {},
    score: 100,
    status: 'pass',
    ...overrides,
  };
}

/**
 * Four files: one with a capped whitespace finding, one clean,
 * one ungraded and one failing on size; plus a skipped path.
 */
export function createSampleReport(complete = true): RunReport {
  return new Aggregator(RuleRegistry.create([]), { clock: () => new Date('2026-01-01T00:00:00.000Z') }).aggregate(
    [
      createResult('a.txt', {
        findings: [
          { rule: 'whitespace', code: 'FQ005', severity: 'low', message: 'Trailing whitespace', location: { line: 2, column: 5 } },
        ],
        suppressed: { whitespace: 3 },
        score: 98,
      }),
      createResult('b.txt'),
      createResult('c.bin', { binary: true, status: 'ungraded' }),
      createResult('d.txt', {
        findings: [{ rule: 'size', code: 'FQ001', severity: 'critical', message: 'File is 4.0 MiB' }],
        score: 75,
        status: 'fail',
      }),
    ],
    {
      root: '/project',
      complete,
      discoveryFindings: [{ path: '/project/broken', code: 'FQ902', message: 'Broken symlink (ENOENT)' }],
    }
  );
}
