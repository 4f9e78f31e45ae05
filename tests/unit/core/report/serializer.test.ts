import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadReport, parseReport, saveReport, serializeReport } from '../../../../src/core/report/serializer.js';
import { Aggregator } from '../../../../src/core/report/aggregator.js';
import { RuleRegistry } from '../../../../src/core/rules/registry.js';
import type { RunReport } from '../../../../src/core/report/types.js';
import { ReportFormatError } from '../../../../src/utils/errors.js';

function createReport(): RunReport {
  return new Aggregator(RuleRegistry.create([]), { clock: () => new Date('2026-01-01T00:00:00.000Z') }).aggregate(
    [
      {
        path: '/project/a.txt',
        relativePath: 'a.txt',
        fingerprint: 'abc',
        normalizedFingerprint: 'abc',
        size: 4,
        extension: 'txt',
        binary: false,
        findings: [{ rule: 'whitespace', code: 'FQ005', severity: 'low', message: 'Trailing whitespace', location: { line: 1, column: 4 } }],
        suppressed: {},
        score: 98,
        status: 'pass',
      },
    ],
    { root: '/project' }
  );
}

describe('serializeReport', () => {
  it('should write indented JSON with a trailing newline', () => {
    const text = serializeReport(createReport());

    expect(text.endsWith('}\n')).toBe(true);
    expect(text.split('\n')[1]).toBe('  "formatVersion": 1,');
  });

  it('should be stable for the same report', () => {
    expect(serializeReport(createReport())).toBe(serializeReport(createReport()));
  });
});

describe('parseReport', () => {
  it('should read back what was serialized', () => {
    const report = createReport();

    expect(parseReport(serializeReport(report))).toEqual(report);
  });

  it('should freeze the parsed report', () => {
    const parsed = parseReport(serializeReport(createReport()));

    expect(Object.isFrozen(parsed.files)).toBe(true);
  });

  it('should reject invalid JSON', () => {
    expect(() => parseReport('{', 'saved.json')).toThrow(ReportFormatError);
    expect(() => parseReport('{', 'saved.json')).toThrow(/^saved\.json is not valid JSON: /);
  });

  it('should reject content that is not a report', () => {
    expect(() => parseReport('{"files": []}', 'saved.json')).toThrow('saved.json is not a valid report');
  });

  it('should reject other format versions', () => {
    const content = serializeReport(createReport()).replace('"formatVersion": 1', '"formatVersion": 7');

    expect(() => parseReport(content, 'old.json')).toThrow(
      'old.json has format version 7; expected 1'
    );
  });
});

describe('saveReport / loadReport', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'filequal-report-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should save to disk and load it back', async () => {
    const report = createReport();
    const file = join(dir, 'out', 'report.json');

    await saveReport(report, file);

    expect(readFileSync(file, 'utf-8')).toBe(serializeReport(report));
    expect(await loadReport(file)).toEqual(report);
  });

  it('should wrap read failures', async () => {
    const file = join(dir, 'missing.json');

    await expect(loadReport(file)).rejects.toThrow(ReportFormatError);
    await expect(loadReport(file)).rejects.toThrow(`Cannot read report ${file}: `);
  });

  it('should name the file in validation errors', async () => {
    const file = join(dir, 'bad.json');
    writeFileSync(file, '[]');

    await expect(loadReport(file)).rejects.toThrow(`${file} is not a valid report`);
  });
});
