/**
 * Aggregator - turns per-file results into a RunReport.
 * Cross-file rules run here, after every file has been analyzed.
 */
import * as path from 'node:path';
import type { CrossFileRule, CrossFileSubject, FileDescriptor, Finding, Severity } from '../rules/types.js';
import type { RuleRegistry } from '../rules/registry.js';
import type { Scorer } from '../analysis/scoring.js';
import { capFindings, createScorer, ruleFailure, ruleFailureFinding } from '../analysis/analyzer.js';
import type {
  DiscoveryFinding,
  FileResult,
  FileStatus,
  RunReport,
  RunSummary,
  ScoreBucket,
  WorstOffender,
} from './types.js';
import { compareStrings } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { REPORT_FORMAT_VERSION } from '../version.js';

/** Number of equal-width score buckets between 0 and the baseline */
const DISTRIBUTION_BUCKETS = 5;

export interface AggregatorOptions {
  /** Timestamp source; the only non-deterministic input */
  clock?: () => Date;
}

export interface AggregateContext {
  root: string;
  /** false for a cancelled run */
  complete?: boolean;
  discoveryFindings?: readonly DiscoveryFinding[];
}

function descriptorOf(result: FileResult): FileDescriptor {
  return {
    path: result.path,
    relativePath: result.relativePath,
    extension: result.extension,
    size: result.size,
    binary: result.binary,
  };
}

/**
 * Recursively freeze a value graph.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class Aggregator {
  private readonly scorer: Scorer;
  private readonly clock: () => Date;

  constructor(
    private readonly registry: RuleRegistry,
    options: AggregatorOptions = {}
  ) {
    this.scorer = createScorer(registry);
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Build the report. Input order does not matter; results are sorted
   * by path before anything else happens.
   */
  aggregate(results: readonly FileResult[], context: AggregateContext): RunReport {
    const sorted = [...results].sort((a, b) => compareStrings(a.path, b.path));
    const files = this.applyCrossFileRules(sorted);

    const report: RunReport = {
      formatVersion: REPORT_FORMAT_VERSION,
      timestamp: this.clock().toISOString(),
      root: path.resolve(context.root),
      complete: context.complete ?? true,
      ruleSetVersion: this.registry.version,
      files,
      discoveryFindings: [...(context.discoveryFindings ?? [])].sort((a, b) => compareStrings(a.path, b.path)),
      summary: this.summarize(files),
    };
    return deepFreeze(report);
  }

  /**
   * Run every cross-file rule and merge its findings into the owning
   * results. Results that gain findings are rebuilt and re-scored.
   */
  private applyCrossFileRules(sorted: FileResult[]): FileResult[] {
    const extra = new Map<string, Finding[]>();
    const suppressed = new Map<string, Record<string, number>>();
    const limit = this.registry.settings.maxFindingsPerRule;

    const subjectsByRule = new Map<string, CrossFileSubject[]>();
    for (const result of sorted) {
      // Unreadable files have no fingerprint and take no part
      if (result.fingerprint === '') continue;
      const file = descriptorOf(result);
      for (const match of this.registry.applicableCrossFileRules(file)) {
        const name = match.rule.name;
        if ('error' in match) {
          extra.set(result.path, [...(extra.get(result.path) ?? []), ruleFailure(name, file, match.error)]);
          continue;
        }
        const subject = { file, fingerprint: result.fingerprint, normalizedFingerprint: result.normalizedFingerprint };
        const subjects = subjectsByRule.get(name);
        if (subjects) {
          subjects.push(subject);
        } else {
          subjectsByRule.set(name, [subject]);
        }
      }
    }

    for (const rule of this.registry.crossFileRules()) {
      const subjects = subjectsByRule.get(rule.name) ?? [];

      for (const [filePath, produced] of runCrossFileRule(rule, subjects)) {
        const { kept, dropped } = capFindings(produced, limit);
        extra.set(filePath, [...(extra.get(filePath) ?? []), ...kept]);
        if (dropped > 0) {
          suppressed.set(filePath, { ...suppressed.get(filePath), [rule.name]: dropped });
        }
      }
    }

    if (extra.size === 0) {
      return sorted;
    }

    return sorted.map((result) => {
      const added = extra.get(result.path);
      if (!added || added.length === 0) {
        return result;
      }
      const findings = this.orderFindings([...result.findings, ...added]);
      const score = this.scorer.score(findings);
      return {
        ...result,
        findings,
        suppressed: { ...result.suppressed, ...suppressed.get(result.path) },
        score,
        status: this.scorer.status(score, true),
      };
    });
  }

  /**
   * Stable sort by rule registration index.
   */
  private orderFindings(findings: Finding[]): Finding[] {
    return findings
      .map((finding, index) => ({ finding, index }))
      .sort((a, b) => this.registry.orderOf(a.finding.rule) - this.registry.orderOf(b.finding.rule) || a.index - b.index)
      .map(({ finding }) => finding);
  }

  private summarize(files: readonly FileResult[]): RunSummary {
    const graded = files.filter((f) => f.status !== 'ungraded');

    const severityCounts: Record<Severity, number> = { info: 0, low: 0, medium: 0, high: 0, critical: 0 };
    const statusCounts: Record<FileStatus, number> = { pass: 0, fail: 0, ungraded: 0 };
    const findingsByRule: Record<string, number> = {};

    for (const file of files) {
      statusCounts[file.status]++;
      for (const finding of file.findings) {
        severityCounts[finding.severity]++;
        findingsByRule[finding.rule] = (findingsByRule[finding.rule] ?? 0) + 1;
      }
    }

    return {
      totalFiles: files.length,
      gradedFiles: graded.length,
      aggregateScore: this.scorer.aggregate(graded.map((f) => f.score)),
      severityCounts,
      statusCounts,
      findingsByRule: sortKeys(findingsByRule),
      distribution: this.distribution(graded),
      flaggedFiles: graded.filter((f) => f.findings.length > 0).length,
      worstOffenders: this.worstOffenders(graded),
    };
  }

  private distribution(graded: readonly FileResult[]): ScoreBucket[] {
    const width = this.scorer.baseline / DISTRIBUTION_BUCKETS;
    const counts = new Array<number>(DISTRIBUTION_BUCKETS).fill(0);
    for (const file of graded) {
      const index = Math.min(Math.floor(file.score / width), DISTRIBUTION_BUCKETS - 1);
      counts[index]++;
    }
    return counts.map((count, i) => ({ min: i * width, max: (i + 1) * width, count }));
  }

  private worstOffenders(graded: readonly FileResult[]): WorstOffender[] {
    const limit = this.registry.settings.scoring.worst_offenders;
    return graded
      .filter((f) => f.findings.length > 0)
      .sort((a, b) => a.score - b.score || compareStrings(a.path, b.path))
      .slice(0, limit)
      .map((f) => ({ path: f.path, relativePath: f.relativePath, score: f.score, findings: f.findings.length }));
  }
}

/**
 * Evaluate a cross-file rule; a throw gives every subject one synthetic finding.
 */
function runCrossFileRule(rule: CrossFileRule, subjects: CrossFileSubject[]): Map<string, Finding[]> {
  try {
    return rule.evaluate(subjects);
  } catch (error) {
    log.debug(`Cross-file rule '${rule.name}' failed: ${error instanceof Error ? error.message : String(error)}`);
    const failure = ruleFailureFinding(rule.name, error);
    return new Map(subjects.map((s) => [s.file.path, [failure]]));
  }
}

function sortKeys(record: Record<string, number>): Record<string, number> {
  return Object.fromEntries(Object.entries(record).sort(([a], [b]) => compareStrings(a, b)));
}
