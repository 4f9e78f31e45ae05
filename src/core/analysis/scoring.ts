/**
 * Score computation and run-level aggregation.
 */
import type { AggregateMode, ScoringSettings } from '../config/schema.js';
import type { Finding } from '../rules/types.js';
import type { FileStatus } from '../report/types.js';

/**
 * Penalty-from-baseline scorer.
 * A file scores baseline minus, for each finding, the severity weight
 * times the weight of the rule that produced it, floored at zero.
 */
export class Scorer {
  constructor(
    private readonly settings: ScoringSettings,
    private readonly ruleWeight: (rule: string) => number = () => 1
  ) {}

  get baseline(): number {
    return this.settings.baseline;
  }

  score(findings: readonly Finding[]): number {
    let penalty = 0;
    for (const finding of findings) {
      penalty += this.settings.severity_weights[finding.severity] * this.ruleWeight(finding.rule);
    }
    return Math.max(0, this.settings.baseline - penalty);
  }

  status(score: number, graded: boolean): FileStatus {
    if (!graded) return 'ungraded';
    return score >= this.settings.pass_threshold ? 'pass' : 'fail';
  }

  /**
   * Combine per-file scores; null for an empty run.
   */
  aggregate(scores: readonly number[], mode: AggregateMode = this.settings.aggregate): number | null {
    if (scores.length === 0) return null;

    switch (mode) {
      case 'mean':
        return scores.reduce((sum, s) => sum + s, 0) / scores.length;
      case 'min':
        return scores.reduce((min, s) => (s < min ? s : min), scores[0]);
      case 'median': {
        const sorted = [...scores].sort((a, b) => a - b);
        const mid = Math.floor(sorted.length / 2);
        return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
      }
    }
  }
}
