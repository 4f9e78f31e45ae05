/**
 * Analyzer - evaluates the file rules of a registry against one file.
 */
import * as path from 'node:path';
import type { FileContent, FileDescriptor, FileRule, Finding } from '../rules/types.js';
import type { RuleRegistry } from '../rules/registry.js';
import type { ResultCache } from '../cache/types.js';
import type { FileResult } from '../report/types.js';
import type { AnalyzerOptions } from './types.js';
import { Scorer } from './scoring.js';
import { decodeText, detectBinary } from './content.js';
import { computeChecksum, computeNormalizedChecksum } from '../../utils/checksum.js';
import { extensionOf, readFileBytes, relativePosixPath } from '../../utils/file-system.js';
import { ErrorCodes, RuleEvaluationError, UnreadableFileError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

/** Rule name carried by findings for files that could not be read */
export const UNREADABLE_RULE = 'unreadable';

/**
 * Cap findings per rule, keeping the first ones.
 * Returns the kept findings and the number dropped.
 */
export function capFindings(
  findings: readonly Finding[],
  limit: number
): { kept: Finding[]; dropped: number } {
  if (findings.length <= limit) {
    return { kept: [...findings], dropped: 0 };
  }
  return { kept: findings.slice(0, limit), dropped: findings.length - limit };
}

/**
 * The synthetic finding that replaces the output of a rule that threw.
 */
export function ruleFailureFinding(rule: string, error: unknown): Finding {
  const reason = error instanceof Error ? error.message : String(error);
  return {
    rule,
    code: ErrorCodes.RULE_FAILED,
    severity: 'high',
    message: `Rule '${rule}' failed: ${reason}`,
  };
}

/**
 * Per-file analysis with fault isolation. Safe to call concurrently for
 * different paths; the cache is the only shared state.
 */
export class Analyzer {
  private readonly root: string;
  private readonly registry: RuleRegistry;
  private readonly cache: ResultCache | null;
  private readonly readTimeoutMs: number | undefined;
  private readonly normalizeWhitespace: boolean;
  private readonly scorer: Scorer;
  private counters = { hits: 0, misses: 0 };

  constructor(options: AnalyzerOptions) {
    this.root = path.resolve(options.root);
    this.registry = options.registry;
    this.cache = options.cache ?? null;
    this.readTimeoutMs = options.readTimeoutMs;
    this.normalizeWhitespace = options.normalizeWhitespace ?? false;
    this.scorer = createScorer(options.registry);
  }

  /** Cache hits and misses seen by this analyzer. */
  cacheCounters(): { hits: number; misses: number } {
    return { ...this.counters };
  }

  /**
   * Analyze one file. relativePath defaults to the path from the root.
   * Never rejects for problems with the file itself:
   * an unreadable file yields a result with a single unreadable finding.
   */
  async analyze(filePath: string, relativePath?: string): Promise<FileResult> {
    const absolute = path.resolve(this.root, filePath);
    relativePath ??= relativePosixPath(this.root, absolute);

    let bytes: Uint8Array;
    try {
      bytes = await readFileBytes(absolute, this.readTimeoutMs);
    } catch (error) {
      return this.unreadableResult(absolute, error, relativePath);
    }

    const fingerprint = computeChecksum(bytes);
    const version = this.registry.version;

    if (this.cache) {
      const cached = this.cache.get(absolute, fingerprint, version);
      // relativePath feeds the naming rule, so a result cached under another root is stale
      if (cached && cached.relativePath === relativePath) {
        this.counters.hits++;
        return cached;
      }
      this.counters.misses++;
    }

    const file: FileDescriptor = {
      path: absolute,
      relativePath,
      extension: extensionOf(absolute),
      size: bytes.length,
      binary: detectBinary(bytes),
    };
    const result = this.evaluate(file, { bytes, text: decodeText(bytes) }, fingerprint);

    if (this.cache) {
      try {
        this.cache.put(absolute, fingerprint, version, result);
      } catch (error) {
        log.warn(`Could not cache result for ${relativePath}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return result;
  }

  /**
   * Result for a file whose analysis could not complete. Never cached.
   */
  unreadableResult(filePath: string, error: unknown, relativePath?: string): FileResult {
    const absolute = path.resolve(this.root, filePath);
    const reason = describeReadError(absolute, error);
    log.debug(reason.message);

    const findings: Finding[] = [
      {
        rule: UNREADABLE_RULE,
        code: ErrorCodes.UNREADABLE,
        severity: 'critical',
        message: reason.message,
      },
    ];
    const score = this.scorer.score(findings);
    return {
      path: absolute,
      relativePath: relativePath ?? relativePosixPath(this.root, absolute),
      fingerprint: '',
      normalizedFingerprint: '',
      size: 0,
      extension: extensionOf(absolute),
      binary: false,
      findings,
      suppressed: {},
      score,
      status: this.scorer.status(score, true),
    };
  }

  private evaluate(file: FileDescriptor, content: FileContent, fingerprint: string): FileResult {
    const matches = this.registry.applicableRules(file);
    const graded = matches.length > 0 || this.registry.applicableCrossFileRules(file).length > 0;
    const limit = this.registry.settings.maxFindingsPerRule;

    const findings: Finding[] = [];
    const suppressed: Record<string, number> = {};

    for (const match of matches) {
      const { rule } = match;
      const produced = 'error' in match ? [ruleFailure(rule.name, file, match.error)] : runRule(rule, content, file);
      const { kept, dropped } = capFindings(produced, Math.min(rule.maxFindings ?? limit, limit));
      findings.push(...kept);
      if (dropped > 0) {
        suppressed[rule.name] = dropped;
      }
    }

    const score = this.scorer.score(findings);
    return {
      path: file.path,
      relativePath: file.relativePath,
      fingerprint,
      normalizedFingerprint: this.normalizeWhitespace ? computeNormalizedChecksum(content.bytes) : fingerprint,
      size: file.size,
      extension: file.extension,
      binary: file.binary,
      findings,
      suppressed,
      score,
      status: this.scorer.status(score, graded),
    };
  }
}

/**
 * Evaluate one rule; a throw becomes a single synthetic finding.
 */
function runRule(rule: FileRule, content: FileContent, file: FileDescriptor): Finding[] {
  try {
    return rule.evaluate(content, file);
  } catch (error) {
    return [ruleFailure(rule.name, file, error)];
  }
}

/**
 * Log a rule failure on a file and return its synthetic finding.
 */
export function ruleFailure(rule: string, file: FileDescriptor, error: unknown): Finding {
  const failure = new RuleEvaluationError(
    ErrorCodes.RULE_FAILED,
    `Rule '${rule}' failed on ${file.relativePath}`,
    { rule, path: file.path, originalError: error instanceof Error ? error.message : String(error) }
  );
  log.debug(failure.message, failure.details);
  return ruleFailureFinding(rule, error);
}

function describeReadError(filePath: string, error: unknown): UnreadableFileError {
  if (error instanceof Error && error.name === 'AbortError') {
    return new UnreadableFileError(ErrorCodes.READ_TIMEOUT, `Timed out reading ${filePath}`, { path: filePath });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new UnreadableFileError(ErrorCodes.UNREADABLE, `Cannot read ${filePath}: ${reason}`, {
    path: filePath,
  });
}

/**
 * Scorer using the registry's scoring settings and rule weights.
 * Findings from unknown rules (e.g. unreadable) weigh 1.
 */
export function createScorer(registry: RuleRegistry): Scorer {
  return new Scorer(registry.settings.scoring, (rule) => registry.get(rule)?.weight ?? 1);
}
