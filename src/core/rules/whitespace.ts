import type { FileContent, FileDescriptor, Finding, RuleSettings } from './types.js';
import { BaseFileRule, isTextFile } from './base.js';
import { ErrorCodes } from '../../utils/errors.js';
import type { LineEnding } from '../config/schema.js';

export interface WhitespaceRuleOptions {
  allowedLineEndings: LineEnding[];
  trailingWhitespace: boolean;
  maxFindings: number;
}

export interface SourceLine {
  /** 1-based line number */
  line: number;
  /** Line text without its terminator */
  text: string;
  /** Terminator, or null for a final unterminated line */
  ending: LineEnding | null;
}

const ENDING_LABELS: Record<LineEnding, string> = {
  lf: 'LF',
  crlf: 'CRLF',
  cr: 'CR',
};

/**
 * Index where a run of trailing spaces/tabs begins, or -1.
 */
export function trailingWhitespaceStart(text: string): number {
  let end = text.length;
  while (end > 0 && (text[end - 1] === ' ' || text[end - 1] === '\t')) {
    end--;
  }
  return end < text.length ? end : -1;
}

/**
 * Split text into lines, keeping track of each line's terminator.
 */
export function splitLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let start = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text.charCodeAt(i);
    if (ch === 0x0a || ch === 0x0d) {
      let ending: LineEnding = 'lf';
      let width = 1;
      if (ch === 0x0d) {
        if (text.charCodeAt(i + 1) === 0x0a) {
          ending = 'crlf';
          width = 2;
        } else {
          ending = 'cr';
        }
      }
      lines.push({ line: lines.length + 1, text: text.slice(start, i), ending });
      i += width;
      start = i;
    } else {
      i++;
    }
  }

  if (start < text.length) {
    lines.push({ line: lines.length + 1, text: text.slice(start), ending: null });
  }

  return lines;
}

/**
 * Most frequent line ending; ties go to the one seen first.
 */
export function dominantLineEnding(lines: SourceLine[]): LineEnding | null {
  const counts = new Map<LineEnding, number>();
  for (const { ending } of lines) {
    if (ending) counts.set(ending, (counts.get(ending) ?? 0) + 1);
  }

  let best: LineEnding | null = null;
  let bestCount = 0;
  // Map iteration follows insertion order, i.e. first occurrence
  for (const [ending, count] of counts) {
    if (count > bestCount) {
      best = ending;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Line-ending and trailing-whitespace hygiene.
 * One finding per offending line; the analyzer caps the total at maxFindings.
 */
export class WhitespaceRule extends BaseFileRule {
  readonly name = 'whitespace';
  readonly description = 'Consistent, allowed line endings and no trailing whitespace';
  protected readonly code = ErrorCodes.TRAILING_WHITESPACE;

  readonly maxFindings: number;
  private readonly allowed: ReadonlySet<LineEnding>;
  private readonly checkTrailing: boolean;

  constructor(settings: RuleSettings, options: WhitespaceRuleOptions) {
    super(settings, {
      allowedLineEndings: [...options.allowedLineEndings],
      trailingWhitespace: options.trailingWhitespace,
      maxFindings: options.maxFindings,
    });
    this.allowed = new Set(options.allowedLineEndings);
    this.checkTrailing = options.trailingWhitespace;
    this.maxFindings = options.maxFindings;
  }

  protected appliesTo(file: FileDescriptor): boolean {
    return isTextFile(file);
  }

  evaluate(content: FileContent, _file: FileDescriptor): Finding[] {
    const lines = splitLines(content.text);
    const findings: Finding[] = [];

    const styles = new Set(lines.flatMap((l) => (l.ending ? [l.ending] : [])));
    const mixed = styles.size > 1;
    const reference = dominantLineEnding(lines);
    const allowedLabel = [...this.allowed].map((e) => ENDING_LABELS[e]).join(', ');

    for (const { line, text, ending } of lines) {
      if (this.checkTrailing) {
        const column = trailingWhitespaceStart(text);
        if (column !== -1) {
          findings.push(this.createFinding('low', 'Trailing whitespace', { line, column: column + 1 }));
        }
      }

      if (!ending) continue;

      if (mixed && reference && ending !== reference) {
        findings.push(
          this.createFinding(
            'medium',
            `Mixed line endings: ${ENDING_LABELS[ending]} where the file mostly uses ${ENDING_LABELS[reference]}`,
            { line },
            ErrorCodes.MIXED_LINE_ENDINGS
          )
        );
      } else if (!this.allowed.has(ending)) {
        findings.push(
          this.createFinding(
            'low',
            `Line ends with ${ENDING_LABELS[ending]}; allowed: ${allowedLabel}`,
            { line },
            ErrorCodes.DISALLOWED_LINE_ENDING
          )
        );
      }
    }

    return findings;
  }
}
