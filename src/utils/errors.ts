/**
 * Error types and codes for filequal.
 * This is the error contract - all errors should extend FileQualError.
 */

/**
 * Base error class for all filequal errors.
 */
export class FileQualError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FileQualError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation, rule set assembly).
 */
export class ConfigError extends FileQualError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * The analysis root cannot be resolved or read.
 * The only run-level failure that escapes to the caller.
 */
export class AccessError extends FileQualError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'AccessError';
  }
}

/**
 * A single file could not be read. Degrades to a finding.
 */
export class UnreadableFileError extends FileQualError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'UnreadableFileError';
  }
}

/**
 * A rule threw while evaluating a file. Degrades to a synthetic finding.
 */
export class RuleEvaluationError extends FileQualError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RuleEvaluationError';
  }
}

/**
 * A cache entry could not be decoded. Treated as a cache miss.
 */
export class CacheCorruptionError extends FileQualError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CacheCorruptionError';
  }
}

/**
 * A saved report does not match the report format.
 */
export class ReportFormatError extends FileQualError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ReportFormatError';
  }
}

/**
 * System errors (parse errors, unexpected I/O failures).
 */
export class SystemError extends FileQualError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Finding codes (FQ0xx built-in rules)
  FILE_TOO_LARGE: 'FQ001',
  INVALID_ENCODING: 'FQ002',
  DISALLOWED_LINE_ENDING: 'FQ003',
  MIXED_LINE_ENDINGS: 'FQ004',
  TRAILING_WHITESPACE: 'FQ005',
  NAMING_VIOLATION: 'FQ006',
  DUPLICATE_CONTENT: 'FQ007',

  // Synthetic finding codes
  RULE_FAILED: 'FQ900',
  UNREADABLE: 'FQ901',
  DISCOVERY_SKIPPED: 'FQ902',

  // Run-level errors
  ROOT_NOT_FOUND: 'A001',
  ROOT_UNREADABLE: 'A002',

  // Config errors
  CONFIG_LOAD_ERROR: 'C001',
  DUPLICATE_RULE: 'C002',
  INVALID_PATTERN: 'C003',

  // Cache errors
  CACHE_ENTRY_CORRUPT: 'K001',

  // Report errors
  REPORT_INVALID: 'R001',

  // System errors
  PARSE_ERROR: 'S001',
  READ_TIMEOUT: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
