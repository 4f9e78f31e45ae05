/**
 * Version of the analysis semantics. Part of every rule-set version, so
 * bumping it invalidates all cached results.
 */
export const ENGINE_VERSION = '1.0.0';

/** Shape version of serialized RunReports. */
export const REPORT_FORMAT_VERSION = 1;
