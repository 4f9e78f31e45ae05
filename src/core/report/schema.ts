/**
 * Zod schemas for persisted results: cache rows and saved reports.
 */
import { z } from 'zod';
import { SEVERITY_LEVELS } from '../rules/types.js';

export const SeveritySchema = z.enum(SEVERITY_LEVELS);

export const FindingSchema = z.object({
  rule: z.string(),
  code: z.string(),
  severity: SeveritySchema,
  message: z.string(),
  location: z
    .object({
      line: z.number().int().min(1).optional(),
      column: z.number().int().min(1).optional(),
      offset: z.number().int().min(0).optional(),
    })
    .optional(),
});

export const FileStatusSchema = z.enum(['pass', 'fail', 'ungraded']);

export const FileResultSchema = z.object({
  path: z.string().min(1),
  relativePath: z.string(),
  fingerprint: z.string(),
  normalizedFingerprint: z.string(),
  size: z.number().int().min(0),
  extension: z.string(),
  binary: z.boolean(),
  findings: z.array(FindingSchema),
  suppressed: z.record(z.string(), z.number().int().min(0)),
  score: z.number().min(0),
  status: FileStatusSchema,
});

export const DiscoveryFindingSchema = z.object({
  path: z.string(),
  code: z.string(),
  message: z.string(),
});

const SeverityCountsSchema = z.object({
  info: z.number().int().min(0),
  low: z.number().int().min(0),
  medium: z.number().int().min(0),
  high: z.number().int().min(0),
  critical: z.number().int().min(0),
});

export const RunSummarySchema = z.object({
  totalFiles: z.number().int().min(0),
  gradedFiles: z.number().int().min(0),
  aggregateScore: z.number().nullable(),
  severityCounts: SeverityCountsSchema,
  statusCounts: z.object({
    pass: z.number().int().min(0),
    fail: z.number().int().min(0),
    ungraded: z.number().int().min(0),
  }),
  findingsByRule: z.record(z.string(), z.number().int().min(0)),
  distribution: z.array(
    z.object({
      min: z.number(),
      max: z.number(),
      count: z.number().int().min(0),
    })
  ),
  flaggedFiles: z.number().int().min(0),
  worstOffenders: z.array(
    z.object({
      path: z.string(),
      relativePath: z.string(),
      score: z.number(),
      findings: z.number().int().min(0),
    })
  ),
});

export const RunReportSchema = z.object({
  formatVersion: z.number().int(),
  timestamp: z.string(),
  root: z.string(),
  complete: z.boolean(),
  ruleSetVersion: z.string(),
  files: z.array(FileResultSchema),
  discoveryFindings: z.array(DiscoveryFindingSchema),
  summary: RunSummarySchema,
});
