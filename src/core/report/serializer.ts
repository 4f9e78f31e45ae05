/**
 * Saving and loading RunReports as JSON.
 */
import type { RunReport } from './types.js';
import { RunReportSchema } from './schema.js';
import { deepFreeze } from './aggregator.js';
import { readFile, writeFileAtomic } from '../../utils/file-system.js';
import { ErrorCodes, ReportFormatError } from '../../utils/errors.js';
import { REPORT_FORMAT_VERSION } from '../version.js';

/**
 * Stable JSON: key order follows report construction, 2-space indent,
 * trailing newline.
 */
export function serializeReport(report: RunReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export async function saveReport(report: RunReport, filePath: string): Promise<void> {
  await writeFileAtomic(filePath, serializeReport(report));
}

/**
 * Parse and validate serialized report content.
 * @throws ReportFormatError when the content is not a report of a known format
 */
export function parseReport(content: string, source = 'report'): RunReport {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ReportFormatError(
      ErrorCodes.REPORT_INVALID,
      `${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { source }
    );
  }

  const result = RunReportSchema.safeParse(data);
  if (!result.success) {
    throw new ReportFormatError(ErrorCodes.REPORT_INVALID, `${source} is not a valid report`, {
      source,
      issues: result.error.issues.map((i) => `${i.path.map(String).join('.')}: ${i.message}`),
    });
  }
  if (result.data.formatVersion !== REPORT_FORMAT_VERSION) {
    throw new ReportFormatError(
      ErrorCodes.REPORT_INVALID,
      `${source} has format version ${result.data.formatVersion}; expected ${REPORT_FORMAT_VERSION}`,
      { source, formatVersion: result.data.formatVersion }
    );
  }

  return deepFreeze(result.data);
}

/**
 * Read a saved report.
 * @throws ReportFormatError when the file is unreadable or malformed
 */
export async function loadReport(filePath: string): Promise<RunReport> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new ReportFormatError(
      ErrorCodes.REPORT_INVALID,
      `Cannot read report ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: filePath }
    );
  }
  return parseReport(content, filePath);
}
