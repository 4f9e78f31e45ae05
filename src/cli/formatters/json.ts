import type { FileResult, RunReport } from '../../core/report/types.js';
import { serializeReport } from '../../core/report/serializer.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 * A formatted report loads back with loadReport().
 */
export class JsonFormatter implements IFormatter {
  formatResult(result: FileResult): string {
    return JSON.stringify(result, null, 2);
  }

  formatReport(report: RunReport): string {
    return serializeReport(report).trimEnd();
  }
}
