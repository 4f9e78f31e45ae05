import type { FormatOptions, IFormatter, OutputFormat } from './types.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import { CompactFormatter } from './compact.js';

export * from './types.js';
export { HumanFormatter, JsonFormatter, CompactFormatter };

/**
 * Create the formatter for an output format.
 */
export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'compact':
      return new CompactFormatter();
    case 'human':
      return new HumanFormatter(options);
  }
}
