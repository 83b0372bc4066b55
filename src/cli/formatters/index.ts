import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export * from './types.js';
export { HumanFormatter, JsonFormatter };

/**
 * Pick the formatter for an output format.
 */
export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  return format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
