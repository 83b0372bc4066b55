/**
 * Formatter type definitions.
 */
import type { AreaOutcome, OverflowStrategy } from '../../core/area/types.js';
import type { IntegerWidth } from '../../core/integer/fixed-width.js';
import type { OutputFormat } from '../../core/config/schema.js';

export type { OutputFormat };

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Add the integer type and overflow strategy to the report */
  verbose: boolean;
}

/**
 * Settings an outcome was computed under.
 */
export interface OutcomeContext {
  bits: IntegerWidth;
  strategy: OverflowStrategy;
  exitCode: number;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatOutcome(outcome: AreaOutcome, context: OutcomeContext): string;
}
