import type { AreaOutcome } from '../../core/area/types.js';
import type { IFormatter, OutcomeContext } from './types.js';

/**
 * JSON output formatter for machine consumption.
 * Integers are emitted as decimal strings so 64-bit values keep their precision.
 */
export class JsonFormatter implements IFormatter {
  formatOutcome(outcome: AreaOutcome, context: OutcomeContext): string {
    const result: Record<string, unknown> = {
      status: outcome.status,
      width: outcome.width.toString(),
      height: outcome.height.toString(),
    };

    if (outcome.status === 'succeeded') {
      result.area = outcome.area.toString();
    } else {
      result.reason = outcome.reason;
      result.message = outcome.message;
    }

    result.integer_bits = context.bits;
    result.overflow_strategy = context.strategy;
    result.exit_code = context.exitCode;

    return JSON.stringify(result, null, 2);
  }
}
