import chalk from 'chalk';
import type { AreaOutcome } from '../../core/area/types.js';
import type { IFormatter, FormatOptions, OutcomeContext } from './types.js';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatOutcome(outcome: AreaOutcome, context: OutcomeContext): string {
    const lines: string[] = [];

    if (outcome.status === 'succeeded') {
      lines.push(`Area of a ${outcome.width} by ${outcome.height} rectangle is: ${outcome.area}`);
    } else {
      lines.push(this.colorize(outcome.message, 'red'));
    }

    if (this.options.verbose) {
      lines.push(
        this.colorize(`   Integer type: ${context.bits}-bit signed, ${context.strategy} overflow detection`, 'dim')
      );
      lines.push(this.colorize(`   States: ${outcome.states.join(' → ')}`, 'dim'));
    }

    return lines.join('\n');
  }

  private colorize(text: string, color: 'red' | 'dim'): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
