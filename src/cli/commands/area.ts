/**
 * The area command: read two dimensions, compute the area, report it.
 */
import { Command } from 'commander';
import { loadConfig, applyOverrides } from '../../core/config/loader.js';
import type { Config, ExitCodes } from '../../core/config/schema.js';
import { computeArea } from '../../core/area/engine.js';
import type { AreaOutcome } from '../../core/area/types.js';
import { getIntegerType, parseFixedWidthInt } from '../../core/integer/fixed-width.js';
import { createFormatter } from '../formatters/index.js';
import { promptForDimensions, type PromptStreams } from '../prompt.js';
import { logger as log } from '../../utils/logger.js';

export interface AreaCommandOptions {
  width?: string;
  height?: string;
  bits?: string;
  strategy?: string;
  json?: boolean;
  color: boolean;
  config?: string;
  verbose?: boolean;
}

/**
 * Create the area command.
 */
export function createAreaCommand(): Command {
  return new Command('area')
    .description('Compute the area of a rectangle from its width and height')
    .option('-w, --width <n>', 'Rectangle width (prompted for when omitted)')
    .option('--height <n>', 'Rectangle height (prompted for when omitted)')
    .option('-b, --bits <n>', 'Integer width in bits: 8, 16, 32 or 64')
    .option('-s, --strategy <name>', 'Overflow detection: checked or sign')
    .option('--json', 'Output as JSON')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to config file')
    .option('-v, --verbose', 'Show debug logging and computation details')
    .action(async (options: AreaCommandOptions) => {
      try {
        const exitCode = await runArea(options);
        if (exitCode !== 0) {
          process.exit(exitCode);
        }
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

/**
 * Run one invocation and print its outcome.
 * @returns the process exit status for the outcome
 */
export async function runArea(options: AreaCommandOptions, streams?: PromptStreams): Promise<number> {
  const config = await resolveConfig(options);
  log.setLevel(config.logging.level);
  log.debug('Resolved settings', {
    bits: config.integer.bits,
    strategy: config.overflow.strategy,
    format: config.output.format,
  });

  const answers = await promptForDimensions({ width: options.width, height: options.height }, streams);
  const type = getIntegerType(config.integer.bits);
  const width = parseFixedWidthInt(answers.width, type, 'width');
  const height = parseFixedWidthInt(answers.height, type, 'height');

  const outcome = computeArea(width, height, { type, strategy: config.overflow.strategy });
  log.debug(`Visited states: ${outcome.states.join(' -> ')}`);

  const exitCode = exitCodeFor(outcome, config.exit_codes);
  const formatter = createFormatter(config.output.format, {
    colors: config.output.colors,
    verbose: options.verbose ?? false,
  });
  console.log(
    formatter.formatOutcome(outcome, {
      bits: config.integer.bits,
      strategy: config.overflow.strategy,
      exitCode,
    })
  );

  return exitCode;
}

/**
 * Map an outcome to its configured exit status.
 */
export function exitCodeFor(outcome: AreaOutcome, codes: ExitCodes): number {
  if (outcome.status === 'succeeded') {
    return codes.success;
  }
  return outcome.reason === 'invalid_dimension' ? codes.invalid_dimension : codes.overflow;
}

async function resolveConfig(options: AreaCommandOptions): Promise<Config> {
  const config = await loadConfig(process.cwd(), options.config);
  return applyOverrides(config, {
    bits: options.bits !== undefined ? Number(options.bits) : undefined,
    strategy: options.strategy,
    format: options.json ? 'json' : undefined,
    colors: options.color ? undefined : false,
    logLevel: options.verbose ? 'debug' : undefined,
  });
}
