/**
 * Configuration schema for .rect-area.yaml.
 */
import { z } from 'zod';
import { INTEGER_WIDTHS } from '../integer/fixed-width.js';

/**
 * Make an object field optional and apply its inner defaults when missing.
 * Both undefined and null are treated as "missing".
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const IntegerWidthSchema = z.literal(INTEGER_WIDTHS);

export const OverflowStrategySchema = z.enum(['checked', 'sign']);

export const OutputFormatSchema = z.enum(['human', 'json']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Fixed-width integer representation for dimensions and area. */
export const IntegerSettingsSchema = z.object({
  bits: IntegerWidthSchema.default(32),
});

export const OverflowSettingsSchema = z.object({
  /** checked compares against the type maximum; sign only flags negative wrapped products */
  strategy: OverflowStrategySchema.default('checked'),
});

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
  colors: z.boolean().default(true),
});

export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('warn'),
});

/** Process exit status per outcome. */
export const ExitCodesSchema = z.object({
  success: z.number().int().min(0).default(0),
  invalid_dimension: z.number().int().min(0).default(1),
  overflow: z.number().int().min(0).default(1),
});

/** Complete .rect-area.yaml schema. */
export const ConfigSchema = z.object({
  integer: withDefaults(IntegerSettingsSchema),
  overflow: withDefaults(OverflowSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
  exit_codes: withDefaults(ExitCodesSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ExitCodes = z.infer<typeof ExitCodesSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
