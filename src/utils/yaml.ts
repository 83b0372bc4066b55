/**
 * YAML parsing with schema validation.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { SystemError, ConfigError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 * An empty document is treated as an empty mapping so schema defaults apply.
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content) ?? {};
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { issues: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to load YAML file: ${filePath}`,
      { filePath, reason: error instanceof Error ? error.message : String(error) }
    );
  }
  return parseYamlWithSchema(content, schema);
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
