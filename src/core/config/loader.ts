import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists, formatZodError } from '../../utils/index.js';
import { ConfigError, ErrorCodes, RectAreaError } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.rect-area.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * A missing file at the default location yields the defaults; an explicitly
 * requested file must exist.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath === undefined) {
      return getDefaultConfig();
    }
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Config file not found: ${fullPath}`, {
      path: fullPath,
    });
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof RectAreaError) {
      throw new ConfigError(
        error instanceof ConfigError ? error.code : ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { ...error.details, path: fullPath }
      );
    }
    throw error;
  }
}

/**
 * Values given on the command line, taking precedence over the file.
 */
export interface ConfigOverrides {
  bits?: number;
  strategy?: string;
  format?: string;
  colors?: boolean;
  logLevel?: string;
}

/**
 * Layer overrides on top of a loaded config, validated by the same schema.
 */
export function applyOverrides(config: Config, overrides: ConfigOverrides): Config {
  const candidate = {
    ...config,
    integer: { ...config.integer, ...pickDefined({ bits: overrides.bits }) },
    overflow: { ...config.overflow, ...pickDefined({ strategy: overrides.strategy }) },
    output: {
      ...config.output,
      ...pickDefined({ format: overrides.format, colors: overrides.colors }),
    },
    logging: { ...config.logging, ...pickDefined({ level: overrides.logLevel }) },
  };

  const result = ConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid option: ${formatZodError(result.error)}`,
      { issues: result.error.issues }
    );
  }
  return result.data;
}

function pickDefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}
