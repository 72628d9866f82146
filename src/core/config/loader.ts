/**
 * Configuration loading.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_FILE = '.repoaudit.yaml';

/** An empty document parses to null. */
const ConfigFileSchema = ConfigSchema.nullable().transform((value) => value ?? getDefaultConfig());

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration for a repository.
 * Falls back to defaults if the file doesn't exist; an empty file also
 * yields the defaults.
 *
 * @param root - Scanned repository root
 * @param configPath - Explicit config file, relative to the working directory
 */
export async function loadConfig(root: string, configPath?: string): Promise<Config> {
  const fullPath = configPath ? path.resolve(configPath) : path.resolve(root, DEFAULT_CONFIG_FILE);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Config file not found: ${fullPath}`, {
        path: fullPath,
      });
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigFileSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Combine file values with command line overrides: lists are unioned,
 * scalars given on the command line win.
 */
export function mergeConfig(base: Config, overrides: Partial<Config>): Config {
  const union = (a: string[], b: string[] | undefined): string[] => [...new Set([...a, ...(b ?? [])])];
  return {
    skip: union(base.skip, overrides.skip),
    skip_types: union(base.skip_types, overrides.skip_types),
    exclude: union(base.exclude, overrides.exclude),
    min_severity: overrides.min_severity ?? base.min_severity,
    format: overrides.format ?? base.format,
    plain: overrides.plain ?? base.plain,
  };
}
