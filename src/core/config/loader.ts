/**
 * Configuration loading.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = 'dialect-forge.config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    // An empty file parses to null
    return await loadYamlWithSchema(fullPath, ConfigSchema.nullable().transform((c) => c ?? getDefaultConfig()));
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
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}
