import * as path from 'node:path';
import { ConfigFileSchema, ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, writeYaml } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const CONFIG_DIR = '.filequal';
export const DEFAULT_CONFIG_PATH = '.filequal/config.yaml';

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
  const fullPath = getConfigPath(projectRoot, configPath);

  if (!(await fileExists(fullPath))) {
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
 * Get the config file path for a project.
 */
export function getConfigPath(projectRoot: string, configPath?: string): string {
  return path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);
}

/**
 * Check if a config file exists in the project.
 */
export async function configExists(projectRoot: string, configPath?: string): Promise<boolean> {
  return fileExists(getConfigPath(projectRoot, configPath));
}

/**
 * Write the fully-defaulted configuration so every key is visible for editing.
 */
export async function writeDefaultConfig(projectRoot: string, configPath?: string): Promise<string> {
  const fullPath = getConfigPath(projectRoot, configPath);
  await writeYaml(fullPath, getDefaultConfig());
  return fullPath;
}
