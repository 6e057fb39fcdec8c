/**
 * Configuration loading: defaults <- `.dupscope.yaml` <- caller overrides.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { formatZodError, loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes, errorMessage } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.dupscope.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration for a scan root.
 * Falls back to defaults if the file doesn't exist; an explicit path that
 * does not exist is an error.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to load config from ${fullPath}: ${errorMessage(error)}`,
      { path: fullPath, originalError: errorMessage(error) }
    );
  }
}

export interface ConfigOverrides {
  extensions?: string[];
  ignoreDirs?: string[];
  minSize?: number;
  minSimilarity?: number;
  strategy?: Config['duplicates']['strategy'];
  concurrency?: number;
  format?: Config['output']['format'];
  outputFile?: string;
}

/**
 * Apply caller overrides (CLI flags) on top of a loaded config.
 * The result is validated again, so out-of-range values are rejected here.
 */
export function mergeConfig(base: Config, overrides: ConfigOverrides = {}): Config {
  const merged = {
    ...base,
    scan: {
      extensions: overrides.extensions ?? base.scan.extensions,
      ignore_dirs: overrides.ignoreDirs ?? base.scan.ignore_dirs,
    },
    duplicates: {
      min_size: overrides.minSize ?? base.duplicates.min_size,
      min_similarity: overrides.minSimilarity ?? base.duplicates.min_similarity,
      strategy: overrides.strategy ?? base.duplicates.strategy,
    },
    extraction: {
      ...base.extraction,
      concurrency: overrides.concurrency ?? base.extraction.concurrency,
    },
    output: {
      format: overrides.format ?? base.output.format,
      file: overrides.outputFile ?? base.output.file,
    },
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_OPTION,
      `Invalid option: ${formatZodError(result.error)}`,
      { issues: result.error.issues }
    );
  }
  return result.data;
}
