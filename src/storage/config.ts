import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { getConfigPath } from '../cli/utils/paths.js';
import { DEFAULT_EXCLUDES } from '../core/walker.js';
import { errorMessage, IndexFormatError, isNodeError } from '../core/errors.js';
import { LOG_LEVELS, type LogLevel } from '../core/logger.js';
import { parseRecord } from '../core/validation.js';

/**
 * Configuration schema for codelore.
 */
export interface CodeloreConfig {
  /** Maximum file size to analyze in bytes */
  maxFileSize: number;
  /** Directory and file names or globs to skip */
  excludes: string[];
  /** Whether to analyze hidden files and directories */
  includeHidden: boolean;
  /** Whether to respect .gitignore and .codeloreignore */
  respectGitignore: boolean;
  /** Number of files parsed in parallel */
  concurrency: number;
  /** Number of source lines kept as each entity's preview */
  previewLines: number;
  /** Default number of query results */
  maxResults: number;
  /** Log level for the stderr logger */
  logLevel: LogLevel;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CodeloreConfig = {
  maxFileSize: 10 * 1024 * 1024, // 10MB
  excludes: [...DEFAULT_EXCLUDES],
  includeHidden: false,
  respectGitignore: true,
  concurrency: 10,
  previewLines: 5,
  maxResults: 10,
  logLevel: 'info',
};

const logLevelSchema = z.custom<LogLevel>(
  value => typeof value === 'string' && LOG_LEVELS.some(level => level === value),
  { message: `Expected one of ${LOG_LEVELS.join(', ')}` }
);

/**
 * Every key is optional in the file; missing keys take their defaults.
 */
const configFileSchema = z
  .object({
    maxFileSize: z.number().int().positive(),
    excludes: z.array(z.string()),
    includeHidden: z.boolean(),
    respectGitignore: z.boolean(),
    concurrency: z.number().int().positive(),
    previewLines: z.number().int().positive(),
    maxResults: z.number().int().positive(),
    logLevel: logLevelSchema,
  })
  .partial();

/**
 * Load configuration from file, merging with defaults.
 *
 * @throws {IndexFormatError} If the file is not JSON or holds values of the wrong type
 */
export async function loadConfig(): Promise<CodeloreConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return { ...DEFAULT_CONFIG, excludes: [...DEFAULT_CONFIG.excludes] };
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new IndexFormatError('configuration', errorMessage(error));
  }

  const parsed = parseRecord(configFileSchema, data, 'configuration');

  // Parsed values override defaults
  return {
    ...DEFAULT_CONFIG,
    ...parsed,
  };
}

/**
 * Save configuration to file.
 */
export async function saveConfig(config: CodeloreConfig): Promise<void> {
  const configPath = getConfigPath();

  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2), 'utf-8');
}

/**
 * Get a specific configuration value.
 */
export async function getConfigValue<K extends keyof CodeloreConfig>(key: K): Promise<CodeloreConfig[K]> {
  const config = await loadConfig();
  return config[key];
}

/**
 * Set a specific configuration value.
 */
export async function setConfigValue<K extends keyof CodeloreConfig>(
  key: K,
  value: CodeloreConfig[K]
): Promise<void> {
  const config = await loadConfig();
  config[key] = value;
  await saveConfig(config);
}
