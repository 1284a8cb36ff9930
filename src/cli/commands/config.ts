import { isLogLevel } from '../../core/logger.js';
import { loadConfig, saveConfig, type CodeloreConfig } from '../../storage/config.js';

export type ConfigKey = keyof CodeloreConfig;

// Valid config keys that can be get/set
const VALID_KEYS: ConfigKey[] = [
  'maxFileSize',
  'excludes',
  'includeHidden',
  'respectGitignore',
  'concurrency',
  'previewLines',
  'maxResults',
  'logLevel',
];

export type ConfigCommandResult =
  | { action: 'show'; config: CodeloreConfig }
  | { action: 'get'; key: ConfigKey; value: CodeloreConfig[ConfigKey] }
  | { action: 'set'; key: ConfigKey; value: CodeloreConfig[ConfigKey] };

export function isConfigKey(key: string): key is ConfigKey {
  return VALID_KEYS.some(valid => valid === key);
}

/**
 * Run the config command.
 *
 * @param key - Optional config key to get or set
 * @param value - Optional value to set (requires key)
 */
export async function runConfigCommand(key?: string, value?: string): Promise<ConfigCommandResult> {
  const config = await loadConfig();

  // Show all config
  if (!key) {
    return { action: 'show', config };
  }

  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key}. Valid keys: ${VALID_KEYS.join(', ')}`);
  }

  // Get single value
  if (value === undefined) {
    return { action: 'get', key, value: config[key] };
  }

  const updated: CodeloreConfig = { ...config, ...parseValue(key, value) };
  await saveConfig(updated);
  return { action: 'set', key, value: updated[key] };
}

function parseInteger(key: ConfigKey, value: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0) {
    throw new Error(`Invalid numeric value for ${key}: ${value}`);
  }
  return num;
}

function parseBoolean(key: ConfigKey, value: string): boolean {
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  throw new Error(`Invalid boolean value for ${key}: ${value} (use true or false)`);
}

/**
 * Parse a string value to the appropriate type for the config key.
 */
function parseValue(key: ConfigKey, value: string): Partial<CodeloreConfig> {
  switch (key) {
    case 'maxFileSize':
      return { maxFileSize: parseInteger(key, value) };
    case 'concurrency':
      return { concurrency: parseInteger(key, value) };
    case 'previewLines':
      return { previewLines: parseInteger(key, value) };
    case 'maxResults':
      return { maxResults: parseInteger(key, value) };
    case 'includeHidden':
      return { includeHidden: parseBoolean(key, value) };
    case 'respectGitignore':
      return { respectGitignore: parseBoolean(key, value) };
    case 'excludes':
      // Comma-separated list
      return { excludes: value.split(',').map(s => s.trim()).filter(s => s.length > 0) };
    case 'logLevel':
      if (!isLogLevel(value)) {
        throw new Error(`Invalid log level: ${value}`);
      }
      return { logLevel: value };
  }
}

/**
 * Format a config value for display.
 */
function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return String(value);
}

export function formatConfigResult(result: ConfigCommandResult): string {
  switch (result.action) {
    case 'show':
      return VALID_KEYS.map(key => `${key}: ${formatValue(result.config[key])}`).join('\n');
    case 'get':
      return formatValue(result.value);
    case 'set':
      return `Set ${result.key} = ${formatValue(result.value)}`;
  }
}
