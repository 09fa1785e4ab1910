/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.gochunk)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import type { ZodError } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath, getGochunkDir } from './paths.js';
import { ConfigError } from '../errors/index.js';

/**
 * Ensure the ~/.gochunk directory exists
 */
function ensureGochunkDir(): void {
  const dir = getGochunkDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target
 * This handles nested objects properly (unlike Object.assign or spread)
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    // If both values are objects (not arrays, not null), recurse
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      // Direct assignment for primitives or when source has a value
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

/**
 * Read and parse the TOML config file.
 *
 * @throws ConfigError when the file is not valid TOML
 */
function readConfigFile(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: gochunk config reset --force`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, creates default config on first run
 * @throws ConfigError if config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  // If config doesn't exist, either create it or just use defaults
  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureGochunkDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readConfigFile(configPath);

  // Validate against the partial schema (allows missing fields)
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error)}`,
      'Run: gochunk config reset --force  to restore defaults'
    );
  }

  // Merge user config with defaults; the full schema gives back the typed value
  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(merged.error)}`,
      'Run: gochunk config reset --force  to restore defaults'
    );
  }
  return merged.data;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('output.file') => 'code_chunks.json'
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 */
export function setConfigValue(key: string, value: string): void {
  const configPath = getConfigPath();
  ensureGochunkDir();

  const parts = key.split('.').filter((p) => p !== '');
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: gochunk config list  to see available keys'
    );
  }

  // Load existing config or start fresh
  const config: Record<string, unknown> = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  // Set the value at the nested path
  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  // Validate the complete config before saving
  const validationResult = ConfigSchema.strict().safeParse(deepMerge(DEFAULT_CONFIG, config));
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error)}`,
      'Run: gochunk config list  to see current values and types'
    );
  }

  // Write back to file; the tree holds only TOML-parsed and parseValue() values
  const tomlContent = TOML.stringify(config as TOML.JsonMap);
  fs.writeFileSync(configPath, tomlContent, 'utf-8');
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, comma-separated lists (`[a,b]`) and strings
 */
export function parseValue(value: string): unknown {
  // Boolean
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  // List
  const trimmed = value.trim();
  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    return trimmed
      .slice(1, -1)
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== '');
  }

  // Number
  const num = Number(value);
  if (!isNaN(num) && trimmed !== '') return num;

  // String (default)
  return value;
}

/**
 * Reset the config file to the default template
 */
export function resetConfig(): void {
  ensureGochunkDir();
  fs.writeFileSync(getConfigPath(), CONFIG_TEMPLATE, 'utf-8');
}

/**
 * List all config values in a flat format
 * Returns entries like ['output.file', 'code_chunks.json']
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}
