/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { homedir } from 'node:os';
import { ConfigSchema, type Config } from './schema.js';
import {
  CONFIG_FILE_NAME,
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG,
  ENV_VARS,
  GLOBAL_CONFIG_DIR,
} from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

type ConfigLayer = Record<string, unknown>;

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('pulse', {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

export interface LoadConfigOptions {
  /** Environment to read overrides from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Global config file; defaults to ~/.pulse/config.yaml */
  globalConfigPath?: string;
}

function isRecord(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Path of the global configuration file
 */
export function getGlobalConfigPath(): string {
  return path.join(homedir(), GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);
}

/**
 * Load global configuration from ~/.pulse/config.yaml
 */
async function loadGlobalConfig(globalConfigPath: string): Promise<ConfigLayer> {
  let content: string;
  try {
    content = await fs.readFile(globalConfigPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {};
    }
    console.warn(`Cannot read global config ${globalConfigPath}:`, error instanceof Error ? error.message : error);
    return {};
  }

  try {
    const parsed: unknown = parseYaml(content);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    console.warn(`Ignoring invalid global config ${globalConfigPath}:`, error instanceof Error ? error.message : error);
    return {};
  }
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<ConfigLayer> {
  try {
    const result = await explorer.search(cwd);
    if (result && !result.isEmpty && isRecord(result.config)) {
      return result.config;
    }
  } catch (error) {
    console.warn('Ignoring invalid project config:', error instanceof Error ? error.message : error);
  }
  return {};
}

function parseInteger(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value.trim())) return null;
  return parseInt(value, 10);
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const config: ConfigLayer = {};

  // Rule source
  const rules = env[ENV_VARS.RULES];
  if (rules && rules.trim() !== '') {
    config.rules = { source: rules.trim() };
  }

  // Exit threshold
  const failBelow = parseInteger(env[ENV_VARS.FAIL_BELOW]);
  if (failBelow !== null && failBelow <= 100) {
    config.thresholds = { fail_below: failBelow };
  }

  // Scan deadline
  const timeout = parseInteger(env[ENV_VARS.SCAN_TIMEOUT_MS]);
  if (timeout !== null) {
    config.scan = { timeout_ms: timeout };
  }

  // Verbose/log level
  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    config.output = { verbose: true };
  }

  return config;
}

/**
 * Deep merge configuration layers. Arrays and scalars from `source`
 * replace those in `target`; nested objects merge.
 */
export function deepMerge(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
  const result: ConfigLayer = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > global config > defaults
 */
export async function loadConfig(cwd?: string, options: LoadConfigOptions = {}): Promise<Config> {
  // Load from all sources
  const globalConfig = await loadGlobalConfig(options.globalConfigPath ?? getGlobalConfigPath());
  const projectConfig = await loadProjectConfig(cwd);
  const envConfig = loadEnvConfig(options.env);

  // Merge in priority order
  let merged = deepMerge(DEFAULT_CONFIG, globalConfig);
  merged = deepMerge(merged, projectConfig);
  merged = deepMerge(merged, envConfig);

  // Validate final config
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    console.warn('Configuration validation warnings:', result.error.format());
    // Return defaults if validation fails
    return DEFAULT_CONFIG;
  }

  return result.data;
}

/**
 * Get a specific config value by dotted path
 */
export function getConfigValue(config: Config, keyPath: string): unknown {
  let current: unknown = config;

  for (const key of keyPath.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}

/**
 * Search for the project config file
 */
export async function findConfigPath(cwd?: string): Promise<string | null> {
  try {
    const result = await explorer.search(cwd);
    return result?.filepath ?? null;
  } catch (error) {
    console.warn('Cannot search for project config:', error instanceof Error ? error.message : error);
    return null;
  }
}
