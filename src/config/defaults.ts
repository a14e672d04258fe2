/**
 * Default configuration values and well-known names
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  rules: {
    source: null,
    fail_on_warnings: false,
  },
  scan: {
    concurrency: 8,
    timeout_ms: 0,
    extra_ignores: [],
  },
  evaluation: {
    concurrency: 4,
  },
  report: {
    format: 'text',
    top_actions: 5,
  },
  thresholds: {
    fail_below: 50,
  },
  history: {
    enabled: false,
    dir: '.pulse/history',
    limit: 10,
  },
  output: {
    verbose: false,
    log_file: null,
  },
};

/**
 * Configuration file names to search for, in order
 */
export const CONFIG_FILE_NAMES = [
  'pulse.config.yaml',
  'pulse.config.yml',
  '.pulserc.yaml',
  '.pulserc.yml',
  '.pulserc',
  '.pulse/config.yaml',
];

/**
 * Global config directory, relative to the home directory
 */
export const GLOBAL_CONFIG_DIR = '.pulse';

/**
 * Config file name in the .pulse directory
 */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Domain string every history record is isolated under
 */
export const HISTORY_DOMAIN = 'project-pulse';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  RULES: 'PULSE_RULES',
  FAIL_BELOW: 'PULSE_FAIL_BELOW',
  SESSION_ID: 'PULSE_SESSION_ID',
  LOG_LEVEL: 'PULSE_LOG_LEVEL',
  SCAN_TIMEOUT_MS: 'PULSE_SCAN_TIMEOUT_MS',
} as const;
