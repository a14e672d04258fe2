/**
 * Library entry point
 * Programmatic access to scanning, rule evaluation, reporting and history
 */

export * from './types/index.js';
export * from './analysis/analysis-logger.js';
export * from './analysis/snapshot.js';
export * from './analysis/structure-scanner.js';
export * from './analysis/conditions.js';
export * from './analysis/categories.js';
export * from './analysis/scoring.js';
export * from './analysis/rule-loader.js';
export * from './analysis/rule-evaluator.js';
export * from './analysis/report-formatter.js';
export * from './analysis/exchange.js';
export * from './analysis/analysis-mode.js';
export * from './history/index.js';
export { loadConfig, getConfigValue, findConfigPath, type LoadConfigOptions } from './config/index.js';
export { DEFAULT_CONFIG, HISTORY_DOMAIN, ENV_VARS } from './config/defaults.js';
export { ConfigSchema, type Config } from './config/schema.js';
