/**
 * Central type exports
 */

export * from './rules.js';
export * from './analysis.js';
export * from './history.js';
export * from './errors.js';
