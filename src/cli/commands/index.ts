/**
 * CLI commands index
 * Exports all command creators
 */

export { createAnalyzeCommand, runAnalyzeCommand } from './analyze.js';
export { createScanCommand, runScanCommand } from './scan.js';
export { createEvaluateCommand, runEvaluateCommand } from './evaluate.js';
export { createFormatCommand, runFormatCommand } from './format.js';
export { createRulesCommand, runRulesListCommand, runRulesValidateCommand } from './rules.js';
export { createHistoryCommand, runHistoryCommand } from './history.js';
export { createConfigCommand, runConfigShowCommand } from './config.js';
