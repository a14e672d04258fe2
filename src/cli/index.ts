/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  createAnalyzeCommand,
  createScanCommand,
  createEvaluateCommand,
  createFormatCommand,
  createRulesCommand,
  createHistoryCommand,
  createConfigCommand,
} from './commands/index.js';
import { printError } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: unknown = require('../../package.json');
export const VERSION: string =
  typeof packageJson === 'object' && packageJson !== null && typeof Reflect.get(packageJson, 'version') === 'string'
    ? String(Reflect.get(packageJson, 'version'))
    : '0.0.0';

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('pulse')
    .description('Rule-driven project health analysis')
    .version(VERSION)
    .option('--no-color', 'Disable colored output');

  // Add commands
  program.addCommand(createAnalyzeCommand(), { isDefault: true });
  program.addCommand(createScanCommand());
  program.addCommand(createEvaluateCommand());
  program.addCommand(createFormatCommand());
  program.addCommand(createRulesCommand());
  program.addCommand(createHistoryCommand());
  program.addCommand(createConfigCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
  }
}
