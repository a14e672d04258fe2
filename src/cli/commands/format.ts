/**
 * CLI command: pulse format
 *
 * Renders a saved report document in another format.
 */

import { Command } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ReportFormat } from '../../types/analysis.js';
import { reportFromJson } from '../../analysis/exchange.js';
import { DEFAULT_TOP_ACTIONS } from '../../analysis/report-formatter.js';
import { printError, printInfo } from '../output.js';
import { describeFailure, parseFormatOption, parseIntegerOption, renderReport, writeOutput } from './common.js';

export interface FormatCommandOptions {
  format?: ReportFormat;
  output?: string;
  top?: number;
}

/**
 * Render a report document.
 *
 * @returns The process exit code.
 */
export async function runFormatCommand(reportPath: string, options: FormatCommandOptions = {}): Promise<number> {
  try {
    const report = reportFromJson(await fs.readFile(path.resolve(reportPath), 'utf-8'));
    const format = options.format ?? 'text';
    const rendered = renderReport(report, format, {
      top: options.top ?? DEFAULT_TOP_ACTIONS,
      color: format === 'text' && !options.output && process.stdout.isTTY === true,
    });
    const written = await writeOutput(rendered, options.output);
    if (written) printInfo(`Report written to ${written}`);
    return 0;
  } catch (error) {
    printError(describeFailure(error));
    return 1;
  }
}

/**
 * Create the `pulse format` CLI command.
 *
 * @returns Commander command instance.
 */
export function createFormatCommand(): Command {
  return new Command('format')
    .description('Render a saved report as text, markdown or JSON')
    .argument('<report>', 'Report document written by `pulse analyze --format json`')
    .option('-f, --format <format>', 'Output format: text, json, markdown', parseFormatOption)
    .option('-o, --output <file>', 'Write to a file instead of stdout')
    .option('--top <n>', 'Number of priority actions to list', parseIntegerOption)
    .action(async (report: string, opts: FormatCommandOptions) => {
      process.exitCode = await runFormatCommand(report, opts);
    });
}
