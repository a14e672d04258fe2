/**
 * CLI command: pulse evaluate
 *
 * Evaluates rules against a snapshot document produced by `pulse scan`.
 * Target files of quality rules are read from the snapshot's root.
 */

import { Command } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ReportFormat } from '../../types/analysis.js';
import { snapshotFromJson } from '../../analysis/exchange.js';
import { evaluate } from '../../analysis/rule-evaluator.js';
import { loadDefaultRuleSet, loadRuleSetFile } from '../../analysis/rule-loader.js';
import { loadConfig, type LoadConfigOptions } from '../../config/index.js';
import { printError, printHealthScore, printInfo, printLoadWarnings } from '../output.js';
import {
  createRunLogger,
  describeFailure,
  exitCodeForScore,
  parseFormatOption,
  parseIntegerOption,
  renderReport,
  writeOutput,
} from './common.js';

export interface EvaluateCommandOptions {
  rules?: string;
  format?: ReportFormat;
  output?: string;
  failBelow?: number;
  top?: number;
  concurrency?: number;
  verbose?: boolean;
}

/**
 * Evaluate a saved snapshot and render the report.
 *
 * @returns The process exit code: 0 pass, 2 below threshold, 1 fatal.
 */
export async function runEvaluateCommand(
  snapshotPath: string,
  options: EvaluateCommandOptions = {},
  configOptions: LoadConfigOptions = {}
): Promise<number> {
  const config = await loadConfig(process.cwd(), configOptions);
  const logger = createRunLogger(config, { verbose: options.verbose });
  const format = options.format ?? config.report.format;

  try {
    const snapshot = snapshotFromJson(await fs.readFile(path.resolve(snapshotPath), 'utf-8'));
    const rulesPath = options.rules ?? config.rules.source;
    const ruleSet = rulesPath
      ? await loadRuleSetFile(rulesPath, { logger })
      : await loadDefaultRuleSet({ logger });
    printLoadWarnings(ruleSet.warnings);

    const report = await evaluate(snapshot, ruleSet.rules, {
      concurrency: options.concurrency ?? config.evaluation.concurrency,
      rulesetVersion: ruleSet.version,
      logger,
    });

    const rendered = renderReport(report, format, {
      top: options.top ?? config.report.top_actions,
      color: format === 'text' && !options.output && process.stdout.isTTY === true,
    });
    const written = await writeOutput(rendered, options.output);
    if (written) {
      printInfo(`Report written to ${written}`);
      printHealthScore(report.healthScore, report.healthRating);
    }

    return exitCodeForScore(report.healthScore, options.failBelow ?? config.thresholds.fail_below);
  } catch (error) {
    printError(describeFailure(error));
    return 1;
  }
}

/**
 * Create the `pulse evaluate` CLI command.
 *
 * @returns Commander command instance.
 */
export function createEvaluateCommand(): Command {
  return new Command('evaluate')
    .description('Evaluate rules against a saved snapshot')
    .argument('<snapshot>', 'Snapshot document written by `pulse scan`')
    .option('-r, --rules <path>', 'Rule document (YAML or JSON); defaults to the bundled rules')
    .option('-f, --format <format>', 'Output format: text, json, markdown', parseFormatOption)
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('--fail-below <score>', 'Exit with status 2 when the score is below this', parseIntegerOption)
    .option('--top <n>', 'Number of priority actions to list', parseIntegerOption)
    .option('-c, --concurrency <n>', 'Rules evaluated at once', parseIntegerOption)
    .option('-v, --verbose', 'Print debug log entries')
    .action(async (snapshot: string, opts: EvaluateCommandOptions) => {
      process.exitCode = await runEvaluateCommand(snapshot, opts);
    });
}
