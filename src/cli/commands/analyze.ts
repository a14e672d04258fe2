/**
 * CLI command: pulse analyze
 *
 * Scans a project, evaluates the rule set and prints the health report.
 * The exit status reflects the score so the command can gate CI.
 */

import { Command } from 'commander';
import path from 'node:path';
import type { ReportFormat } from '../../types/analysis.js';
import { runAnalysis, type AnalysisModeResult } from '../../analysis/analysis-mode.js';
import { loadConfig, type LoadConfigOptions } from '../../config/index.js';
import { FileHistorySink } from '../../history/file-sink.js';
import {
  failSpinner,
  printHealthScore,
  printLoadWarnings,
  printError,
  printInfo,
  printTrend,
  printWarning,
  startSpinner,
  succeedSpinner,
  updateSpinner,
} from '../output.js';
import {
  createRunLogger,
  describeFailure,
  exitCodeForScore,
  parseFormatOption,
  parseIntegerOption,
  renderReport,
  resolveSessionId,
  writeOutput,
} from './common.js';

export interface AnalyzeCommandOptions {
  rules?: string;
  format?: ReportFormat;
  output?: string;
  failBelow?: number;
  top?: number;
  concurrency?: number;
  timeout?: number;
  sessionId?: string;
  projectId?: string;
  history?: boolean;
  logFile?: string;
  verbose?: boolean;
}

// ---------------------------------------------------------------------------
// Run analysis (exported for testability)
// ---------------------------------------------------------------------------

/**
 * Run the analysis and print or write the report.
 *
 * @param projectDir - Project directory.
 * @param options - CLI options; unset ones fall back to configuration.
 * @param configOptions - Overrides for configuration loading.
 * @returns The process exit code: 0 pass, 2 below threshold, 1 fatal.
 */
export async function runAnalyzeCommand(
  projectDir: string,
  options: AnalyzeCommandOptions = {},
  configOptions: LoadConfigOptions = {}
): Promise<number> {
  const root = path.resolve(projectDir);
  const config = await loadConfig(root, configOptions);
  const env = configOptions.env ?? process.env;

  const format = options.format ?? config.report.format;
  const top = options.top ?? config.report.top_actions;
  const failBelow = options.failBelow ?? config.thresholds.fail_below;
  const historyEnabled = options.history ?? config.history.enabled;
  const interactive = format === 'text' && !options.output && process.stderr.isTTY === true;

  const logger = createRunLogger(config, { verbose: options.verbose, logFile: options.logFile });

  if (interactive) startSpinner('Analyzing project...');

  let result: AnalysisModeResult;
  try {
    result = await runAnalysis({
      projectDir: root,
      // A configured source is relative to the project, a flag to the cwd
      rulesPath: options.rules ?? (config.rules.source ? path.resolve(root, config.rules.source) : null),
      scan: {
        concurrency: config.scan.concurrency,
        timeoutMs: options.timeout ?? config.scan.timeout_ms,
        extraIgnores: config.scan.extra_ignores,
      },
      evaluationConcurrency: options.concurrency ?? config.evaluation.concurrency,
      history: historyEnabled
        ? {
            sink: new FileHistorySink(path.resolve(root, config.history.dir)),
            sessionId: resolveSessionId(options.sessionId, env),
            projectIdentifier: options.projectId,
            limit: config.history.limit,
          }
        : null,
      logger,
      onProgress: interactive ? (_stage, message) => updateSpinner(message) : undefined,
    });
  } catch (error) {
    failSpinner('Analysis failed');
    printError(describeFailure(error));
    return 1;
  }

  if (!result.success) {
    failSpinner('Analysis failed');
    printError(`${result.error.name}: ${describeFailure(result.error)}`);
    return 1;
  }

  if (interactive) succeedSpinner(`Analyzed ${result.report.projectName}`);

  printLoadWarnings(result.warnings);

  const rendered = renderReport(result.report, format, { top, color: interactive });
  const written = await writeOutput(rendered, options.output);
  if (written) {
    printInfo(`Report written to ${written}`);
    printHealthScore(result.report.healthScore, result.report.healthRating);
  }

  if (result.trend && format === 'text') {
    printTrend(result.trend);
  }
  if (result.historyError) {
    printWarning(`History not recorded: ${describeFailure(result.historyError)}`);
  }

  if (config.rules.fail_on_warnings && result.warnings.length > 0) {
    printError(`${result.warnings.length} rule(s) rejected and rules.fail_on_warnings is set`);
    return 1;
  }

  return exitCodeForScore(result.report.healthScore, failBelow);
}

// ---------------------------------------------------------------------------
// Commander command factory
// ---------------------------------------------------------------------------

/**
 * Create the `pulse analyze` CLI command.
 *
 * @returns Commander command instance.
 */
export function createAnalyzeCommand(): Command {
  const cmd = new Command('analyze')
    .description('Analyze a project and print its health report')
    .argument('[directory]', 'Project directory', '.')
    .option('-r, --rules <path>', 'Rule document (YAML or JSON); defaults to the bundled rules')
    .option('-f, --format <format>', 'Output format: text, json, markdown', parseFormatOption)
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('--fail-below <score>', 'Exit with status 2 when the score is below this', parseIntegerOption)
    .option('--top <n>', 'Number of priority actions to list', parseIntegerOption)
    .option('-c, --concurrency <n>', 'Rules evaluated at once', parseIntegerOption)
    .option('--timeout <ms>', 'Abort the scan after this many milliseconds', parseIntegerOption)
    .option('--session-id <id>', 'Session id for history records (default: $PULSE_SESSION_ID)')
    .option('--project-id <id>', 'Project identifier for history records (default: absolute path)')
    .option('--history', 'Record this run in the history')
    .option('--no-history', 'Do not record this run')
    .option('--log-file <path>', 'Write a markdown log of the run')
    .option('-v, --verbose', 'Print debug log entries')
    .action(async (directory: string, opts: AnalyzeCommandOptions) => {
      process.exitCode = await runAnalyzeCommand(directory, opts);
    });

  return cmd;
}
