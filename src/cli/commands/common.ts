/**
 * Helpers shared by the analysis commands
 */

import { InvalidArgumentError } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { AnalysisReport, ReportFormat } from '../../types/analysis.js';
import { ReportFormatSchema } from '../../types/analysis.js';
import { AnalysisLogger, getLevelTag, type LogEntry } from '../../analysis/analysis-logger.js';
import { reportToJson } from '../../analysis/exchange.js';
import { formatReport, renderReportMarkdown } from '../../analysis/report-formatter.js';
import { ENV_VARS } from '../../config/defaults.js';
import type { Config } from '../../config/schema.js';
import { colorizeReport, theme } from '../output.js';

/**
 * Commander parser for non-negative integer options
 */
export function parseIntegerOption(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parseInt(value, 10);
}

/**
 * Commander parser for --format
 */
export function parseFormatOption(value: string): ReportFormat {
  const parsed = ReportFormatSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${ReportFormatSchema.options.join(', ')}.`);
  }
  return parsed.data;
}

/**
 * Session id from the flag, else from PULSE_SESSION_ID. Never read from
 * files or other ambient state.
 */
export function resolveSessionId(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = flag ?? env[ENV_VARS.SESSION_ID];
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Exit status for a finished analysis: 2 below the threshold, 0 otherwise
 */
export function exitCodeForScore(score: number, failBelow: number): number {
  return score < failBelow ? 2 : 0;
}

/**
 * Create the run logger. Verbose runs echo every entry to stderr.
 */
export function createRunLogger(config: Config, overrides: { verbose?: boolean; logFile?: string } = {}): AnalysisLogger {
  const verbose = overrides.verbose ?? config.output.verbose;
  return new AnalysisLogger({
    logFile: overrides.logFile ?? config.output.log_file,
    verbose,
    echo: verbose
      ? (entry: LogEntry) => console.error(theme.dim(`${getLevelTag(entry.level)} [${entry.stage}] ${entry.message}`))
      : undefined,
  });
}

/**
 * Render a report in the requested format. Colors are applied only to
 * text going to the terminal.
 */
export function renderReport(
  report: AnalysisReport,
  format: ReportFormat,
  options: { top: number; color: boolean }
): string {
  switch (format) {
    case 'json':
      return reportToJson(report);
    case 'markdown':
      return renderReportMarkdown(report, { top: options.top });
    case 'text': {
      const text = formatReport(report, { top: options.top });
      return options.color ? colorizeReport(text) : text;
    }
  }
}

/**
 * Write command output to a file, or to stdout when no path is given.
 *
 * @returns The absolute path written, or null for stdout.
 */
export async function writeOutput(content: string, outputPath?: string): Promise<string | null> {
  if (!outputPath) {
    console.log(content);
    return null;
  }
  const resolved = path.resolve(outputPath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
  return resolved;
}

/**
 * Message for any thrown value, including the error code when there is one
 */
export function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    const code: unknown = Reflect.get(error, 'code');
    return typeof code === 'string' ? `${error.message} [${code}]` : error.message;
  }
  return String(error);
}
