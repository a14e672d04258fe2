/**
 * CLI output utilities
 * Handles formatted output, spinners, and progress display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { HealthRating } from '../types/analysis.js';
import type { TrendSummary } from '../types/history.js';
import type { LoadWarning } from '../types/rules.js';
import { HEALTH_LABELS } from '../analysis/report-formatter.js';
import { describeTrend } from '../history/trend.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message. Spinners draw on stderr, so they never
 * mix with a report written to stdout.
 *
 * @param message - Initial message
 * @returns Spinner instance
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

/**
 * Update spinner message
 *
 * @param message - New message
 */
export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

/**
 * Stop spinner with success
 *
 * @param message - Success message
 */
export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

/**
 * Stop spinner with failure
 *
 * @param message - Failure message
 */
export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

/**
 * Print a header
 *
 * @param title - Header title
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 *
 * @param title - Section title
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

/**
 * Print a success message
 *
 * @param message - Success message
 */
export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

/**
 * Print a warning message to stderr
 *
 * @param message - Warning message
 */
export function printWarning(message: string): void {
  console.error(theme.warning(`[WARN] ${message}`));
}

/**
 * Print an error message to stderr
 *
 * @param message - Error message
 */
export function printError(message: string): void {
  console.error(theme.error(`[ERROR] ${message}`));
}

/**
 * Print an info message
 *
 * @param message - Info message
 */
export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

/**
 * Print a key-value pair
 *
 * @param key - Key
 * @param value - Value
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Color the status tags of a plain-text report
 *
 * @param text - Output of formatReport
 */
export function colorizeReport(text: string): string {
  return text
    .replace(/\[OK\]/g, theme.success('[OK]'))
    .replace(/\[WARN\]/g, theme.warning('[WARN]'))
    .replace(/\[ERROR\]/g, theme.error('[ERROR]'))
    .replace(/\[INFO\]/g, theme.info('[INFO]'));
}

/**
 * Color for a health rating
 */
function ratingColor(rating: HealthRating): (text: string) => string {
  switch (rating) {
    case 'excellent':
    case 'good':
      return theme.success;
    case 'fair':
      return theme.warning;
    case 'needs-improvement':
      return theme.error;
  }
}

/**
 * Print the health score line
 *
 * @param score - Health score 0-100
 * @param rating - Rating band
 */
export function printHealthScore(score: number, rating: HealthRating): void {
  console.log(`  Health: ${ratingColor(rating)(`${score}/100 (${HEALTH_LABELS[rating]})`)}`);
}

/**
 * Print rejected rule entries to stderr
 *
 * @param warnings - Load warnings from the rule loader
 */
export function printLoadWarnings(warnings: readonly LoadWarning[]): void {
  for (const warning of warnings) {
    const id = warning.ruleId ? ` (${warning.ruleId})` : '';
    printWarning(`Rule #${warning.index}${id} rejected [${warning.code}]: ${warning.message}`);
  }
}

/**
 * Print a run-to-run comparison
 *
 * @param trend - Trend summary
 */
export function printTrend(trend: TrendSummary): void {
  const color = trend.delta === null || trend.delta === 0
    ? theme.secondary
    : trend.delta > 0 ? theme.success : theme.warning;
  console.log(`  Trend: ${color(describeTrend(trend))}`);
}

/**
 * Print a table
 *
 * @param headers - Table headers
 * @param rows - Table rows
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(0, ...rows.map((r) => (r[i] || '').length));
    return Math.max(h.length, maxRow);
  });

  // Print header
  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  // Print rows
  for (const row of rows) {
    const rowLine = row.map((cell, i) => (cell || '').padEnd(widths[i])).join('  ');
    console.log(rowLine);
  }
}
