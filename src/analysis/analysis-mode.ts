/**
 * Analysis orchestrator.
 *
 * Coordinates one run:
 *   Stage 1: Scan the project into a snapshot
 *   Stage 2: Load the rule set
 *   Stage 3: Evaluate and score
 *   Stage 4: Record history and compare with earlier runs (optional)
 *
 * Fatal errors come back as a typed failure result. History problems never
 * fail the run; they are returned next to the report.
 */

import type { AnalysisReport, ProjectSnapshot } from '../types/analysis.js';
import { RuleSourceError, ScanError, isAnalysisError, type AnalysisError } from '../types/errors.js';
import type { HistoryRecord, TrendSummary } from '../types/history.js';
import type { LoadWarning, RuleLoadResult } from '../types/rules.js';
import { HISTORY_DOMAIN } from '../config/defaults.js';
import type { HistorySink } from '../history/history-sink.js';
import { createIsolation } from '../history/isolation.js';
import { buildHistoryRecord, compareWithHistory } from '../history/trend.js';
import type { AnalysisLogger, AnalysisStage } from './analysis-logger.js';
import { evaluate, type ContentReader } from './rule-evaluator.js';
import { loadDefaultRuleSet, loadRuleSetFile } from './rule-loader.js';
import { scanProject, type ScanOptions } from './structure-scanner.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface HistoryOptions {
  sink: HistorySink;
  /** Explicit session id; a run without one reports an isolation error */
  sessionId: string | undefined;
  /** Defaults to the tool's own domain */
  domain?: string;
  /** Defaults to the absolute project root */
  projectIdentifier?: string;
  /** Earlier records read for the trend */
  limit?: number;
}

export interface AnalysisModeOptions {
  projectDir: string;
  /** Rule document path; the bundled rule set when null or omitted */
  rulesPath?: string | null;
  /** Already-loaded rules; takes precedence over rulesPath */
  rules?: RuleLoadResult;
  scan?: Omit<ScanOptions, 'logger'>;
  evaluationConcurrency?: number;
  reader?: ContentReader;
  history?: HistoryOptions | null;
  logger?: AnalysisLogger;
  now?: Date;
  onProgress?: (stage: AnalysisStage, message: string) => void;
}

export interface AnalysisSuccess {
  success: true;
  snapshot: ProjectSnapshot;
  report: AnalysisReport;
  warnings: LoadWarning[];
  historyRecord: HistoryRecord | null;
  trend: TrendSummary | null;
  historyError: Error | null;
}

export interface AnalysisFailure {
  success: false;
  error: AnalysisError;
}

export type AnalysisModeResult = AnalysisSuccess | AnalysisFailure;

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Run a full analysis of one project.
 *
 * @param options - Project root, rule source and stage settings.
 * @returns The report, or the fatal error that prevented one.
 */
export async function runAnalysis(options: AnalysisModeOptions): Promise<AnalysisModeResult> {
  const { logger, onProgress } = options;

  let snapshot: ProjectSnapshot;
  let ruleSet: RuleLoadResult;
  let report: AnalysisReport;

  try {
    // -----------------------------------------------------------------------
    // Stage 1: Scan
    // -----------------------------------------------------------------------
    onProgress?.('scan', 'Scanning project structure...');
    snapshot = await scanProject(options.projectDir, { ...options.scan, logger });
    onProgress?.(
      'scan',
      `Scanned ${snapshot.files.size} file(s) in ${snapshot.directories.size} director(ies)`
    );

    // -----------------------------------------------------------------------
    // Stage 2: Rules
    // -----------------------------------------------------------------------
    onProgress?.('rules', 'Loading rules...');
    ruleSet =
      options.rules ??
      (options.rulesPath
        ? await loadRuleSetFile(options.rulesPath, { logger })
        : await loadDefaultRuleSet({ logger }));
    onProgress?.('rules', `Loaded ${ruleSet.rules.length} rule(s), ${ruleSet.warnings.length} rejected`);

    // -----------------------------------------------------------------------
    // Stage 3: Evaluate
    // -----------------------------------------------------------------------
    onProgress?.('evaluate', 'Evaluating rules...');
    report = await evaluate(snapshot, ruleSet.rules, {
      concurrency: options.evaluationConcurrency,
      reader: options.reader,
      rulesetVersion: ruleSet.version,
      now: options.now,
      logger,
    });
    onProgress?.('evaluate', `Health score ${report.healthScore}/100`);
  } catch (error) {
    if (!isAnalysisError(error)) throw error;
    await logger?.error(stageOf(error), 'analysis_failed', error.message, { code: error.code });
    return { success: false, error };
  }

  // -------------------------------------------------------------------------
  // Stage 4: History
  // -------------------------------------------------------------------------
  let historyRecord: HistoryRecord | null = null;
  let trend: TrendSummary | null = null;
  let historyError: Error | null = null;

  if (options.history) {
    onProgress?.('history', 'Recording history...');
    try {
      const result = await recordHistory(report, snapshot, options.history, options.now);
      historyRecord = result.record;
      trend = result.trend;
      await logger?.success('history', 'history_recorded', `Recorded run under ${result.scope}`, {
        runsCompared: trend.runsCompared,
      });
    } catch (error) {
      historyError = error instanceof Error ? error : new Error(String(error));
      await logger?.warn('history', 'history_failed', historyError.message);
    }
  }

  return {
    success: true,
    snapshot,
    report,
    warnings: ruleSet.warnings,
    historyRecord,
    trend,
    historyError,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Read earlier records for the trend, then append this run's record.
 * Isolation is validated before either call.
 */
async function recordHistory(
  report: AnalysisReport,
  snapshot: ProjectSnapshot,
  history: HistoryOptions,
  now: Date | undefined
): Promise<{ record: HistoryRecord; trend: TrendSummary; scope: string }> {
  const isolation = createIsolation(history.sessionId ?? '', history.domain ?? HISTORY_DOMAIN);
  const projectIdentifier = history.projectIdentifier ?? snapshot.root;

  const previous = await history.sink.history({
    projectIdentifier,
    isolation,
    limit: history.limit,
  });
  const trend = compareWithHistory(report, previous);

  const record = buildHistoryRecord(report, projectIdentifier, isolation, now);
  await history.sink.put({ record, isolation });

  return { record, trend, scope: isolation.toString() };
}

function stageOf(error: AnalysisError): AnalysisStage {
  if (error instanceof ScanError) return 'scan';
  if (error instanceof RuleSourceError) return 'rules';
  return 'evaluate';
}
