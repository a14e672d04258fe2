/**
 * History records and run-to-run comparison.
 */

import type { AnalysisReport } from '../types/analysis.js';
import type { HistoryRecord, TrendSummary } from '../types/history.js';
import { compareIds } from '../analysis/scoring.js';
import type { HistoryIsolation } from './isolation.js';

/**
 * Build the immutable record handed to a history sink after a run.
 *
 * @param report - The finished report.
 * @param projectIdentifier - Stable name of the analyzed project.
 * @param isolation - Scope the record is written under.
 * @param now - Record timestamp.
 */
export function buildHistoryRecord(
  report: AnalysisReport,
  projectIdentifier: string,
  isolation: HistoryIsolation,
  now: Date = new Date()
): HistoryRecord {
  return {
    timestamp: now.toISOString(),
    projectIdentifier,
    healthScore: report.healthScore,
    summary: { ...report.summary },
    detections: report.detections.map((d) => ({
      ruleId: d.ruleId,
      severity: d.severity,
      confidence: d.confidence,
    })),
    projectTypes: [...report.projectTypes],
    frameworks: [...report.frameworks],
    rulesetVersion: report.rulesetVersion,
    isolation: isolation.toMetadata(),
  };
}

/**
 * Compare a report with earlier records of the same project.
 *
 * @param report - The current report.
 * @param previous - Earlier records, newest first, as returned by a sink.
 * @returns Score delta and the rule ids that appeared or cleared since the
 * most recent record. Without a previous record both lists are empty.
 */
export function compareWithHistory(report: AnalysisReport, previous: readonly HistoryRecord[]): TrendSummary {
  const last = previous[0];
  if (!last) {
    return {
      previousScore: null,
      currentScore: report.healthScore,
      delta: null,
      newIssues: [],
      resolvedIssues: [],
      runsCompared: 0,
    };
  }

  const before = new Set(last.detections.map((d) => d.ruleId));
  const now = new Set(report.detections.map((d) => d.ruleId));

  return {
    previousScore: last.healthScore,
    currentScore: report.healthScore,
    delta: report.healthScore - last.healthScore,
    newIssues: [...now].filter((id) => !before.has(id)).sort(compareIds),
    resolvedIssues: [...before].filter((id) => !now.has(id)).sort(compareIds),
    runsCompared: previous.length,
  };
}

/**
 * One-line description of a trend for the terminal.
 */
export function describeTrend(trend: TrendSummary): string {
  if (trend.previousScore === null || trend.delta === null) {
    return `First recorded run: ${trend.currentScore}/100`;
  }
  const sign = trend.delta > 0 ? '+' : '';
  const parts = [`${trend.currentScore}/100 (${sign}${trend.delta} since previous run)`];
  if (trend.newIssues.length > 0) parts.push(`new: ${trend.newIssues.join(', ')}`);
  if (trend.resolvedIssues.length > 0) parts.push(`resolved: ${trend.resolvedIssues.join(', ')}`);
  return parts.join('; ');
}
