/**
 * Priority and health scoring.
 *
 * Pure functions: no I/O, no state. The health score is computed in floating
 * point, clamped to [0, 100] and then floored.
 */

import type { AnalysisSummary, Detection, HealthRating } from '../types/analysis.js';
import type { Confidence, Level, Severity } from '../types/rules.js';

export const CONFIDENCE_WEIGHTS: Record<Confidence, number> = {
  high: 1.0,
  medium: 0.7,
  low: 0.4,
};

export const SEVERITY_MULTIPLIERS: Record<Severity, number> = {
  high: 1.0,
  medium: 0.6,
  low: 0.3,
};

export const BASE_PRIORITIES: Record<Severity, number> = {
  high: 10,
  medium: 5,
  low: 2,
};

const HIGH_SEVERITY_PENALTY = 20;
const MEDIUM_SEVERITY_PENALTY = 10;

/**
 * Priority of a positive detection:
 * confidenceWeight x severityMultiplier x basePriority.
 */
export function calculatePriority(confidence: Confidence, severity: Severity): number {
  return CONFIDENCE_WEIGHTS[confidence] * SEVERITY_MULTIPLIERS[severity] * BASE_PRIORITIES[severity];
}

/**
 * Sort comparator: priority descending, then ruleId ascending.
 * Uses code-unit order for ids so the result does not depend on locale.
 */
export function compareDetections(a: Detection, b: Detection): number {
  if (a.priorityScore !== b.priorityScore) {
    return b.priorityScore - a.priorityScore;
  }
  return compareIds(a.ruleId, b.ruleId);
}

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Count positives by severity.
 *
 * @param totalPatterns - Rules evaluated after applies_when filtering.
 * @param positives - Detections with issueFound = true.
 */
export function summarize(totalPatterns: number, positives: readonly Detection[]): AnalysisSummary {
  return {
    totalPatterns,
    issuesFound: positives.length,
    highSeverityCount: positives.filter((d) => d.severity === 'high').length,
    mediumSeverityCount: positives.filter((d) => d.severity === 'medium').length,
    lowSeverityCount: positives.filter((d) => d.severity === 'low').length,
  };
}

/**
 * Health score in [0, 100].
 *
 *   issuesPenalty = issuesFound / totalPatterns * 100   (0 when totalPatterns is 0)
 *   score = floor(clamp(100 - issuesPenalty - 20 * high - 10 * medium, 0, 100))
 *
 * Evaluated over the common denominator with one division, so whole scores
 * stay whole before flooring. No applicable rules means a perfect score.
 */
export function calculateHealthScore(summary: AnalysisSummary): number {
  const total = summary.totalPatterns;
  const severityPenalty =
    summary.highSeverityCount * HIGH_SEVERITY_PENALTY + summary.mediumSeverityCount * MEDIUM_SEVERITY_PENALTY;

  const raw =
    total === 0
      ? 100 - severityPenalty
      : (100 * (total - summary.issuesFound) - severityPenalty * total) / total;
  return Math.floor(Math.min(100, Math.max(0, raw)));
}

/**
 * Rating band for a health score.
 */
export function rateHealth(score: number): HealthRating {
  if (score >= 90) return 'excellent';
  if (score >= 75) return 'good';
  if (score >= 50) return 'fair';
  return 'needs-improvement';
}

const LEVEL_ORDER: readonly Level[] = ['low', 'medium', 'high'];

/**
 * One level up, capped at high.
 */
export function raiseLevel(level: Level): Level {
  const idx = LEVEL_ORDER.indexOf(level);
  return LEVEL_ORDER[Math.min(idx + 1, LEVEL_ORDER.length - 1)];
}
