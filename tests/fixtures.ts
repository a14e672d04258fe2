/**
 * Shared builders for analysis and history tests
 */

import type { AnalysisReport, Detection, ProjectSnapshot } from '../src/types/analysis.js';
import type { HistoryRecord } from '../src/types/history.js';
import type { AbsenceRule, QualityCriteria, QualityRule } from '../src/types/rules.js';
import type { ContentReader } from '../src/analysis/rule-evaluator.js';
import { createSnapshot } from '../src/analysis/snapshot.js';

export const FIXED_NOW = new Date('2026-03-01T10:00:00.000Z');

export function absenceRule(id: string, overrides: Partial<AbsenceRule> = {}): AbsenceRule {
  return {
    id,
    kind: 'FileAbsence',
    title: id,
    category: 'setup',
    targets: [`${id}.txt`],
    confidence: 'high',
    severity: 'high',
    appliesWhen: null,
    recommendation: null,
    ...overrides,
  };
}

export function qualityRule(
  id: string,
  criteria: QualityCriteria,
  overrides: Partial<Omit<QualityRule, 'kind' | 'criteria'>> = {}
): QualityRule {
  return {
    id,
    kind: 'FileQuality',
    criteria,
    title: id,
    category: 'documentation',
    targets: ['README.md'],
    confidence: 'medium',
    severity: 'low',
    appliesWhen: null,
    recommendation: null,
    ...overrides,
  };
}

export function makeSnapshot(files: string[], directories: string[] = []): ProjectSnapshot {
  return createSnapshot({
    root: '/work/demo',
    files,
    directories,
    scannedAt: FIXED_NOW.toISOString(),
  });
}

/**
 * Reader over an in-memory map; unknown paths fail like a missing file.
 */
export function mapReader(contents: Record<string, string>): ContentReader & { reads: string[] } {
  const reads: string[] = [];
  return {
    reads,
    async readText(_root: string, relativePath: string): Promise<string> {
      reads.push(relativePath);
      const text = contents[relativePath];
      if (text === undefined) {
        throw new Error(`ENOENT: no such file ${relativePath}`);
      }
      return text;
    },
  };
}

export function makeDetection(ruleId: string, overrides: Partial<Detection> = {}): Detection {
  return {
    ruleId,
    kind: 'FileAbsence',
    title: ruleId,
    category: 'setup',
    issueFound: true,
    confidence: 'high',
    severity: 'high',
    evidence: { type: 'absence', candidates: [`${ruleId}.txt`], matched: null },
    recommendation: null,
    priorityScore: 10,
    ...overrides,
  };
}

export function makeReport(healthScore: number, detectionIds: string[]): AnalysisReport {
  const detections = detectionIds.map((id) => makeDetection(id));
  return {
    projectName: 'demo',
    root: '/work/demo',
    rulesetVersion: '1.0.0',
    generatedAt: FIXED_NOW.toISOString(),
    projectTypes: ['node'],
    frameworks: [],
    flags: { hasGit: true, hasCI: false, hasTests: false, hasDocker: false },
    detections,
    evaluations: detections,
    summary: {
      totalPatterns: detections.length,
      issuesFound: detections.length,
      highSeverityCount: detections.length,
      mediumSeverityCount: 0,
      lowSeverityCount: 0,
    },
    healthScore,
    healthRating: 'fair',
  };
}

export function makeRecord(
  timestamp: string,
  overrides: Partial<HistoryRecord> = {}
): HistoryRecord {
  return {
    timestamp,
    projectIdentifier: 'demo',
    healthScore: 80,
    summary: {
      totalPatterns: 5,
      issuesFound: 1,
      highSeverityCount: 0,
      mediumSeverityCount: 1,
      lowSeverityCount: 0,
    },
    detections: [{ ruleId: 'missing-license', severity: 'medium', confidence: 'high' }],
    projectTypes: ['node'],
    frameworks: [],
    rulesetVersion: '1.0.0',
    isolation: { sessionId: 'placeholder', domain: 'project-pulse' },
    ...overrides,
  };
}
