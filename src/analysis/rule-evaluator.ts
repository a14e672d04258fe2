/**
 * Rule evaluator.
 *
 * Evaluates rules against an immutable snapshot and aggregates the results
 * into an AnalysisReport. Each rule reads only the snapshot, its own
 * definition and (for quality rules) one file, so rules run on a bounded
 * pool and the final sort alone defines the output order.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type {
  AnalysisReport,
  Detection,
  Evidence,
  ProjectSnapshot,
  ResolvedRecommendation,
} from '../types/analysis.js';
import type { AbsenceRule, QualityRule, Rule } from '../types/rules.js';
import type { AnalysisLogger } from './analysis-logger.js';
import { mapWithConcurrency } from './concurrency.js';
import { evaluatePredicate } from './conditions.js';
import {
  calculateHealthScore,
  calculatePriority,
  compareDetections,
  compareIds,
  raiseLevel,
  rateHealth,
  summarize,
} from './scoring.js';

export const DEFAULT_EVALUATION_CONCURRENCY = 4;

/** Marginal band above min_lines, as a factor of min_lines */
const MARGINAL_FACTOR = 1.2;

/**
 * Reads target file contents for quality rules. Swappable so tests and
 * decoupled pipelines can evaluate without touching disk.
 */
export interface ContentReader {
  readText(root: string, relativePath: string): Promise<string>;
}

export const fsContentReader: ContentReader = {
  readText: (root, relativePath) => fs.readFile(path.join(root, ...relativePath.split('/')), 'utf-8'),
};

export interface EvaluateOptions {
  concurrency?: number;
  reader?: ContentReader;
  rulesetVersion?: string | null;
  /** Timestamp written to the report; defaults to the current time */
  now?: Date;
  logger?: AnalysisLogger;
}

// ---------------------------------------------------------------------------
// Per-rule evaluation
// ---------------------------------------------------------------------------

/**
 * Count lines the way editors do: every newline ends a line, and trailing
 * text without a final newline is one more. Empty text has 0 lines.
 */
export function countLines(text: string): number {
  if (text.length === 0) return 0;
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return text.endsWith('\n') ? count : count + 1;
}

function resolveRecommendation(rule: Rule, snapshot: ProjectSnapshot): ResolvedRecommendation | null {
  const rec = rule.recommendation;
  if (!rec) return null;
  const variant = rec.variants.find((v) => evaluatePredicate(v.when, snapshot));
  if (!variant) {
    return { template: rec.template, reason: rec.reason, variantMatched: false };
  }
  return { template: variant.template, reason: variant.reason ?? rec.reason, variantMatched: true };
}

interface CheckOutcome {
  issueFound: boolean;
  evidence: Evidence;
}

function checkAbsence(rule: AbsenceRule | QualityRule, present: ReadonlySet<string>): CheckOutcome {
  const matched = rule.targets.find((t) => present.has(t)) ?? null;
  return {
    issueFound: matched === null,
    evidence: { type: 'absence', candidates: [...rule.targets], matched },
  };
}

async function checkQuality(
  rule: QualityRule,
  snapshot: ProjectSnapshot,
  reader: ContentReader
): Promise<CheckOutcome> {
  const target = rule.targets.find((t) => snapshot.files.has(t));
  if (target === undefined) {
    return checkAbsence(rule, snapshot.files);
  }

  let text: string;
  try {
    text = await reader.readText(snapshot.root, target);
  } catch (error) {
    return {
      issueFound: true,
      evidence: {
        type: 'unreadable',
        path: target,
        reason: error instanceof Error ? error.message : String(error),
      },
    };
  }

  const lineCount = countLines(text);
  const haystack = text.toLowerCase();
  const matchedSections: string[] = [];
  const missingSections: string[] = [];
  for (const section of rule.criteria.requiredSections) {
    (haystack.includes(section.toLowerCase()) ? matchedSections : missingSections).push(section);
  }

  const { minLines } = rule.criteria;
  const tooShort = minLines !== null && lineCount < minLines;
  const marginal =
    minLines !== null && lineCount >= minLines && lineCount < Math.ceil(minLines * MARGINAL_FACTOR);
  const effectiveConfidence =
    marginal && missingSections.length === 0 ? raiseLevel(rule.confidence) : rule.confidence;

  return {
    issueFound: tooShort || missingSections.length > 0,
    evidence: {
      type: 'quality',
      path: target,
      lineCount,
      minLines,
      matchedSections,
      missingSections,
      marginal,
      effectiveConfidence,
    },
  };
}

async function runCheck(rule: Rule, snapshot: ProjectSnapshot, reader: ContentReader): Promise<CheckOutcome> {
  switch (rule.kind) {
    case 'FileAbsence':
      return checkAbsence(rule, snapshot.files);
    case 'DirectoryAbsence':
      return checkAbsence(rule, snapshot.directories);
    case 'FileQuality':
      return checkQuality(rule, snapshot, reader);
  }
}

/**
 * Evaluate one rule.
 *
 * @returns The detection, or null when `applies_when` excludes the rule.
 */
export async function evaluateRule(
  rule: Rule,
  snapshot: ProjectSnapshot,
  reader: ContentReader = fsContentReader
): Promise<Detection | null> {
  if (rule.appliesWhen && !evaluatePredicate(rule.appliesWhen, snapshot)) {
    return null;
  }

  const outcome = await runCheck(rule, snapshot, reader);

  return {
    ruleId: rule.id,
    kind: rule.kind,
    title: rule.title,
    category: rule.category,
    issueFound: outcome.issueFound,
    confidence: rule.confidence,
    severity: rule.severity,
    evidence: outcome.evidence,
    recommendation: resolveRecommendation(rule, snapshot),
    priorityScore: outcome.issueFound ? calculatePriority(rule.confidence, rule.severity) : 0,
  };
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/**
 * Evaluate a rule list against a snapshot and build the report.
 *
 * Output is independent of `concurrency`: positives are sorted by priority
 * then rule id, evaluations by rule id.
 */
export async function evaluate(
  snapshot: ProjectSnapshot,
  rules: readonly Rule[],
  options: EvaluateOptions = {}
): Promise<AnalysisReport> {
  const { logger } = options;
  const reader = options.reader ?? fsContentReader;
  await logger?.stageStart('evaluate', `Evaluating ${rules.length} rule(s)`);

  const results = await mapWithConcurrency(
    rules,
    options.concurrency ?? DEFAULT_EVALUATION_CONCURRENCY,
    (rule) => evaluateRule(rule, snapshot, reader)
  );

  const evaluations = results
    .filter((d): d is Detection => d !== null)
    .sort((a, b) => compareIds(a.ruleId, b.ruleId));
  const detections = evaluations.filter((d) => d.issueFound).sort(compareDetections);

  if (logger) {
    for (const [index, rule] of rules.entries()) {
      const result = results[index];
      await logger.debug(
        'evaluate',
        'rule_evaluated',
        result === null
          ? `${rule.id}: excluded by applies_when`
          : `${rule.id}: ${result.issueFound ? 'issue found' : 'ok'}`,
        result === null ? undefined : { priority: result.priorityScore }
      );
    }
    for (const d of evaluations) {
      if (d.evidence.type === 'unreadable') {
        await logger.warn('evaluate', 'target_unreadable', `${d.ruleId}: cannot read ${d.evidence.path}`, {
          reason: d.evidence.reason,
        });
      }
    }
  }

  const summary = summarize(evaluations.length, detections);
  const healthScore = calculateHealthScore(summary);

  await logger?.stageComplete('evaluate', `${summary.issuesFound} issue(s) in ${summary.totalPatterns} applicable rule(s)`, {
    excluded: rules.length - evaluations.length,
    healthScore,
  });

  return {
    projectName: snapshot.projectName,
    root: snapshot.root,
    rulesetVersion: options.rulesetVersion ?? null,
    generatedAt: (options.now ?? new Date()).toISOString(),
    projectTypes: [...snapshot.projectTypes],
    frameworks: [...snapshot.frameworks],
    flags: { ...snapshot.flags },
    detections,
    evaluations,
    summary,
    healthScore,
    healthRating: rateHealth(healthScore),
  };
}
