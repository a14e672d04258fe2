/**
 * Report rendering.
 *
 * Plain text for the terminal and markdown for files. Both are pure
 * functions of the report: the order of `detections` is used as given.
 */

import type { AnalysisReport, Detection, Evidence, HealthRating } from '../types/analysis.js';
import type { Category, Severity } from '../types/rules.js';
import { CATEGORY_LABELS, CATEGORY_ORDER } from './categories.js';

export const DEFAULT_TOP_ACTIONS = 5;

export const HEALTH_LABELS: Record<HealthRating, string> = {
  excellent: 'Excellent',
  good: 'Good',
  fair: 'Fair',
  'needs-improvement': 'Needs Improvement',
};

const SEVERITY_TAGS: Record<Severity, string> = {
  high: '[ERROR]',
  medium: '[WARN]',
  low: '[INFO]',
};

export interface FormatOptions {
  /** Number of priority actions to list */
  top?: number;
}

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function listOr(values: readonly string[], fallback: string): string {
  return values.length > 0 ? values.map(titleCase).join(', ') : fallback;
}

/**
 * Group evaluated rules by category, in taxonomy order, skipping
 * categories with no evaluated rule.
 */
function groupByCategory(report: AnalysisReport): Array<{
  category: Category;
  evaluated: number;
  issues: Detection[];
}> {
  return CATEGORY_ORDER.map((category) => ({
    category,
    evaluated: report.evaluations.filter((d) => d.category === category).length,
    issues: report.detections.filter((d) => d.category === category),
  })).filter((group) => group.evaluated > 0);
}

function categoryTag(issues: readonly Detection[]): string {
  if (issues.length === 0) return '[OK]';
  return issues.some((d) => d.severity === 'high') ? '[ERROR]' : '[WARN]';
}

/**
 * One-line description of the evidence behind a positive detection, or
 * null when the title already says it all.
 */
export function describeEvidence(evidence: Evidence): string | null {
  switch (evidence.type) {
    case 'absence':
      return evidence.candidates.length > 1 ? `none of ${evidence.candidates.join(', ')} found` : null;
    case 'quality': {
      const parts: string[] = [];
      if (evidence.minLines !== null) {
        parts.push(`${evidence.lineCount} line(s), minimum ${evidence.minLines}`);
      }
      if (evidence.missingSections.length > 0) {
        parts.push(`missing sections: ${evidence.missingSections.join(', ')}`);
      }
      return parts.length > 0 ? `${evidence.path}: ${parts.join('; ')}` : null;
    }
    case 'unreadable':
      return `cannot read ${evidence.path} (${evidence.reason})`;
  }
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

function formatIssue(detection: Detection): string[] {
  const lines = [
    `  ${SEVERITY_TAGS[detection.severity]} ${detection.title} (confidence: ${detection.confidence}, severity: ${detection.severity})`,
  ];
  const evidence = describeEvidence(detection.evidence);
  if (evidence) {
    lines.push(`       Evidence: ${evidence}`);
  }
  if (detection.recommendation) {
    lines.push(`       -> apply-template ${detection.recommendation.template}`);
    if (detection.recommendation.reason) {
      lines.push(`       Reason: ${detection.recommendation.reason}`);
    }
  }
  return lines;
}

/**
 * Render the report for the terminal.
 *
 * Sections: title, project info, per-category status, top priority actions
 * and the health line, separated by blank lines.
 */
export function formatReport(report: AnalysisReport, options: FormatOptions = {}): string {
  const top = options.top ?? DEFAULT_TOP_ACTIONS;
  const sections: string[] = [];

  sections.push('Project Analysis Results');

  const info = [
    `Project: ${report.projectName}`,
    `Type: ${listOr(report.projectTypes, 'Unknown')}`,
  ];
  if (report.frameworks.length > 0) {
    info.push(`Frameworks: ${listOr(report.frameworks, '')}`);
  }
  info.push(`Patterns Checked: ${report.summary.totalPatterns}`);
  info.push(`Issues Found: ${report.summary.issuesFound}`);
  sections.push(info.join('\n'));

  const groups = groupByCategory(report);
  if (groups.length > 0) {
    const status: string[] = [];
    for (const group of groups) {
      status.push(`${CATEGORY_LABELS[group.category]}: ${categoryTag(group.issues)}`);
      for (const issue of group.issues) {
        status.push(...formatIssue(issue));
      }
    }
    sections.push(status.join('\n'));
  }

  if (report.detections.length === 0) {
    sections.push('[OK] No priority actions needed');
  } else {
    const actions = ['Priority Actions:'];
    report.detections.slice(0, top).forEach((d, i) => {
      actions.push(`  ${i + 1}. ${d.title} (${d.severity} severity)`);
      if (d.recommendation) {
        actions.push(`     -> apply-template ${d.recommendation.template}`);
      }
    });
    sections.push(actions.join('\n'));
  }

  sections.push(`Project Health: ${report.healthScore}/100 (${HEALTH_LABELS[report.healthRating]})`);

  return sections.join('\n\n');
}

// ---------------------------------------------------------------------------
// Markdown
// ---------------------------------------------------------------------------

/**
 * Render the report as a markdown document.
 */
export function renderReportMarkdown(report: AnalysisReport, options: FormatOptions = {}): string {
  const top = options.top ?? DEFAULT_TOP_ACTIONS;
  const lines: string[] = [];

  lines.push(`# Project Health: ${report.projectName}`);
  lines.push('');
  lines.push(`**Score:** ${report.healthScore}/100 (${HEALTH_LABELS[report.healthRating]})`);
  lines.push(`**Project types:** ${listOr(report.projectTypes, 'Unknown')}`);
  lines.push(`**Frameworks:** ${listOr(report.frameworks, 'None')}`);
  lines.push(`**Rule set:** ${report.rulesetVersion ?? 'unversioned'}`);
  lines.push(`**Generated:** ${report.generatedAt}`);
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push('| Metric | Value |');
  lines.push('| --- | --- |');
  lines.push(`| Rules evaluated | ${report.summary.totalPatterns} |`);
  lines.push(`| Issues found | ${report.summary.issuesFound} |`);
  lines.push(`| High severity | ${report.summary.highSeverityCount} |`);
  lines.push(`| Medium severity | ${report.summary.mediumSeverityCount} |`);
  lines.push(`| Low severity | ${report.summary.lowSeverityCount} |`);
  lines.push('');

  const groups = groupByCategory(report);
  if (groups.length > 0) {
    lines.push('## Categories');
    lines.push('');
    for (const group of groups) {
      lines.push(`### ${CATEGORY_LABELS[group.category]} ${categoryTag(group.issues)}`);
      lines.push('');
      if (group.issues.length === 0) {
        lines.push('No issues found.');
      }
      for (const d of group.issues) {
        lines.push(`- **${d.title}** (\`${d.ruleId}\`): severity ${d.severity}, confidence ${d.confidence}`);
        const evidence = describeEvidence(d.evidence);
        if (evidence) lines.push(`  - Evidence: ${evidence}`);
        if (d.recommendation) {
          lines.push(`  - Template: \`${d.recommendation.template}\``);
          if (d.recommendation.reason) lines.push(`  - Reason: ${d.recommendation.reason}`);
        }
      }
      lines.push('');
    }
  }

  lines.push('## Priority Actions');
  lines.push('');
  if (report.detections.length === 0) {
    lines.push('No priority actions needed.');
  } else {
    report.detections.slice(0, top).forEach((d, i) => {
      const template = d.recommendation ? `: apply \`${d.recommendation.template}\`` : '';
      lines.push(`${i + 1}. ${d.title} (${d.severity} severity, priority ${d.priorityScore.toFixed(2)})${template}`);
    });
  }
  lines.push('');

  return lines.join('\n');
}
