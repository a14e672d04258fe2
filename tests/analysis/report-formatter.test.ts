/**
 * Tests for text and markdown report rendering
 */

import { describe, it, expect } from 'vitest';
import type { AnalysisReport } from '../../src/types/analysis.js';
import { evaluate } from '../../src/analysis/rule-evaluator.js';
import { describeEvidence, formatReport, renderReportMarkdown } from '../../src/analysis/report-formatter.js';
import { FIXED_NOW, absenceRule, makeSnapshot, mapReader } from '../fixtures.js';

async function buildReport(): Promise<AnalysisReport> {
  const rules = [
    absenceRule('missing-gitignore', {
      title: 'Missing .gitignore',
      category: 'git',
      targets: ['.gitignore'],
      recommendation: { template: 'git/gitignore-node', reason: 'Keep build output out of git', variants: [] },
    }),
    absenceRule('missing-license', {
      title: 'Missing LICENSE',
      category: 'documentation',
      targets: ['LICENSE', 'LICENSE.md'],
      confidence: 'medium',
      severity: 'low',
    }),
    absenceRule('missing-manifest', {
      title: 'Missing package.json',
      targets: ['package.json'],
      severity: 'medium',
    }),
  ];
  return evaluate(makeSnapshot(['package.json']), rules, {
    reader: mapReader({}),
    rulesetVersion: '1.2.0',
    now: FIXED_NOW,
  });
}

describe('formatReport', () => {
  it('should render every section', async () => {
    const text = formatReport(await buildReport());

    expect(text).toBe(
      [
        'Project Analysis Results',
        '',
        'Project: demo',
        'Type: Node',
        'Patterns Checked: 3',
        'Issues Found: 2',
        '',
        'Git Configuration: [ERROR]',
        '  [ERROR] Missing .gitignore (confidence: high, severity: high)',
        '       -> apply-template git/gitignore-node',
        '       Reason: Keep build output out of git',
        'Documentation: [WARN]',
        '  [INFO] Missing LICENSE (confidence: medium, severity: low)',
        '       Evidence: none of LICENSE, LICENSE.md found',
        'Setup: [OK]',
        '',
        'Priority Actions:',
        '  1. Missing .gitignore (high severity)',
        '     -> apply-template git/gitignore-node',
        '  2. Missing LICENSE (low severity)',
        '',
        'Project Health: 13/100 (Needs Improvement)',
      ].join('\n')
    );
  });

  it('should limit priority actions to top', async () => {
    const text = formatReport(await buildReport(), { top: 1 });
    expect(text).toContain('  1. Missing .gitignore (high severity)');
    expect(text).not.toContain('  2. Missing LICENSE (low severity)');
  });

  it('should say when there is nothing to do', async () => {
    const report = await evaluate(makeSnapshot(['package.json']), [absenceRule('missing-manifest', { targets: ['package.json'] })], {
      reader: mapReader({}),
      now: FIXED_NOW,
    });
    const text = formatReport(report);

    expect(text.split('\n')).toContain('[OK] No priority actions needed');
    expect(text.endsWith('Project Health: 100/100 (Excellent)')).toBe(true);
  });
});

describe('renderReportMarkdown', () => {
  it('should render headings, table rows and actions', async () => {
    const lines = renderReportMarkdown(await buildReport()).split('\n');

    expect(lines[0]).toBe('# Project Health: demo');
    expect(lines).toContain('**Score:** 13/100 (Needs Improvement)');
    expect(lines).toContain('**Frameworks:** None');
    expect(lines).toContain('**Rule set:** 1.2.0');
    expect(lines).toContain('| Issues found | 2 |');
    expect(lines).toContain('### Git Configuration [ERROR]');
    expect(lines).toContain('- **Missing .gitignore** (`missing-gitignore`): severity high, confidence high');
    expect(lines).toContain('  - Template: `git/gitignore-node`');
    expect(lines).toContain('  - Evidence: none of LICENSE, LICENSE.md found');
    expect(lines).toContain('1. Missing .gitignore (high severity, priority 10.00): apply `git/gitignore-node`');
    expect(lines).toContain('2. Missing LICENSE (low severity, priority 0.42)');

    const setup = lines.indexOf('### Setup [OK]');
    expect(setup).toBeGreaterThan(-1);
    expect(lines[setup + 2]).toBe('No issues found.');
  });
});

describe('describeEvidence', () => {
  it('should omit single-candidate absence evidence', () => {
    expect(describeEvidence({ type: 'absence', candidates: ['.gitignore'], matched: null })).toBeNull();
  });

  it('should describe quality shortfalls', () => {
    expect(
      describeEvidence({
        type: 'quality',
        path: 'README.md',
        lineCount: 12,
        minLines: 20,
        matchedSections: [],
        missingSections: ['## Usage'],
        marginal: false,
        effectiveConfidence: 'medium',
      })
    ).toBe('README.md: 12 line(s), minimum 20; missing sections: ## Usage');
  });

  it('should describe unreadable targets', () => {
    expect(describeEvidence({ type: 'unreadable', path: 'README.md', reason: 'EACCES' })).toBe(
      'cannot read README.md (EACCES)'
    );
  });
});
