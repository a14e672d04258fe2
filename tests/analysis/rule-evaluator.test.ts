/**
 * Tests for rule evaluation and report aggregation
 */

import { describe, it, expect } from 'vitest';
import { countLines, evaluate, evaluateRule } from '../../src/analysis/rule-evaluator.js';
import { AnalysisLogger } from '../../src/analysis/analysis-logger.js';
import { FIXED_NOW, absenceRule, makeSnapshot, mapReader, qualityRule } from '../fixtures.js';

const readmeCriteria = { minLines: 50, requiredSections: [] };

function lines(n: number): string {
  return 'line\n'.repeat(n);
}

// ---------------------------------------------------------------------------
// countLines
// ---------------------------------------------------------------------------
describe('countLines', () => {
  it('should count newline-terminated lines and a trailing partial line', () => {
    expect(countLines('')).toBe(0);
    expect(countLines('a')).toBe(1);
    expect(countLines('a\n')).toBe(1);
    expect(countLines('a\nb')).toBe(2);
    expect(countLines('\n\n')).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// Absence rules
// ---------------------------------------------------------------------------
describe('evaluateRule - absence', () => {
  it('should report no issue when any candidate is present', async () => {
    const rule = absenceRule('missing-readme', { targets: ['README.md', 'README'] });
    const detection = await evaluateRule(rule, makeSnapshot(['README']), mapReader({}));

    expect(detection).not.toBeNull();
    expect(detection?.issueFound).toBe(false);
    expect(detection?.evidence).toEqual({ type: 'absence', candidates: ['README.md', 'README'], matched: 'README' });
    expect(detection?.priorityScore).toBe(0);
  });

  it('should report an issue with priority when every candidate is missing', async () => {
    const rule = absenceRule('missing-readme', { targets: ['README.md', 'README'] });
    const detection = await evaluateRule(rule, makeSnapshot([]), mapReader({}));

    expect(detection?.issueFound).toBe(true);
    expect(detection?.evidence).toEqual({ type: 'absence', candidates: ['README.md', 'README'], matched: null });
    expect(detection?.priorityScore).toBe(10);
  });

  it('should check directories for directory rules', async () => {
    const rule = absenceRule('missing-ci-workflow', {
      kind: 'DirectoryAbsence',
      targets: ['.github/workflows', '.circleci'],
    });

    const present = await evaluateRule(rule, makeSnapshot([], ['.github', '.github/workflows']), mapReader({}));
    expect(present?.issueFound).toBe(false);

    // A file with the same path does not satisfy a directory rule
    const fileOnly = await evaluateRule(rule, makeSnapshot(['.circleci']), mapReader({}));
    expect(fileOnly?.issueFound).toBe(true);
  });

  it('should skip rules whose applies_when is false', async () => {
    const rule = absenceRule('missing-eslint', { appliesWhen: { type: 'projectType', value: 'node' } });
    expect(await evaluateRule(rule, makeSnapshot(['setup.py']), mapReader({}))).toBeNull();
    expect(await evaluateRule(rule, makeSnapshot(['package.json']), mapReader({}))).not.toBeNull();
  });

  it('should resolve the first matching recommendation variant', async () => {
    const rule = absenceRule('missing-gitignore', {
      recommendation: {
        template: 'git/gitignore',
        reason: 'Keep output out of git',
        variants: [
          { when: { type: 'projectType', value: 'python' }, template: 'git/gitignore-python', reason: null },
          { when: { type: 'projectType', value: 'node' }, template: 'git/gitignore-node', reason: 'Ignore node_modules' },
          { when: { type: 'fileExists', paths: ['package.json'] }, template: 'git/never-reached', reason: null },
        ],
      },
    });

    const node = await evaluateRule(rule, makeSnapshot(['package.json']), mapReader({}));
    expect(node?.recommendation).toEqual({
      template: 'git/gitignore-node',
      reason: 'Ignore node_modules',
      variantMatched: true,
    });

    const python = await evaluateRule(rule, makeSnapshot(['setup.py']), mapReader({}));
    expect(python?.recommendation).toEqual({
      template: 'git/gitignore-python',
      reason: 'Keep output out of git',
      variantMatched: true,
    });

    const other = await evaluateRule(rule, makeSnapshot(['go.mod']), mapReader({}));
    expect(other?.recommendation).toEqual({
      template: 'git/gitignore',
      reason: 'Keep output out of git',
      variantMatched: false,
    });
  });
});

// ---------------------------------------------------------------------------
// Quality rules
// ---------------------------------------------------------------------------
describe('evaluateRule - quality', () => {
  it('should pass a file at exactly min_lines and mark it marginal', async () => {
    const rule = qualityRule('readme-minimal', readmeCriteria);
    const detection = await evaluateRule(rule, makeSnapshot(['README.md']), mapReader({ 'README.md': lines(50) }));

    expect(detection?.issueFound).toBe(false);
    expect(detection?.evidence).toEqual({
      type: 'quality',
      path: 'README.md',
      lineCount: 50,
      minLines: 50,
      matchedSections: [],
      missingSections: [],
      marginal: true,
      effectiveConfidence: 'high',
    });
    // The declared confidence is unchanged
    expect(detection?.confidence).toBe('medium');
  });

  it('should fail a file one line short', async () => {
    const rule = qualityRule('readme-minimal', readmeCriteria);
    const detection = await evaluateRule(rule, makeSnapshot(['README.md']), mapReader({ 'README.md': lines(49) }));

    expect(detection?.issueFound).toBe(true);
    expect(detection?.evidence).toMatchObject({ lineCount: 49, marginal: false, effectiveConfidence: 'medium' });
    expect(detection?.priorityScore).toBeCloseTo(0.42);
  });

  it('should end the marginal band at ceil(min_lines * 1.2)', async () => {
    const rule = qualityRule('readme-minimal', readmeCriteria);
    const inside = await evaluateRule(rule, makeSnapshot(['README.md']), mapReader({ 'README.md': lines(59) }));
    const outside = await evaluateRule(rule, makeSnapshot(['README.md']), mapReader({ 'README.md': lines(60) }));

    expect(inside?.evidence).toMatchObject({ marginal: true });
    expect(outside?.evidence).toMatchObject({ marginal: false, effectiveConfidence: 'medium' });
  });

  it('should match required sections case-insensitively', async () => {
    const rule = qualityRule('readme-minimal', {
      minLines: null,
      requiredSections: ['## Installation', '## Usage'],
    });
    const text = '# Demo\n\n## INSTALLATION\n\nnpm install\n';
    const detection = await evaluateRule(rule, makeSnapshot(['README.md']), mapReader({ 'README.md': text }));

    expect(detection?.issueFound).toBe(true);
    expect(detection?.evidence).toMatchObject({
      matchedSections: ['## Installation'],
      missingSections: ['## Usage'],
      marginal: false,
    });
  });

  it('should not raise confidence when a marginal file misses a section', async () => {
    const rule = qualityRule('readme-minimal', { minLines: 10, requiredSections: ['## Usage'] });
    const detection = await evaluateRule(rule, makeSnapshot(['README.md']), mapReader({ 'README.md': lines(10) }));

    expect(detection?.issueFound).toBe(true);
    expect(detection?.evidence).toMatchObject({ marginal: true, effectiveConfidence: 'medium' });
  });

  it('should inspect the first present target', async () => {
    const rule = qualityRule('readme-minimal', readmeCriteria, { targets: ['README.md', 'README.rst'] });
    const reader = mapReader({ 'README.rst': lines(80) });
    const detection = await evaluateRule(rule, makeSnapshot(['README.rst']), reader);

    expect(reader.reads).toEqual(['README.rst']);
    expect(detection?.evidence).toMatchObject({ type: 'quality', path: 'README.rst', lineCount: 80 });
  });

  it('should fall back to absence evidence when no target exists', async () => {
    const rule = qualityRule('readme-minimal', readmeCriteria);
    const reader = mapReader({});
    const detection = await evaluateRule(rule, makeSnapshot([]), reader);

    expect(reader.reads).toEqual([]);
    expect(detection?.issueFound).toBe(true);
    expect(detection?.evidence).toEqual({ type: 'absence', candidates: ['README.md'], matched: null });
  });

  it('should report an unreadable target as an issue', async () => {
    const rule = qualityRule('readme-minimal', readmeCriteria);
    const detection = await evaluateRule(rule, makeSnapshot(['README.md']), mapReader({}));

    expect(detection?.issueFound).toBe(true);
    expect(detection?.evidence).toEqual({
      type: 'unreadable',
      path: 'README.md',
      reason: 'ENOENT: no such file README.md',
    });
  });
});

// ---------------------------------------------------------------------------
// evaluate
// ---------------------------------------------------------------------------
describe('evaluate', () => {
  const rules = [
    absenceRule('missing-license', { targets: ['LICENSE'], confidence: 'medium', severity: 'low' }),
    absenceRule('missing-readme', { targets: ['README.md'] }),
    absenceRule('missing-gitignore', { targets: ['.gitignore'] }),
    absenceRule('missing-manifest', { targets: ['package.json'], severity: 'medium' }),
    absenceRule('missing-pyproject', {
      targets: ['pyproject.toml'],
      appliesWhen: { type: 'projectType', value: 'python' },
    }),
  ];
  const snapshot = makeSnapshot(['package.json']);

  it('should aggregate detections, summary and score', async () => {
    const report = await evaluate(snapshot, rules, {
      reader: mapReader({}),
      rulesetVersion: '2.0.0',
      now: FIXED_NOW,
    });

    expect(report.evaluations.map((d) => d.ruleId)).toEqual([
      'missing-gitignore',
      'missing-license',
      'missing-manifest',
      'missing-readme',
    ]);
    // Equal priorities fall back to rule id order
    expect(report.detections.map((d) => d.ruleId)).toEqual(['missing-gitignore', 'missing-readme', 'missing-license']);
    expect(report.summary).toEqual({
      totalPatterns: 4,
      issuesFound: 3,
      highSeverityCount: 2,
      mediumSeverityCount: 0,
      lowSeverityCount: 1,
    });
    // 100 - 75 - 40 clamps to 0
    expect(report.healthScore).toBe(0);
    expect(report.healthRating).toBe('needs-improvement');
    expect(report.rulesetVersion).toBe('2.0.0');
    expect(report.generatedAt).toBe('2026-03-01T10:00:00.000Z');
    expect(report.projectTypes).toEqual(['node']);
  });

  it('should produce the same report at any concurrency', async () => {
    const sequential = await evaluate(snapshot, rules, { concurrency: 1, reader: mapReader({}), now: FIXED_NOW });
    const parallel = await evaluate(snapshot, [...rules].reverse(), {
      concurrency: 8,
      reader: mapReader({}),
      now: FIXED_NOW,
    });
    expect(parallel).toEqual(sequential);
  });

  it('should score 100 when no rule applies', async () => {
    const report = await evaluate(snapshot, [rules[4]], { reader: mapReader({}), now: FIXED_NOW });
    expect(report.summary.totalPatterns).toBe(0);
    expect(report.healthScore).toBe(100);
    expect(report.healthRating).toBe('excellent');
  });

  it('should log unreadable targets as warnings', async () => {
    const logger = new AnalysisLogger();
    await evaluate(makeSnapshot(['README.md']), [qualityRule('readme-minimal', readmeCriteria)], {
      reader: mapReader({}),
      logger,
    });

    const warnings = logger.getWarnings();
    expect(warnings).toHaveLength(1);
    expect(warnings[0].event).toBe('target_unreadable');
    expect(warnings[0].message).toBe('readme-minimal: cannot read README.md');
  });

  it('should score 11 issues out of 20 low-severity rules as 45', async () => {
    const many = Array.from({ length: 20 }, (_, i) =>
      absenceRule(`rule-${String(i).padStart(2, '0')}`, { severity: 'low' })
    );
    const present = many.slice(11).map((rule) => rule.targets[0]);

    const report = await evaluate(makeSnapshot(present), many, { reader: mapReader({}) });

    expect(report.summary.issuesFound).toBe(11);
    expect(report.healthScore).toBe(45);
  });

  it('should log each rule outcome at debug level only when verbose', async () => {
    const quiet = new AnalysisLogger();
    const verbose = new AnalysisLogger({ verbose: true });
    for (const logger of [quiet, verbose]) {
      await evaluate(snapshot, rules, { reader: mapReader({}), logger });
    }

    expect(quiet.getEntries().filter((e) => e.level === 'debug')).toEqual([]);
    expect(
      verbose
        .getEntries()
        .filter((e) => e.event === 'rule_evaluated')
        .map((e) => e.message)
    ).toEqual([
      'missing-license: issue found',
      'missing-readme: issue found',
      'missing-gitignore: issue found',
      'missing-manifest: ok',
      'missing-pyproject: excluded by applies_when',
    ]);
  });
});
