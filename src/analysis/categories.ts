/**
 * Report category taxonomy and rule titles.
 */

import type { Category } from '../types/rules.js';

/** Display order of the fixed taxonomy */
export const CATEGORY_ORDER: readonly Category[] = [
  'git',
  'documentation',
  'ci-cd',
  'code-quality',
  'setup',
  'security',
];

export const CATEGORY_LABELS: Record<Category, string> = {
  git: 'Git Configuration',
  documentation: 'Documentation',
  'ci-cd': 'CI/CD',
  'code-quality': 'Code Quality',
  setup: 'Setup',
  security: 'Security',
};

/**
 * Id fragments per category, tried in this order. Security goes first so
 * that e.g. `missing-env-example` is not filed under setup.
 */
const CATEGORY_HINTS: ReadonlyArray<[Category, readonly string[]]> = [
  ['security', ['security', 'secret', 'env', 'dependabot', 'audit']],
  ['git', ['gitignore', 'git-', 'gitattributes']],
  ['documentation', ['readme', 'contributing', 'license', 'changelog', 'docs']],
  ['ci-cd', ['ci', 'workflow', 'docker', 'pipeline', 'release', 'build']],
  ['code-quality', ['eslint', 'prettier', 'lint', 'format', 'test', 'tsconfig']],
];

const KNOWN_TITLES: Record<string, string> = {
  'missing-gitignore': 'Missing .gitignore',
  'missing-ci-workflow': 'No CI/CD configuration',
  'missing-git-hooks': 'Missing Git hooks',
  'missing-readme': 'Missing README.md',
  'readme-minimal': 'README.md is minimal',
  'missing-contributing': 'Missing CONTRIBUTING.md',
  'missing-license': 'Missing LICENSE',
  'missing-build-workflow': 'Missing build workflow',
  'missing-release-workflow': 'Missing release workflow',
  'missing-dockerfile': 'Missing Dockerfile',
  'missing-eslint': 'Missing ESLint configuration',
  'missing-prettier': 'Missing Prettier configuration',
  'missing-editorconfig': 'Missing .editorconfig',
};

/**
 * Pick a category for a rule: explicit wins, otherwise inferred from the id.
 */
export function resolveCategory(ruleId: string, explicit?: Category | null): Category {
  if (explicit) return explicit;
  const id = ruleId.toLowerCase();
  for (const [category, hints] of CATEGORY_HINTS) {
    if (hints.some((hint) => id.includes(hint))) return category;
  }
  return 'setup';
}

/**
 * Human-readable title for a rule id.
 */
export function describeRule(ruleId: string): string {
  const known = KNOWN_TITLES[ruleId];
  if (known) return known;
  return ruleId
    .split(/[-_]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
