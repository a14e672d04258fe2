/**
 * Predicate parsing and evaluation for `applies_when` and recommendation
 * variants.
 *
 * The predicate language is a closed set of leaves (project type, framework,
 * flag, path existence) combined with all/any/not. Evaluation is pure and
 * reads only the snapshot.
 */

import type { ProjectSnapshot } from '../types/analysis.js';
import {
  ProjectTypeSchema,
  SnapshotFlagSchema,
  type Predicate,
} from '../types/rules.js';

export class PredicateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PredicateError';
  }
}

/** Document keys, snake_case first, with the camelCase spellings accepted too */
const KEY_ALIASES: Record<string, string> = {
  project_type: 'project_type',
  projectType: 'project_type',
  framework: 'framework',
  flag: 'flag',
  file_exists: 'file_exists',
  fileExists: 'file_exists',
  directory_exists: 'directory_exists',
  directoryExists: 'directory_exists',
  all: 'all',
  any: 'any',
  not: 'not',
};

const EXISTS_SHORTHAND = /^\s*(\S.*?)\s+exists\s*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parsePathList(value: unknown, key: string): string[] {
  const list = typeof value === 'string' ? [value] : value;
  if (!Array.isArray(list) || list.length === 0) {
    throw new PredicateError(`"${key}" needs a path or a non-empty list of paths`);
  }
  return list.map((p) => {
    if (typeof p !== 'string' || p.trim() === '') {
      throw new PredicateError(`"${key}" entries must be non-empty strings`);
    }
    return normalizeRulePath(p);
  });
}

function parsePredicateList(value: unknown, key: string): Predicate[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new PredicateError(`"${key}" needs a non-empty list of conditions`);
  }
  return value.map((item) => parsePredicate(item));
}

function parseLeaf(key: string, value: unknown): Predicate {
  switch (key) {
    case 'project_type': {
      const parsed = ProjectTypeSchema.safeParse(value);
      if (!parsed.success) {
        throw new PredicateError(`Unknown project type: ${JSON.stringify(value)}`);
      }
      return { type: 'projectType', value: parsed.data };
    }
    case 'framework':
      if (typeof value !== 'string' || value.trim() === '') {
        throw new PredicateError('"framework" must be a non-empty string');
      }
      return { type: 'framework', value: value.trim().toLowerCase() };
    case 'flag': {
      const parsed = SnapshotFlagSchema.safeParse(value);
      if (!parsed.success) {
        throw new PredicateError(`Unknown flag: ${JSON.stringify(value)}`);
      }
      return { type: 'flag', value: parsed.data };
    }
    case 'file_exists':
      return { type: 'fileExists', paths: parsePathList(value, key) };
    case 'directory_exists':
      return { type: 'directoryExists', paths: parsePathList(value, key) };
    case 'all':
      return { type: 'all', predicates: parsePredicateList(value, key) };
    case 'any':
      return { type: 'any', predicates: parsePredicateList(value, key) };
    default:
      return { type: 'not', predicate: parsePredicate(value) };
  }
}

/**
 * Normalize a rule path: POSIX separators, no leading `./`, no trailing `/`.
 */
export function normalizeRulePath(p: string): string {
  let out = p.trim().replace(/\\/g, '/');
  while (out.startsWith('./')) out = out.slice(2);
  while (out.length > 1 && out.endsWith('/')) out = out.slice(0, -1);
  return out;
}

/**
 * Parse a predicate from its document form.
 *
 * Accepts the `"<path> exists"` shorthand, or an object whose recognized
 * keys are combined with `all` when there is more than one. Unrecognized
 * keys are ignored.
 *
 * @throws PredicateError when nothing usable is found or a leaf is invalid.
 */
export function parsePredicate(raw: unknown): Predicate {
  if (typeof raw === 'string') {
    const match = EXISTS_SHORTHAND.exec(raw);
    if (!match) {
      throw new PredicateError(`Unsupported condition: ${JSON.stringify(raw)}`);
    }
    return { type: 'fileExists', paths: [normalizeRulePath(match[1])] };
  }

  if (!isRecord(raw)) {
    throw new PredicateError('Condition must be an object or a "<path> exists" string');
  }

  const leaves: Predicate[] = [];
  for (const [rawKey, value] of Object.entries(raw)) {
    const key = KEY_ALIASES[rawKey];
    if (!key) continue;
    leaves.push(parseLeaf(key, value));
  }

  if (leaves.length === 0) {
    throw new PredicateError(`Condition has no recognized keys: ${Object.keys(raw).join(', ') || '(empty)'}`);
  }
  return leaves.length === 1 ? leaves[0] : { type: 'all', predicates: leaves };
}

/**
 * Evaluate a predicate against a snapshot.
 */
export function evaluatePredicate(predicate: Predicate, snapshot: ProjectSnapshot): boolean {
  switch (predicate.type) {
    case 'projectType':
      return snapshot.projectTypes.includes(predicate.value);
    case 'framework':
      return snapshot.frameworks.includes(predicate.value);
    case 'flag':
      return snapshot.flags[predicate.value];
    case 'fileExists':
      return predicate.paths.some((p) => snapshot.files.has(p));
    case 'directoryExists':
      return predicate.paths.some((p) => snapshot.directories.has(p));
    case 'all':
      return predicate.predicates.every((p) => evaluatePredicate(p, snapshot));
    case 'any':
      return predicate.predicates.some((p) => evaluatePredicate(p, snapshot));
    case 'not':
      return !evaluatePredicate(predicate.predicate, snapshot);
  }
}
