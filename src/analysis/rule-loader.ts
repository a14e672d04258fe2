/**
 * Rule set loader.
 *
 * Parses a YAML or JSON rule document into validated Rule values. A bad
 * entry becomes a LoadWarning and is dropped; only a document that cannot
 * be read or has no rule list at all is fatal (RuleSourceError).
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { RuleSourceError } from '../types/errors.js';
import {
  CategorySchema,
  LevelSchema,
  RULE_KIND_ALIASES,
  type LoadWarning,
  type LoadWarningCode,
  type Predicate,
  type QualityCriteria,
  type Recommendation,
  type RecommendationVariant,
  type Rule,
  type RuleLoadResult,
} from '../types/rules.js';
import type { AnalysisLogger } from './analysis-logger.js';
import { describeRule, resolveCategory } from './categories.js';
import { PredicateError, normalizeRulePath, parsePredicate } from './conditions.js';

/** Rule set shipped with the package */
export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL('../../assets/rules/default-rules.yaml', import.meta.url)
);

// ---------------------------------------------------------------------------
// Entry schemas
// ---------------------------------------------------------------------------

const lowerCase = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

const RawVariantSchema = z.object({
  when: z.unknown().optional(),
  condition: z.unknown().optional(),
  template: z.string().trim().min(1),
  reason: z.string().optional(),
});

const RawRecommendationSchema = z.object({
  template: z.string().trim().min(1),
  reason: z.string().default(''),
  variants: z.array(RawVariantSchema).default([]),
});

const RawRuleSchema = z.object({
  title: z.string().trim().min(1).optional(),
  category: z.preprocess(lowerCase, CategorySchema.optional()),
  confidence: z.preprocess(lowerCase, LevelSchema.default('medium')),
  severity: z.preprocess(lowerCase, LevelSchema.default('medium')),
  recommendation: RawRecommendationSchema.optional(),
});

const RawCriteriaSchema = z
  .object({
    min_lines: z.number().int().min(1).optional(),
    minLines: z.number().int().min(1).optional(),
    required_sections: z.array(z.string().min(1)).optional(),
    requiredSections: z.array(z.string().min(1)).optional(),
  })
  .transform((c) => ({
    minLines: c.min_lines ?? c.minLines ?? null,
    requiredSections: c.required_sections ?? c.requiredSections ?? [],
  }))
  .refine((c) => c.minLines !== null || c.requiredSections.length > 0, {
    message: 'criteria needs min_lines or a non-empty required_sections list',
  });

// ---------------------------------------------------------------------------
// Entry validation
// ---------------------------------------------------------------------------

class EntryRejected extends Error {
  constructor(readonly code: LoadWarningCode, message: string) {
    super(message);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function readTargets(entry: Record<string, unknown>): string[] {
  const raw = entry['target'] ?? entry['check'];
  const list = typeof raw === 'string' ? [raw] : raw;
  if (!Array.isArray(list)) {
    throw new EntryRejected('MISSING_TARGET', 'target must be a path or a list of paths');
  }
  const targets = list
    .filter((t): t is string => typeof t === 'string' && t.trim() !== '')
    .map(normalizeRulePath);
  if (targets.length === 0 || targets.length !== list.length) {
    throw new EntryRejected('MISSING_TARGET', 'target must contain only non-empty paths');
  }
  return [...new Set(targets)];
}

function readPredicate(raw: unknown, field: string): Predicate {
  try {
    return parsePredicate(raw);
  } catch (error) {
    if (error instanceof PredicateError) {
      throw new EntryRejected('INVALID_PREDICATE', `${field}: ${error.message}`);
    }
    throw error;
  }
}

function readRecommendation(
  raw: z.infer<typeof RawRecommendationSchema> | undefined
): Recommendation | null {
  if (!raw) return null;
  const variants: RecommendationVariant[] = raw.variants.map((variant, i) => {
    const condition = variant.when ?? variant.condition;
    if (condition === undefined) {
      throw new EntryRejected('INVALID_PREDICATE', `recommendation.variants.${i}: missing "when"`);
    }
    return {
      when: readPredicate(condition, `recommendation.variants.${i}.when`),
      template: variant.template,
      reason: variant.reason ?? null,
    };
  });
  return { template: raw.template, reason: raw.reason, variants };
}

/**
 * Validate one entry of the rule list.
 *
 * @throws EntryRejected with the warning code describing the defect.
 */
function parseRuleEntry(entry: unknown): Rule {
  if (!isRecord(entry)) {
    throw new EntryRejected('INVALID_RULE', 'rule entry must be a mapping');
  }

  const id = entry['id'];
  if (typeof id !== 'string' || id.trim() === '') {
    throw new EntryRejected('INVALID_RULE', 'rule is missing an id');
  }

  const rawKind = entry['kind'] ?? entry['type'];
  const kind = typeof rawKind === 'string' ? RULE_KIND_ALIASES[rawKind.trim()] : undefined;
  if (!kind) {
    throw new EntryRejected('UNKNOWN_KIND', `unknown kind ${JSON.stringify(rawKind ?? null)}`);
  }

  const targets = readTargets(entry);

  const fields = RawRuleSchema.safeParse(entry);
  if (!fields.success) {
    throw new EntryRejected('INVALID_RULE', formatZodError(fields.error));
  }

  const rawAppliesWhen = entry['applies_when'] ?? entry['appliesWhen'];
  const appliesWhen =
    rawAppliesWhen === undefined || rawAppliesWhen === null
      ? null
      : readPredicate(rawAppliesWhen, 'applies_when');
  const recommendation = readRecommendation(fields.data.recommendation);

  const base = {
    id: id.trim(),
    title: fields.data.title ?? describeRule(id.trim()),
    category: resolveCategory(id.trim(), fields.data.category),
    targets,
    confidence: fields.data.confidence,
    severity: fields.data.severity,
    appliesWhen,
    recommendation,
  };

  const rawCriteria = entry['criteria'] ?? entry['quality_criteria'] ?? entry['qualityCriteria'];
  if (kind === 'FileQuality') {
    if (rawCriteria === undefined) {
      throw new EntryRejected('INVALID_CRITERIA', 'file_quality rules need criteria');
    }
    const criteria = RawCriteriaSchema.safeParse(rawCriteria);
    if (!criteria.success) {
      throw new EntryRejected('INVALID_CRITERIA', formatZodError(criteria.error));
    }
    const quality: QualityCriteria = criteria.data;
    return { ...base, kind, criteria: quality };
  }

  if (rawCriteria !== undefined) {
    throw new EntryRejected('INVALID_CRITERIA', `criteria only applies to file_quality rules, not ${kind}`);
  }
  return { ...base, kind };
}

// ---------------------------------------------------------------------------
// Document parsing
// ---------------------------------------------------------------------------

/**
 * Validate a parsed rule document.
 *
 * The first valid occurrence of an id wins; later valid duplicates are
 * reported as DUPLICATE_ID.
 *
 * @param doc - Parsed document: `{ version?, rules | patterns }` or a bare list.
 * @param source - Label used in error messages.
 * @returns Valid rules in document order plus one warning per rejected entry.
 * @throws RuleSourceError when a non-empty document has no rule list.
 */
export function parseRuleSet(doc: unknown, source = '<inline>'): RuleLoadResult {
  let entries: unknown;
  let version: string | null = null;

  if (doc === null || doc === undefined) {
    // An empty document is a rule set with no rules
    entries = [];
  } else if (Array.isArray(doc)) {
    entries = doc;
  } else if (isRecord(doc)) {
    entries = doc['rules'] ?? doc['patterns'];
    const rawVersion = doc['version'];
    if (typeof rawVersion === 'string' || typeof rawVersion === 'number') {
      version = String(rawVersion);
    }
  }

  if (!Array.isArray(entries)) {
    throw new RuleSourceError(
      'SOURCE_INVALID',
      source,
      `Rule source ${source} has no "rules" list`
    );
  }

  const rules: Rule[] = [];
  const warnings: LoadWarning[] = [];
  const seen = new Set<string>();

  entries.forEach((entry, index) => {
    const rawId = isRecord(entry) && typeof entry['id'] === 'string' ? entry['id'].trim() || null : null;
    try {
      const rule = parseRuleEntry(entry);
      if (seen.has(rule.id)) {
        warnings.push({
          index,
          ruleId: rule.id,
          code: 'DUPLICATE_ID',
          message: `duplicate rule id "${rule.id}"; the first definition is kept`,
        });
        return;
      }
      seen.add(rule.id);
      rules.push(rule);
    } catch (error) {
      if (!(error instanceof EntryRejected)) throw error;
      warnings.push({ index, ruleId: rawId, code: error.code, message: error.message });
    }
  });

  return { version, rules, warnings };
}

/**
 * Parse rule document text. YAML is a superset of JSON, so both work.
 *
 * @throws RuleSourceError('SOURCE_PARSE_FAILED') on a syntax error.
 */
export function loadRuleSource(text: string, source = '<inline>'): RuleLoadResult {
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (error) {
    throw new RuleSourceError(
      'SOURCE_PARSE_FAILED',
      source,
      `Cannot parse rule source ${source}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseRuleSet(doc, source);
}

export interface LoadRuleSetOptions {
  logger?: AnalysisLogger;
}

/**
 * Read and parse a rule document from disk.
 *
 * @param filePath - Path to a .yaml, .yml or .json document.
 */
export async function loadRuleSetFile(
  filePath: string,
  options: LoadRuleSetOptions = {}
): Promise<RuleLoadResult> {
  const resolved = path.resolve(filePath);
  let text: string;
  try {
    text = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      throw new RuleSourceError('SOURCE_NOT_FOUND', resolved, `Rule source not found: ${resolved}`);
    }
    throw new RuleSourceError(
      'SOURCE_UNREADABLE',
      resolved,
      `Cannot read rule source ${resolved}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = loadRuleSource(text, resolved);
  await logLoadResult(result, resolved, options.logger);
  return result;
}

/**
 * Load the rule set bundled with the package.
 */
export async function loadDefaultRuleSet(options: LoadRuleSetOptions = {}): Promise<RuleLoadResult> {
  return loadRuleSetFile(DEFAULT_RULES_PATH, options);
}

async function logLoadResult(
  result: RuleLoadResult,
  source: string,
  logger: AnalysisLogger | undefined
): Promise<void> {
  if (!logger) return;
  for (const warning of result.warnings) {
    await logger.warn(
      'rules',
      'rule_rejected',
      `Rule #${warning.index}${warning.ruleId ? ` (${warning.ruleId})` : ''} rejected: ${warning.message}`,
      { code: warning.code }
    );
  }
  await logger.info('rules', 'rules_loaded', `Loaded ${result.rules.length} rule(s) from ${source}`, {
    version: result.version,
    rejected: result.warnings.length,
  });
}
