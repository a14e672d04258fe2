/**
 * Rule set type definitions.
 *
 * Rules are data: a closed set of kinds plus a predicate tree for
 * `applies_when`. Documents use snake_case keys; the loader normalizes
 * them into the camelCase shapes below.
 */
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const RuleKindSchema = z.enum(['FileAbsence', 'DirectoryAbsence', 'FileQuality']);
export type RuleKind = z.infer<typeof RuleKindSchema>;

/** Spellings accepted in rule documents for each kind */
export const RULE_KIND_ALIASES: Record<string, RuleKind> = {
  file_absence: 'FileAbsence',
  directory_absence: 'DirectoryAbsence',
  file_quality: 'FileQuality',
  FileAbsence: 'FileAbsence',
  DirectoryAbsence: 'DirectoryAbsence',
  FileQuality: 'FileQuality',
};

export const LevelSchema = z.enum(['high', 'medium', 'low']);
export type Level = z.infer<typeof LevelSchema>;
export type Confidence = Level;
export type Severity = Level;

export const ProjectTypeSchema = z.enum([
  'node',
  'python',
  'java',
  'rust',
  'go',
  'ruby',
  'php',
  'csharp',
]);
export type ProjectType = z.infer<typeof ProjectTypeSchema>;

export const SnapshotFlagSchema = z.enum(['hasGit', 'hasCI', 'hasTests', 'hasDocker']);
export type SnapshotFlag = z.infer<typeof SnapshotFlagSchema>;

export const CategorySchema = z.enum([
  'git',
  'documentation',
  'ci-cd',
  'code-quality',
  'setup',
  'security',
]);
export type Category = z.infer<typeof CategorySchema>;

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

export type Predicate =
  | { type: 'projectType'; value: ProjectType }
  | { type: 'framework'; value: string }
  | { type: 'flag'; value: SnapshotFlag }
  | { type: 'fileExists'; paths: readonly string[] }
  | { type: 'directoryExists'; paths: readonly string[] }
  | { type: 'all'; predicates: readonly Predicate[] }
  | { type: 'any'; predicates: readonly Predicate[] }
  | { type: 'not'; predicate: Predicate };

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

export interface QualityCriteria {
  minLines: number | null;
  requiredSections: readonly string[];
}

export interface RecommendationVariant {
  when: Predicate;
  template: string;
  reason: string | null;
}

export interface Recommendation {
  template: string;
  reason: string;
  variants: readonly RecommendationVariant[];
}

interface RuleBase {
  id: string;
  title: string;
  category: Category;
  targets: readonly string[];
  confidence: Confidence;
  severity: Severity;
  appliesWhen: Predicate | null;
  recommendation: Recommendation | null;
}

export interface AbsenceRule extends RuleBase {
  kind: 'FileAbsence' | 'DirectoryAbsence';
}

export interface QualityRule extends RuleBase {
  kind: 'FileQuality';
  criteria: QualityCriteria;
}

export type Rule = AbsenceRule | QualityRule;

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export const LoadWarningCodeSchema = z.enum([
  'INVALID_RULE',
  'UNKNOWN_KIND',
  'MISSING_TARGET',
  'INVALID_CRITERIA',
  'INVALID_PREDICATE',
  'DUPLICATE_ID',
]);
export type LoadWarningCode = z.infer<typeof LoadWarningCodeSchema>;

export interface LoadWarning {
  /** Zero-based position of the entry in the source list */
  index: number;
  ruleId: string | null;
  code: LoadWarningCode;
  message: string;
}

export interface RuleLoadResult {
  version: string | null;
  rules: Rule[];
  warnings: LoadWarning[];
}
