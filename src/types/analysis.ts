/**
 * Analysis type definitions.
 *
 * Snapshot, detection and report shapes. Reports are described with zod so
 * the exchange format can validate them when read back from disk.
 */
import { z } from 'zod';
import {
  CategorySchema,
  LevelSchema,
  ProjectTypeSchema,
  RuleKindSchema,
  type ProjectType,
} from './rules.js';

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export const SnapshotFlagsSchema = z.object({
  hasGit: z.boolean(),
  hasCI: z.boolean(),
  hasTests: z.boolean(),
  hasDocker: z.boolean(),
});
export type SnapshotFlags = z.infer<typeof SnapshotFlagsSchema>;

export const ScanSkipSchema = z.object({
  path: z.string(),
  reason: z.string(),
});
export type ScanSkip = z.infer<typeof ScanSkipSchema>;

/**
 * Immutable result of one scan. Built once by the scanner and frozen;
 * consumers only read it.
 */
export interface ProjectSnapshot {
  readonly root: string;
  readonly projectName: string;
  readonly files: ReadonlySet<string>;
  readonly directories: ReadonlySet<string>;
  readonly projectTypes: readonly ProjectType[];
  readonly frameworks: readonly string[];
  readonly flags: Readonly<SnapshotFlags>;
  readonly skipped: readonly ScanSkip[];
  readonly scannedAt: string;
}

// ---------------------------------------------------------------------------
// Evidence
// ---------------------------------------------------------------------------

export const AbsenceEvidenceSchema = z.object({
  type: z.literal('absence'),
  candidates: z.array(z.string()),
  matched: z.string().nullable(),
});

export const QualityEvidenceSchema = z.object({
  type: z.literal('quality'),
  path: z.string(),
  lineCount: z.number().int().min(0),
  minLines: z.number().int().nullable(),
  matchedSections: z.array(z.string()),
  missingSections: z.array(z.string()),
  marginal: z.boolean(),
  effectiveConfidence: LevelSchema,
});

export const UnreadableEvidenceSchema = z.object({
  type: z.literal('unreadable'),
  path: z.string(),
  reason: z.string(),
});

export const EvidenceSchema = z.discriminatedUnion('type', [
  AbsenceEvidenceSchema,
  QualityEvidenceSchema,
  UnreadableEvidenceSchema,
]);
export type Evidence = z.infer<typeof EvidenceSchema>;
export type AbsenceEvidence = z.infer<typeof AbsenceEvidenceSchema>;
export type QualityEvidence = z.infer<typeof QualityEvidenceSchema>;

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

export const ResolvedRecommendationSchema = z.object({
  template: z.string(),
  reason: z.string(),
  variantMatched: z.boolean(),
});
export type ResolvedRecommendation = z.infer<typeof ResolvedRecommendationSchema>;

export const DetectionSchema = z.object({
  ruleId: z.string(),
  kind: RuleKindSchema,
  title: z.string(),
  category: CategorySchema,
  issueFound: z.boolean(),
  confidence: LevelSchema,
  severity: LevelSchema,
  evidence: EvidenceSchema,
  recommendation: ResolvedRecommendationSchema.nullable(),
  priorityScore: z.number(),
});
export type Detection = z.infer<typeof DetectionSchema>;

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export const HealthRatingSchema = z.enum(['excellent', 'good', 'fair', 'needs-improvement']);
export type HealthRating = z.infer<typeof HealthRatingSchema>;

export const AnalysisSummarySchema = z.object({
  totalPatterns: z.number().int().min(0),
  issuesFound: z.number().int().min(0),
  highSeverityCount: z.number().int().min(0),
  mediumSeverityCount: z.number().int().min(0),
  lowSeverityCount: z.number().int().min(0),
});
export type AnalysisSummary = z.infer<typeof AnalysisSummarySchema>;

export const AnalysisReportSchema = z.object({
  projectName: z.string(),
  root: z.string(),
  rulesetVersion: z.string().nullable(),
  generatedAt: z.string(),
  projectTypes: z.array(ProjectTypeSchema),
  frameworks: z.array(z.string()),
  flags: SnapshotFlagsSchema,
  /** Positive detections, priority descending then ruleId ascending */
  detections: z.array(DetectionSchema),
  /** Every evaluated rule, ruleId ascending */
  evaluations: z.array(DetectionSchema),
  summary: AnalysisSummarySchema,
  healthScore: z.number().int().min(0).max(100),
  healthRating: HealthRatingSchema,
});
export type AnalysisReport = z.infer<typeof AnalysisReportSchema>;

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export const ReportFormatSchema = z.enum(['text', 'json', 'markdown']);
export type ReportFormat = z.infer<typeof ReportFormatSchema>;
