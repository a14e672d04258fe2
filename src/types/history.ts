/**
 * History record type definitions.
 */
import { z } from 'zod';
import { LevelSchema, ProjectTypeSchema } from './rules.js';
import { AnalysisSummarySchema } from './analysis.js';

export const HistoryIsolationMetadataSchema = z.object({
  sessionId: z.string().min(1),
  domain: z.string().min(1),
});
export type HistoryIsolationMetadata = z.infer<typeof HistoryIsolationMetadataSchema>;

export const HistoryDetectionSummarySchema = z.object({
  ruleId: z.string(),
  severity: LevelSchema,
  confidence: LevelSchema,
});
export type HistoryDetectionSummary = z.infer<typeof HistoryDetectionSummarySchema>;

export const HistoryRecordSchema = z.object({
  timestamp: z.string(),
  projectIdentifier: z.string().min(1),
  healthScore: z.number().int().min(0).max(100),
  summary: AnalysisSummarySchema,
  detections: z.array(HistoryDetectionSummarySchema),
  projectTypes: z.array(ProjectTypeSchema),
  frameworks: z.array(z.string()),
  rulesetVersion: z.string().nullable(),
  isolation: HistoryIsolationMetadataSchema,
});
export type HistoryRecord = z.infer<typeof HistoryRecordSchema>;

export const HistoryFileSchema = z.object({
  version: z.literal(1),
  domain: z.string(),
  sessionId: z.string(),
  records: z.array(HistoryRecordSchema),
});
export type HistoryFile = z.infer<typeof HistoryFileSchema>;

export interface TrendSummary {
  previousScore: number | null;
  currentScore: number;
  delta: number | null;
  newIssues: string[];
  resolvedIssues: string[];
  runsCompared: number;
}
