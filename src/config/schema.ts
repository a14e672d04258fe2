/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';
import { ReportFormatSchema } from '../types/analysis.js';

/**
 * Rule source settings schema
 */
export const RulesSettingsSchema = z.object({
  // null selects the rule set bundled with the package
  source: z.string().min(1).nullable().default(null),
  fail_on_warnings: z.boolean().default(false),
});

/**
 * Structure scanner settings schema
 */
export const ScanSettingsSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(8),
  timeout_ms: z.number().int().min(0).default(0),
  extra_ignores: z.array(z.string().min(1)).default([]),
});

/**
 * Rule evaluation settings schema
 */
export const EvaluationSettingsSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(4),
});

/**
 * Report settings schema
 */
export const ReportSettingsSchema = z.object({
  format: ReportFormatSchema.default('text'),
  top_actions: z.number().int().min(1).max(20).default(5),
});

/**
 * Exit status thresholds schema
 */
export const ThresholdSettingsSchema = z.object({
  fail_below: z.number().min(0).max(100).default(50),
});

/**
 * History settings schema
 */
export const HistorySettingsSchema = z.object({
  enabled: z.boolean().default(false),
  dir: z.string().min(1).default('.pulse/history'),
  limit: z.number().int().min(1).max(1000).default(10),
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  verbose: z.boolean().default(false),
  log_file: z.string().min(1).nullable().default(null),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  rules: RulesSettingsSchema.default({}),
  scan: ScanSettingsSchema.default({}),
  evaluation: EvaluationSettingsSchema.default({}),
  report: ReportSettingsSchema.default({}),
  thresholds: ThresholdSettingsSchema.default({}),
  history: HistorySettingsSchema.default({}),
  output: OutputSettingsSchema.default({}),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type RulesSettings = z.infer<typeof RulesSettingsSchema>;
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type EvaluationSettings = z.infer<typeof EvaluationSettingsSchema>;
export type ReportSettings = z.infer<typeof ReportSettingsSchema>;
export type ThresholdSettings = z.infer<typeof ThresholdSettingsSchema>;
export type HistorySettings = z.infer<typeof HistorySettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
