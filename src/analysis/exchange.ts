/**
 * Exchange documents for running scan and evaluation as separate processes.
 *
 * A document is JSON with a `kind` tag and a `formatVersion`; reading one
 * back validates it with zod and rebuilds an equivalent value.
 */

import { z } from 'zod';
import {
  AnalysisReportSchema,
  ScanSkipSchema,
  SnapshotFlagsSchema,
  type AnalysisReport,
  type ProjectSnapshot,
} from '../types/analysis.js';
import { ExchangeFormatError, type ExchangeFormatErrorCode } from '../types/errors.js';
import { ProjectTypeSchema } from '../types/rules.js';
import { createSnapshot } from './snapshot.js';

export const EXCHANGE_FORMAT_VERSION = 1;

const SnapshotBodySchema = z.object({
  root: z.string().min(1),
  projectName: z.string(),
  files: z.array(z.string()),
  directories: z.array(z.string()),
  projectTypes: z.array(ProjectTypeSchema),
  frameworks: z.array(z.string()),
  flags: SnapshotFlagsSchema,
  skipped: z.array(ScanSkipSchema).default([]),
  scannedAt: z.string(),
});

export const SnapshotDocumentSchema = z.object({
  kind: z.literal('snapshot'),
  formatVersion: z.literal(EXCHANGE_FORMAT_VERSION),
  snapshot: SnapshotBodySchema,
});
export type SnapshotDocument = z.infer<typeof SnapshotDocumentSchema>;

export const ReportDocumentSchema = z.object({
  kind: z.literal('report'),
  formatVersion: z.literal(EXCHANGE_FORMAT_VERSION),
  report: AnalysisReportSchema,
});
export type ReportDocument = z.infer<typeof ReportDocumentSchema>;

function parseDocument<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  code: ExchangeFormatErrorCode,
  label: string
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ExchangeFormatError(
      code,
      `Invalid ${label} document: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ExchangeFormatError(code, `Invalid ${label} document: ${details}`);
  }
  return result.data;
}

/**
 * Serialize a snapshot. Paths are written sorted.
 */
export function snapshotToJson(snapshot: ProjectSnapshot): string {
  const doc: SnapshotDocument = {
    kind: 'snapshot',
    formatVersion: EXCHANGE_FORMAT_VERSION,
    snapshot: {
      root: snapshot.root,
      projectName: snapshot.projectName,
      files: [...snapshot.files].sort(),
      directories: [...snapshot.directories].sort(),
      projectTypes: [...snapshot.projectTypes],
      frameworks: [...snapshot.frameworks],
      flags: { ...snapshot.flags },
      skipped: snapshot.skipped.map((s) => ({ ...s })),
      scannedAt: snapshot.scannedAt,
    },
  };
  return JSON.stringify(doc, null, 2);
}

/**
 * Rebuild a frozen snapshot from its exchange document.
 *
 * @throws ExchangeFormatError('INVALID_SNAPSHOT')
 */
export function snapshotFromJson(text: string): ProjectSnapshot {
  const doc = parseDocument(text, SnapshotDocumentSchema, 'INVALID_SNAPSHOT', 'snapshot');
  return createSnapshot(doc.snapshot);
}

export function reportToJson(report: AnalysisReport): string {
  const doc: ReportDocument = {
    kind: 'report',
    formatVersion: EXCHANGE_FORMAT_VERSION,
    report,
  };
  return JSON.stringify(doc, null, 2);
}

/**
 * @throws ExchangeFormatError('INVALID_REPORT')
 */
export function reportFromJson(text: string): AnalysisReport {
  return parseDocument(text, ReportDocumentSchema, 'INVALID_REPORT', 'report').report;
}
