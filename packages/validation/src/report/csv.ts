/**
 * CSV Report
 *
 * The file remediation tools read: `file_path,issue_type,severity,description`,
 * one row per Error or Warning record, in report order. Readers must skip
 * issue types they do not know, and parseCsvReport does.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import {
  ISSUE_TYPE_LABELS,
  categoryFromLabel,
  type IssueCategory,
  type IssueRecord,
} from '@drive-verify/core';
import { fileTimestamp, safeWriteFile } from '@drive-verify/utils';

export const CSV_COLUMNS = ['file_path', 'issue_type', 'severity', 'description'] as const;

export type CsvSeverity = 'ERROR' | 'WARNING';

export interface CsvReportRow {
  filePath: string;
  issueType: string;
  category: IssueCategory;
  severity: CsvSeverity;
  description: string;
}

export interface CsvReport {
  rows: CsvReportRow[];
  /** Rows grouped by file_path, in first-seen order */
  byPath: Map<string, CsvReportRow[]>;
  /** Rows with an issue_type or severity this version does not know */
  skipped: number;
}

const csvRowSchema = z.object({
  file_path: z.string(),
  issue_type: z.string(),
  severity: z.string(),
  description: z.string(),
});

const csvRowsSchema = z.array(csvRowSchema);

function toCsvSeverity(value: string): CsvSeverity | undefined {
  const upper = value.trim().toUpperCase();
  return upper === 'ERROR' || upper === 'WARNING' ? upper : undefined;
}

/**
 * Render records as CSV. Info records are not written.
 */
export function formatCsvReport(issues: readonly IssueRecord[]): string {
  const rows = issues
    .filter((issue) => issue.severity !== 'info')
    .map((issue) => [
      issue.path,
      ISSUE_TYPE_LABELS[issue.category],
      issue.severity.toUpperCase(),
      issue.description,
    ]);
  return stringify([[...CSV_COLUMNS], ...rows]);
}

export function parseCsvReport(content: string): CsvReport {
  const raw: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
  });
  const records = csvRowsSchema.parse(raw);

  const rows: CsvReportRow[] = [];
  const byPath = new Map<string, CsvReportRow[]>();
  let skipped = 0;

  for (const record of records) {
    const category = categoryFromLabel(record.issue_type);
    const severity = toCsvSeverity(record.severity);
    if (!category || !severity) {
      skipped++;
      continue;
    }

    const row: CsvReportRow = {
      filePath: record.file_path,
      issueType: record.issue_type,
      category,
      severity,
      description: record.description,
    };
    rows.push(row);

    const group = byPath.get(row.filePath);
    if (group) {
      group.push(row);
    } else {
      byPath.set(row.filePath, [row]);
    }
  }

  return { rows, byPath, skipped };
}

export async function readCsvReport(filePath: string): Promise<CsvReport> {
  return parseCsvReport(await readFile(filePath, 'utf8'));
}

/**
 * verify_<label>_<timestamp>.csv
 */
export function reportFileName(label: string, date: Date = new Date()): string {
  const safeLabel = label.replace(/[^A-Za-z0-9_-]+/g, '_').replace(/^_+|_+$/g, '') || 'drive';
  return `verify_${safeLabel}_${fileTimestamp(date)}.csv`;
}

/**
 * Write the report into `outputDir` and return its path
 */
export async function writeCsvReport(
  outputDir: string,
  label: string,
  issues: readonly IssueRecord[],
  date: Date = new Date()
): Promise<string> {
  const filePath = join(outputDir, reportFileName(label, date));
  await safeWriteFile(filePath, formatCsvReport(issues));
  return filePath;
}
