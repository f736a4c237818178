/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { ISSUE_TYPE_LABELS, type IssueRecord, type IssueSeverity } from '@drive-verify/core';
import { supportedExtensions, unsupportedExtensions } from '@drive-verify/media';
import { formatDuration } from '@drive-verify/utils';
import type { CsvReportRow, ScanReport } from '@drive-verify/validation';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * One line per record: `path: [Issue Type] description`
 */
export function formatIssue(issue: IssueRecord): string {
  return `${issue.path}: [${ISSUE_TYPE_LABELS[issue.category]}] ${issue.description}`;
}

export function groupBySeverity(issues: readonly IssueRecord[]): Record<IssueSeverity, IssueRecord[]> {
  const groups: Record<IssueSeverity, IssueRecord[]> = { error: [], warning: [], info: [] };
  for (const issue of issues) {
    groups[issue.severity].push(issue);
  }
  return groups;
}

export interface IssueTypeCount {
  issueType: string;
  errors: number;
  warnings: number;
  files: number;
}

/**
 * Rows per issue type, most frequent first
 */
export function issueTypeBreakdown(rows: readonly CsvReportRow[]): IssueTypeCount[] {
  const counts = new Map<string, IssueTypeCount & { paths: Set<string> }>();
  for (const row of rows) {
    let entry = counts.get(row.issueType);
    if (!entry) {
      entry = { issueType: row.issueType, errors: 0, warnings: 0, files: 0, paths: new Set() };
      counts.set(row.issueType, entry);
    }
    if (row.severity === 'ERROR') {
      entry.errors++;
    } else {
      entry.warnings++;
    }
    entry.paths.add(row.filePath);
  }

  return [...counts.values()]
    .map(({ paths, ...entry }) => ({ ...entry, files: paths.size }))
    .sort((a, b) => {
      const byTotal = b.errors + b.warnings - (a.errors + a.warnings);
      if (byTotal !== 0) return byTotal;
      return a.issueType < b.issueType ? -1 : a.issueType > b.issueType ? 1 : 0;
    });
}

function printSection(
  title: string,
  issues: readonly IssueRecord[],
  marker: string,
  maxLines: number
): void {
  if (issues.length === 0) return;
  printHeader(`${title} (${issues.length})`);
  for (const issue of issues.slice(0, maxLines)) {
    console.log(`  ${marker} ${formatIssue(issue)}`);
  }
  if (issues.length > maxLines) {
    console.log(chalk.gray(`  ... and ${issues.length - maxLines} more (see the CSV report)`));
  }
}

export function printScanReport(report: ScanReport, csvPath: string | undefined, maxLines = 50): void {
  const { volume, summary } = report;

  printHeader('Drive Verification');
  printKeyValue('Root', report.root);
  printKeyValue(
    'Filesystem',
    volume.rawFilesystem ? `${volume.filesystem} (${volume.rawFilesystem})` : volume.filesystem
  );
  printKeyValue('Partition scheme', volume.partitionScheme);
  printKeyValue('Cluster size', volume.clusterSizeBytes !== undefined ? `${volume.clusterSizeBytes} bytes` : 'Unknown');
  printKeyValue('Files', `${summary.totalFiles} (${summary.audioFiles} audio, ${summary.directories} folders)`);
  const formats = Object.entries(summary.byExtension)
    .map(([extension, count]) => `${extension} ${count}`)
    .join(', ');
  if (formats) {
    printKeyValue('Formats', formats);
  }
  printKeyValue('Duration', formatDuration(report.durationMs));

  const groups = groupBySeverity(report.issues);
  printSection('Errors', groups.error, chalk.red('✗'), maxLines);
  printSection('Warnings', groups.warning, chalk.yellow('!'), maxLines);
  printSection('Notes', groups.info, chalk.blue('i'), maxLines);

  console.log();
  if (report.cancelled) {
    printWarning(`Scan cancelled: ${summary.filesProcessed} of ${summary.totalFiles} files analysed`);
  }
  if (groups.error.length > 0) {
    printError(
      `${chalk.red(`${groups.error.length} errors`)} and ${chalk.yellow(`${groups.warning.length} warnings`)}: the head unit may not read this drive`
    );
  } else if (groups.warning.length > 0) {
    printWarning(`No errors, ${groups.warning.length} warnings`);
  } else {
    printSuccess('No problems found');
  }
  if (csvPath) {
    printInfo(`Report written to ${csvPath}`);
  }
}

export function printBreakdown(rows: readonly IssueTypeCount[]): void {
  if (rows.length === 0) {
    printSuccess('The report lists no issues');
    return;
  }
  console.table(
    rows.map((row) => ({
      'Issue type': row.issueType,
      Errors: row.errors,
      Warnings: row.warnings,
      Files: row.files,
    }))
  );
}

/**
 * Extension lists shown under `verify --help`
 */
export function audioFormatsHelp(): string {
  return [
    '',
    `Audio formats checked: ${supportedExtensions().join(', ')}`,
    `Reported as unsupported: ${unsupportedExtensions().join(', ')}`,
  ].join('\n');
}
