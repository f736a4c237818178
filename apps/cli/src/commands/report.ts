/**
 * Report Command
 *
 * Summarizes an existing CSV report by issue type.
 */

import { resolve } from 'node:path';
import { readCsvReport } from '@drive-verify/validation';
import { issueTypeBreakdown, printBreakdown, printError, printHeader, printJson, printKeyValue, printWarning } from '../lib/output.js';

interface ReportOptions {
  json?: boolean;
}

export async function reportCommand(csvPath: string, options: ReportOptions): Promise<void> {
  try {
    const absolute = resolve(csvPath);
    const report = await readCsvReport(absolute);
    const breakdown = issueTypeBreakdown(report.rows);

    if (options.json) {
      printJson({ file: absolute, rows: report.rows.length, files: report.byPath.size, skipped: report.skipped, breakdown });
      return;
    }

    printHeader('Report Summary');
    printKeyValue('File', absolute);
    printKeyValue('Rows', report.rows.length);
    printKeyValue('Files affected', report.byPath.size);
    console.log();
    printBreakdown(breakdown);
    if (report.skipped > 0) {
      printWarning(`${report.skipped} rows with unknown issue types were skipped`);
    }
  } catch (error) {
    printError(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
