/**
 * Verify Command
 *
 * Scans a mounted drive, writes the CSV report and prints the findings.
 * Exit code 1 when any Error record was produced.
 */

import ora, { type Ora } from 'ora';
import { basename, resolve } from 'node:path';
import { createLogger, setLogLevel } from '@drive-verify/utils';
import {
  ScanCoordinator,
  defaultWorkerCount,
  hasErrors,
  writeCsvReport,
  type ScanPhase,
  type ScanProgress,
} from '@drive-verify/validation';
import { loadConfig, loadLimits, parsePositiveInteger } from '../config/index.js';
import { printError, printJson, printScanReport } from '../lib/output.js';

export interface VerifyOptions {
  mount?: string;
  workers?: string;
  outputDir?: string;
  limits?: string;
  json?: boolean;
  /** false with --no-csv */
  csv?: boolean;
  maxLines?: string;
}

const PHASE_TEXT: Record<ScanPhase, string> = {
  volume: 'Inspecting volume...',
  walk: 'Walking the file tree...',
  analyze: 'Analysing audio files...',
  finalize: 'Building report...',
};

function watch(coordinator: ScanCoordinator, spinner: Ora | undefined): void {
  if (!spinner) return;
  coordinator.on('phase', (phase: ScanPhase) => {
    spinner.text = PHASE_TEXT[phase];
  });
  coordinator.on('progress', (progress: ScanProgress) => {
    spinner.text = `Analysing audio files... ${progress.processed}/${progress.total}`;
  });
}

export async function verifyCommand(path: string, options: VerifyOptions): Promise<void> {
  const root = resolve(path);
  const spinner = options.json ? undefined : ora('Starting scan...').start();
  const controller = new AbortController();
  const onInterrupt = () => {
    if (spinner) {
      spinner.text = 'Stopping after the files in progress...';
    }
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const limits = await loadLimits(options.limits ?? config.limitsFile);
    const workerCount = options.workers
      ? parsePositiveInteger('workers', options.workers)
      : config.workers ?? defaultWorkerCount();
    const maxLines = options.maxLines ? parsePositiveInteger('max-lines', options.maxLines) : undefined;

    const coordinator = new ScanCoordinator({ limits, logger: createLogger({ component: 'cli' }) });
    watch(coordinator, spinner);

    const report = await coordinator.scan(root, {
      mountPath: options.mount ? resolve(options.mount) : root,
      workerCount,
      signal: controller.signal,
    });

    const csvPath =
      options.csv === false
        ? undefined
        : await writeCsvReport(
            resolve(options.outputDir ?? config.outputDir),
            basename(root),
            report.issues,
            report.completedAt
          );

    spinner?.stop();

    if (options.json) {
      printJson({ ...report, csvPath });
    } else {
      printScanReport(report, csvPath, maxLines);
    }

    process.exitCode = hasErrors(report) ? 1 : 0;
  } catch (error) {
    spinner?.fail('Scan failed');
    printError(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
