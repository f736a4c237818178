/**
 * Scan Coordinator
 *
 * Runs one verification pass over a drive:
 * 1. Volume inspection and tree walk, in order
 * 2. Audio analysis of every file on a fixed-size worker pool
 * 3. Merge and sort of every record into the final report
 *
 * Emits 'phase' and 'progress' events for live display.
 */

import { EventEmitter } from 'node:events';
import { stat } from 'node:fs/promises';
import { availableParallelism } from 'node:os';
import {
  DEFAULT_LIMITS,
  RootUnreadableError,
  createIssue,
  type FileNode,
  type IssueRecord,
  type VerifierLimits,
  type VolumeProfile,
} from '@drive-verify/core';
import { AudioProbe } from '@drive-verify/media';
import { createLogger, describeFsError, type Logger } from '@drive-verify/utils';
import { VolumeInspector } from '@drive-verify/volume';
import { IssueCollector, type CategoryCounts, type IssueBuffer, type SeverityCounts } from './issueCollector.js';
import { evaluateAudio } from './rules/audioRules.js';
import { evaluateVolume } from './rules/volumeRules.js';
import { TreeWalker } from './treeWalker.js';
import { runPool } from './workerPool.js';

export type ScanPhase = 'volume' | 'walk' | 'analyze' | 'finalize';

export interface ScanProgress {
  processed: number;
  total: number;
  counts: CategoryCounts;
}

export interface ScanOptions {
  /** Volume to inspect; defaults to the scan root */
  mountPath?: string;
  /** Defaults to twice the available parallelism */
  workerCount?: number;
  /** Stops dispatch of new files; files in flight still complete */
  signal?: AbortSignal;
}

export interface ScanSummary {
  /** Every file the walk discovered, readable or not */
  totalFiles: number;
  /** Files handed to the analysis pool */
  filesProcessed: number;
  /** Processed files with an audio extension, supported or not */
  audioFiles: number;
  directories: number;
  rootFolders: number;
  /** Audio files per lowercase extension */
  byExtension: Record<string, number>;
  byCategory: CategoryCounts;
  bySeverity: SeverityCounts;
}

export interface ScanReport {
  root: string;
  mountPath: string;
  volume: VolumeProfile;
  /** Every record, in report order */
  issues: IssueRecord[];
  summary: ScanSummary;
  workerCount: number;
  cancelled: boolean;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
}

export interface ScanCoordinatorOptions {
  limits?: VerifierLimits;
  inspector?: VolumeInspector;
  walker?: TreeWalker;
  probe?: AudioProbe;
  logger?: Logger;
}

export function defaultWorkerCount(): number {
  return 2 * availableParallelism();
}

export function hasErrors(report: ScanReport): boolean {
  return report.summary.bySeverity.error > 0;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ScanCoordinator extends EventEmitter {
  private readonly limits: VerifierLimits;
  private readonly inspector: VolumeInspector;
  private readonly walker: TreeWalker;
  private readonly probe: AudioProbe;
  private readonly logger: Logger;

  constructor(options: ScanCoordinatorOptions = {}) {
    super();
    this.limits = options.limits ?? DEFAULT_LIMITS;
    this.logger = options.logger ?? createLogger({ component: 'scan-coordinator' });
    this.inspector = options.inspector ?? new VolumeInspector({ logger: this.logger });
    this.walker = options.walker ?? new TreeWalker({ limits: this.limits, logger: this.logger });
    this.probe = options.probe ?? new AudioProbe({ vbrSampleCount: this.limits.vbrSampleCount, logger: this.logger });
  }

  /**
   * Verify the drive mounted at `root`. Rejects only with RootUnreadableError;
   * every other failure becomes a record in the report.
   */
  async scan(root: string, options: ScanOptions = {}): Promise<ScanReport> {
    const startedAt = new Date();
    const mountPath = options.mountPath ?? root;
    const workerCount = Math.max(1, Math.floor(options.workerCount ?? defaultWorkerCount()));
    const collector = new IssueCollector();

    await this.checkRoot(root);
    this.logger.info({ root, mountPath, workerCount }, 'Starting drive scan');

    // Sequential phase
    this.emit('phase', 'volume');
    const volume = await this.inspector.inspect(mountPath);
    collector.submitAll(volume.issues);
    collector.submitAll(evaluateVolume(volume.profile, this.limits));

    this.emit('phase', 'walk');
    const tree = await this.walker.walk(root);
    collector.submitAll(tree.issues);
    this.logger.debug({ files: tree.files.length, ...tree.stats }, 'Tree walk finished');

    // Parallel phase
    this.emit('phase', 'analyze');
    const extensions = new Map<string, number>();
    const buffers: IssueBuffer[] = Array.from({ length: workerCount }, () => collector.createBuffer());
    let processed = 0;

    const outcome = await runPool(
      tree.files,
      async (file, _index, workerId) => {
        const buffer = buffers[workerId] ?? collector.createBuffer();
        buffer.submitAll(await this.analyzeFile(file, extensions));
        processed++;
        this.emit('progress', {
          processed,
          total: tree.files.length,
          counts: collector.counts(),
        } satisfies ScanProgress);
      },
      { concurrency: workerCount, signal: options.signal }
    );

    if (outcome.cancelled) {
      this.logger.warn(
        { attempted: outcome.attempted, total: tree.files.length },
        'Scan cancelled before every file was analysed'
      );
    }

    this.emit('phase', 'finalize');
    const issues = collector.finalize();
    const completedAt = new Date();

    const report: ScanReport = {
      root,
      mountPath,
      volume: volume.profile,
      issues,
      summary: {
        totalFiles: tree.stats.totalFiles,
        filesProcessed: outcome.attempted,
        audioFiles: [...extensions.values()].reduce((total, count) => total + count, 0),
        directories: tree.stats.directories,
        rootFolders: tree.stats.rootFolders,
        byExtension: Object.fromEntries([...extensions.entries()].sort(([a], [b]) => (a < b ? -1 : 1))),
        byCategory: collector.counts(),
        bySeverity: collector.severities(),
      },
      workerCount,
      cancelled: outcome.cancelled,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };

    this.logger.info(
      {
        root,
        files: report.summary.filesProcessed,
        errors: report.summary.bySeverity.error,
        warnings: report.summary.bySeverity.warning,
        durationMs: report.durationMs,
        cancelled: report.cancelled,
      },
      'Drive scan complete'
    );

    return report;
  }

  /**
   * Records for one file. Never rejects: an unexpected failure becomes a
   * ReadError record for the file.
   */
  private async analyzeFile(file: FileNode, extensions: Map<string, number>): Promise<IssueRecord[]> {
    try {
      const probe = await this.probe.analyze(file.path);
      if (probe.support !== 'not-audio') {
        extensions.set(probe.extension, (extensions.get(probe.extension) ?? 0) + 1);
      }
      return evaluateAudio(file.relativePath, probe, this.limits);
    } catch (error) {
      this.logger.warn({ path: file.relativePath, error: errorMessage(error) }, 'File analysis failed');
      return [createIssue(file.relativePath, 'ReadError', 'error', `Analysis failed: ${errorMessage(error)}`)];
    }
  }

  private async checkRoot(root: string): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(root)).isDirectory();
    } catch (error) {
      throw new RootUnreadableError(root, describeFsError(error));
    }
    if (!isDirectory) {
      throw new RootUnreadableError(root, 'not a directory');
    }
  }
}
