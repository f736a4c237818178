/**
 * Volume Inspector
 *
 * Asks the platform about the mount point and normalizes the answer into a
 * VolumeProfile. Never fails: backends are tried in order, each filling the
 * fields the previous ones left open, and whatever is still missing becomes
 * Unknown with an Info record.
 */

import {
  ROOT_PATH,
  createIssue,
  type IssueCategory,
  type IssueRecord,
  type VolumeProfile,
} from '@drive-verify/core';
import { createLogger, describeFsError, executeCommand, type CommandRunner, type Logger } from '@drive-verify/utils';
import { DarwinBackend } from './backends/darwin.js';
import { LinuxBackend } from './backends/linux.js';
import { NativeBackend } from './backends/native.js';
import { WindowsBackend } from './backends/windows.js';
import { normalizeFilesystem, normalizePartitionScheme } from './normalize.js';
import type { VolumeBackend, VolumeFacts } from './types.js';

export interface VolumeInspection {
  profile: VolumeProfile;
  /** Info records for fields that could not be determined */
  issues: IssueRecord[];
}

export interface VolumeInspectorOptions {
  /** Overrides platform selection */
  backends?: VolumeBackend[];
  platform?: NodeJS.Platform;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Backends for a platform, subprocess first, native API as fallback
 */
export function defaultBackends(
  platform: NodeJS.Platform,
  runner: CommandRunner = executeCommand,
  logger?: Logger
): VolumeBackend[] {
  switch (platform) {
    case 'linux':
      return [new LinuxBackend(runner, logger), new NativeBackend()];
    case 'darwin':
      return [new DarwinBackend(runner, logger), new NativeBackend()];
    case 'win32':
      return [new WindowsBackend(runner)];
    default:
      return [new NativeBackend()];
  }
}

function isComplete(facts: VolumeFacts): boolean {
  return (
    facts.filesystem !== undefined &&
    facts.partitionScheme !== undefined &&
    facts.clusterSizeBytes !== undefined
  );
}

function fillMissing(target: VolumeFacts, facts: VolumeFacts): boolean {
  let filled = false;
  if (target.filesystem === undefined && facts.filesystem !== undefined) {
    target.filesystem = facts.filesystem;
    target.filesystemVersion = facts.filesystemVersion;
    filled = true;
  }
  if (target.partitionScheme === undefined && facts.partitionScheme !== undefined) {
    target.partitionScheme = facts.partitionScheme;
    filled = true;
  }
  if (target.clusterSizeBytes === undefined && facts.clusterSizeBytes !== undefined) {
    target.clusterSizeBytes = facts.clusterSizeBytes;
    filled = true;
  }
  return filled;
}

export class VolumeInspector {
  private readonly backends: VolumeBackend[];
  private readonly logger: Logger;

  constructor(options: VolumeInspectorOptions = {}) {
    this.logger = options.logger ?? createLogger({ component: 'volume' });
    this.backends =
      options.backends ?? defaultBackends(options.platform ?? process.platform, options.runner, this.logger);
  }

  async inspect(mountPath: string): Promise<VolumeInspection> {
    const facts: VolumeFacts = {};
    const sources: string[] = [];
    const failures: string[] = [];

    for (const backend of this.backends) {
      if (isComplete(facts)) break;
      try {
        if (fillMissing(facts, await backend.describe(mountPath))) {
          sources.push(backend.name);
        }
      } catch (error) {
        const reason = describeFsError(error);
        failures.push(`${backend.name}: ${reason}`);
        this.logger.debug({ mountPath, backend: backend.name, reason }, 'Volume backend failed');
      }
    }

    const profile: VolumeProfile = {
      filesystem: normalizeFilesystem(facts.filesystem, facts.filesystemVersion),
      partitionScheme: normalizePartitionScheme(facts.partitionScheme),
      clusterSizeBytes: facts.clusterSizeBytes,
      rawFilesystem: facts.filesystem,
      source: sources.length > 0 ? sources.join('+') : 'none',
    };

    const suffix = failures.length > 0 ? ` (${failures.join('; ')})` : '';
    const unknown = (category: IssueCategory, what: string): IssueRecord =>
      createIssue(ROOT_PATH, category, 'info', `${what} could not be determined${suffix}`);

    const issues: IssueRecord[] = [];
    if (profile.filesystem === 'Unknown') {
      issues.push(unknown('FilesystemType', 'Filesystem type'));
    }
    if (profile.partitionScheme === 'Unknown') {
      issues.push(unknown('PartitionScheme', 'Partition scheme'));
    }
    if (profile.clusterSizeBytes === undefined) {
      issues.push(unknown('ClusterSize', 'Cluster size'));
    }

    this.logger.debug({ mountPath, profile }, 'Volume inspected');
    return { profile, issues };
  }
}
