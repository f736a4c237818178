/**
 * macOS Backend
 *
 * `diskutil info` on the mount point for the filesystem and block size, then
 * on the whole disk for the partition map.
 */

import { VolumeIntrospectionError } from '@drive-verify/core';
import { createLogger, describeFsError, executeCommand, type CommandRunner, type Logger } from '@drive-verify/utils';
import type { VolumeBackend, VolumeFacts } from '../types.js';
import { parseByteCount } from '../normalize.js';
import { parseColonLines, runTool } from './tool.js';

export class DarwinBackend implements VolumeBackend {
  readonly name = 'diskutil';
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(runner: CommandRunner = executeCommand, logger?: Logger) {
    this.runner = runner;
    this.logger = logger ?? createLogger({ component: 'volume', backend: 'diskutil' });
  }

  async describe(mountPath: string): Promise<VolumeFacts> {
    const info = parseColonLines(await runTool(this.runner, 'diskutil', ['info', mountPath]));

    const filesystem = info.get('File System Personality') ?? info.get('Type (Bundle)');
    if (!filesystem && !info.has('Device Identifier')) {
      throw new VolumeIntrospectionError(mountPath, 'diskutil output has no volume fields');
    }

    const facts: VolumeFacts = {
      filesystem,
      clusterSizeBytes: parseByteCount(info.get('Allocation Block Size')),
    };

    const wholeDisk = info.get('Part of Whole');
    if (wholeDisk) {
      try {
        const disk = parseColonLines(await runTool(this.runner, 'diskutil', ['info', wholeDisk]));
        facts.partitionScheme = disk.get('Content (IOContent)');
      } catch (error) {
        this.logger.debug({ wholeDisk, error: describeFsError(error) }, 'diskutil info on the whole disk failed');
      }
    }

    return facts;
  }
}
