/**
 * Linux Backend
 *
 * findmnt for the filesystem and its block device, lsblk for the FAT
 * variant and the partition table, `stat -f` for the block size.
 */

import { VolumeIntrospectionError } from '@drive-verify/core';
import { createLogger, describeFsError, executeCommand, type CommandRunner, type Logger } from '@drive-verify/utils';
import type { VolumeBackend, VolumeFacts } from '../types.js';
import { parseByteCount } from '../normalize.js';
import { runTool } from './tool.js';

/**
 * Parse `lsblk -P` output: KEY="value" pairs on one line
 */
export function parseLsblkPairs(output: string): Record<string, string> {
  const pairs: Record<string, string> = {};
  const firstLine = output.split(/\r?\n/).find((line) => line.trim() !== '') ?? '';
  for (const match of firstLine.matchAll(/([A-Z:-]+)="([^"]*)"/g)) {
    const [, key, value] = match;
    if (key && value !== undefined) {
      pairs[key] = value;
    }
  }
  return pairs;
}

export class LinuxBackend implements VolumeBackend {
  readonly name = 'findmnt';
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(runner: CommandRunner = executeCommand, logger?: Logger) {
    this.runner = runner;
    this.logger = logger ?? createLogger({ component: 'volume', backend: 'findmnt' });
  }

  async describe(mountPath: string): Promise<VolumeFacts> {
    const mount = await runTool(this.runner, 'findmnt', ['-n', '-o', 'FSTYPE,SOURCE', '--target', mountPath]);
    const [filesystem, source] = mount.trim().split(/\s+/);
    if (!filesystem) {
      throw new VolumeIntrospectionError(mountPath, 'findmnt reported no mount');
    }

    const facts: VolumeFacts = { filesystem };

    if (source?.startsWith('/dev/')) {
      try {
        const device = parseLsblkPairs(
          await runTool(this.runner, 'lsblk', ['-n', '-P', '-o', 'FSTYPE,FSVER,PTTYPE', source])
        );
        facts.filesystemVersion = device['FSVER'] || undefined;
        facts.partitionScheme = device['PTTYPE'] || undefined;
      } catch (error) {
        this.logger.debug({ source, error: describeFsError(error) }, 'lsblk failed');
      }
    }

    try {
      facts.clusterSizeBytes = parseByteCount(await runTool(this.runner, 'stat', ['-f', '-c', '%S', mountPath]));
    } catch (error) {
      this.logger.debug({ mountPath, error: describeFsError(error) }, 'stat -f failed');
    }

    return facts;
  }
}
