/**
 * Native Backend
 *
 * `fs.statfs` on the mount point. Knows the filesystem from its magic number
 * and the block size; it cannot see the partition table.
 */

import { statfs } from 'node:fs/promises';
import { VolumeIntrospectionError } from '@drive-verify/core';
import type { VolumeBackend, VolumeFacts } from '../types.js';

const FILESYSTEM_MAGIC: ReadonlyMap<number, string> = new Map([
  [0x4d44, 'msdos'],
  [0x5346544e, 'ntfs'],
  [0x2011bab0, 'exfat'],
  [0xef53, 'ext4'],
  [0x9123683e, 'btrfs'],
  [0x58465342, 'xfs'],
  [0x01021994, 'tmpfs'],
  [0x794c7630, 'overlay'],
]);

export function filesystemFromMagic(type: number): string | undefined {
  return FILESYSTEM_MAGIC.get(type);
}

export type StatFsFunction = (path: string) => Promise<{ type: number; bsize: number }>;

export class NativeBackend implements VolumeBackend {
  readonly name = 'statfs';
  private readonly statFs: StatFsFunction;

  constructor(statFs: StatFsFunction = (path) => statfs(path)) {
    this.statFs = statFs;
  }

  async describe(mountPath: string): Promise<VolumeFacts> {
    const stats = await this.statFs(mountPath);
    const filesystem = filesystemFromMagic(stats.type);
    if (!filesystem && stats.bsize <= 0) {
      throw new VolumeIntrospectionError(mountPath, `unrecognized statfs result (type 0x${stats.type.toString(16)})`);
    }
    return {
      filesystem,
      clusterSizeBytes: stats.bsize > 0 ? stats.bsize : undefined,
    };
  }
}
