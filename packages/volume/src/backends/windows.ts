/**
 * Windows Backend
 *
 * One PowerShell call: Get-Volume for the filesystem and allocation unit,
 * Get-Partition | Get-Disk for the partition style, printed as JSON.
 */

import { win32 } from 'node:path';
import { z } from 'zod';
import { VolumeIntrospectionError } from '@drive-verify/core';
import { executeCommand, type CommandRunner } from '@drive-verify/utils';
import type { VolumeBackend, VolumeFacts } from '../types.js';
import { runTool } from './tool.js';

const volumeInfoSchema = z.object({
  FileSystem: z.string().nullish(),
  AllocationUnitSize: z.number().int().nonnegative().nullish(),
  PartitionStyle: z.string().nullish(),
});

export type WindowsVolumeInfo = z.infer<typeof volumeInfoSchema>;

export function driveLetterOf(mountPath: string): string | undefined {
  const match = /^([a-z]):/i.exec(win32.parse(win32.resolve(mountPath)).root);
  return match?.[1]?.toUpperCase();
}

export function buildVolumeScript(letter: string): string {
  return [
    `$v = Get-Volume -DriveLetter ${letter}`,
    `$d = Get-Partition -DriveLetter ${letter} | Get-Disk`,
    '[pscustomobject]@{ FileSystem = $v.FileSystem; AllocationUnitSize = $v.AllocationUnitSize; PartitionStyle = [string]$d.PartitionStyle } | ConvertTo-Json -Compress',
  ].join('; ');
}

export class WindowsBackend implements VolumeBackend {
  readonly name = 'powershell';
  private readonly runner: CommandRunner;

  constructor(runner: CommandRunner = executeCommand) {
    this.runner = runner;
  }

  async describe(mountPath: string): Promise<VolumeFacts> {
    const letter = driveLetterOf(mountPath);
    if (!letter) {
      throw new VolumeIntrospectionError(mountPath, 'no drive letter');
    }

    const stdout = await runTool(this.runner, 'powershell.exe', [
      '-NoProfile',
      '-NonInteractive',
      '-Command',
      buildVolumeScript(letter),
    ]);

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch {
      throw new VolumeIntrospectionError(mountPath, `unparseable PowerShell output: ${stdout.substring(0, 200)}`);
    }

    const parsed = volumeInfoSchema.safeParse(json);
    if (!parsed.success) {
      throw new VolumeIntrospectionError(mountPath, `unexpected PowerShell output: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const info = parsed.data;
    return {
      filesystem: info.FileSystem ?? undefined,
      partitionScheme: info.PartitionStyle ?? undefined,
      clusterSizeBytes: info.AllocationUnitSize ? info.AllocationUnitSize : undefined,
    };
  }
}
