/**
 * Volume Rules
 */

import { ROOT_PATH, createIssue, type IssueRecord, type VerifierLimits, type VolumeProfile } from '@drive-verify/core';

function describeFilesystem(profile: VolumeProfile): string {
  const raw = profile.rawFilesystem?.trim();
  return raw && raw.toLowerCase() !== profile.filesystem.toLowerCase()
    ? `${profile.filesystem} (${raw})`
    : profile.filesystem;
}

/**
 * Issues derived from the volume profile. Unknown fields produce nothing here;
 * the inspector has already reported them.
 */
export function evaluateVolume(profile: VolumeProfile, limits: VerifierLimits): IssueRecord[] {
  const issues: IssueRecord[] = [];

  if (profile.filesystem !== 'FAT32' && profile.filesystem !== 'Unknown') {
    issues.push(
      createIssue(ROOT_PATH, 'FilesystemType', 'error', `Filesystem is ${describeFilesystem(profile)}, must be FAT32`)
    );
  }

  if (profile.partitionScheme === 'GPT') {
    issues.push(createIssue(ROOT_PATH, 'PartitionScheme', 'warning', 'Partition scheme is GPT, MBR recommended'));
  }

  const cluster = profile.clusterSizeBytes;
  if (cluster !== undefined && cluster !== limits.recommendedClusterSize) {
    issues.push(
      createIssue(
        ROOT_PATH,
        'ClusterSize',
        'info',
        `Cluster size is ${cluster} bytes, ${limits.recommendedClusterSize} (${limits.recommendedClusterSize / 1024} KB) recommended`
      )
    );
  }

  return issues;
}
