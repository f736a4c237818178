/**
 * Volume Types
 */

export type FilesystemKind = 'FAT32' | 'NTFS' | 'exFAT' | 'Other' | 'Unknown';

export type PartitionScheme = 'MBR' | 'GPT' | 'Unknown';

/**
 * Filesystem facts for the scanned mount point, created once per scan
 */
export interface VolumeProfile {
  readonly filesystem: FilesystemKind;
  readonly partitionScheme: PartitionScheme;
  readonly clusterSizeBytes?: number;

  /** Filesystem name as the platform reported it, e.g. "vfat" or "MS-DOS FAT32" */
  readonly rawFilesystem?: string;

  /** Backend that produced the profile */
  readonly source: string;
}
