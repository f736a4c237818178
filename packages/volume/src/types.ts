/**
 * Volume Backend Types
 */

/**
 * What one platform facility reported, before normalization.
 * Fields the facility did not report are left out.
 */
export interface VolumeFacts {
  /** e.g. "vfat", "MS-DOS FAT32", "FAT32", "ntfs3" */
  filesystem?: string;
  /** FAT variant when the filesystem name alone is ambiguous, e.g. "FAT16" */
  filesystemVersion?: string;
  /** e.g. "dos", "gpt", "FDisk_partition_scheme", "MBR" */
  partitionScheme?: string;
  clusterSizeBytes?: number;
}

/**
 * A way of asking the platform about a mount point
 */
export interface VolumeBackend {
  readonly name: string;
  describe(mountPath: string): Promise<VolumeFacts>;
}
