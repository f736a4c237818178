/**
 * Normalization of platform strings into profile enums.
 * Anything not recognized maps to Unknown (or Other for a filesystem that
 * was named but is not one of ours); nothing is assumed.
 */

import type { FilesystemKind, PartitionScheme } from '@drive-verify/core';

const FAT_VARIANT = /fat\s*_?(12|16|32)/i;

export function normalizeFilesystem(raw: string | undefined, version?: string): FilesystemKind {
  const name = raw?.trim().toLowerCase();
  if (!name) {
    return 'Unknown';
  }

  if (name.includes('exfat')) {
    return 'exFAT';
  }
  if (name.includes('ntfs')) {
    return 'NTFS';
  }

  const variant = FAT_VARIANT.exec(version ?? '') ?? FAT_VARIANT.exec(name);
  if (variant) {
    return variant[1] === '32' ? 'FAT32' : 'Other';
  }
  // vfat and msdos without a variant: Linux mounts FAT32 media as vfat
  if (name === 'vfat' || name === 'msdos' || name === 'ms-dos') {
    return 'FAT32';
  }
  return 'Other';
}

export function normalizePartitionScheme(raw: string | undefined): PartitionScheme {
  const value = raw?.trim().toLowerCase();
  if (!value) {
    return 'Unknown';
  }
  if (value === 'dos' || value === 'mbr' || value.includes('fdisk')) {
    return 'MBR';
  }
  if (value === 'gpt' || value.includes('guid')) {
    return 'GPT';
  }
  return 'Unknown';
}

/**
 * Parse "32768", "32768 Bytes" or "32768 Bytes (exactly ...)" into bytes
 */
export function parseByteCount(raw: string | undefined): number | undefined {
  const match = /^\s*(\d+)\b/.exec(raw ?? '');
  if (!match?.[1]) {
    return undefined;
  }
  const value = Number.parseInt(match[1], 10);
  return value > 0 ? value : undefined;
}
