/**
 * Path Utilities
 */

import { extname, relative } from 'node:path';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Path of `entryPath` relative to `rootPath`; the root itself is "."
 */
export function computeRelativePath(rootPath: string, entryPath: string): string {
  const rel = relative(rootPath, entryPath);
  return rel === '' ? '.' : rel;
}

/**
 * Number of characters (code points, not UTF-16 units)
 */
export function charLength(value: string): number {
  return Array.from(value).length;
}
