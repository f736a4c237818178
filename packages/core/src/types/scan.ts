/**
 * Scan Types
 */

/**
 * One regular file discovered under the scan root
 */
export interface FileNode {
  /** Absolute path */
  readonly path: string;
  /** Path relative to the scan root, native separator */
  readonly relativePath: string;
  /** Number of directories between the root and the file; root-level files are 0 */
  readonly depth: number;
  readonly sizeBytes: number;
}
