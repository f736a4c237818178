/**
 * Tree Walker
 *
 * Lists every regular file under the scan root in a stable order (entries
 * sorted by name, depth first) and derives the structural issues: totals,
 * per-folder counts, nesting depth, path and filename length, characters.
 *
 * Symbolic links are followed without cycle detection; FAT32 has none.
 */

import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import {
  DEFAULT_LIMITS,
  ROOT_PATH,
  RootUnreadableError,
  createIssue,
  type FileNode,
  type IssueRecord,
  type VerifierLimits,
} from '@drive-verify/core';
import {
  charLength,
  computeRelativePath,
  createLogger,
  describeFsError,
  type Logger,
} from '@drive-verify/utils';

export interface TreeWalkerOptions {
  limits?: VerifierLimits;
  logger?: Logger;
}

export interface TreeStats {
  /** Every file discovered, including those that could not be stat'ed */
  totalFiles: number;
  rootFolders: number;
  directories: number;
  maxDepth: number;
}

export interface TreeWalkResult {
  files: FileNode[];
  issues: IssueRecord[];
  stats: TreeStats;
}

interface WalkState {
  root: string;
  files: FileNode[];
  issues: IssueRecord[];
  stats: TreeStats;
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Characters outside ASCII letters, digits, space and `punctuation`, each
 * listed once in order of appearance
 */
export function findInvalidCharacters(filename: string, punctuation: string): string[] {
  const allowed = new Set(Array.from(punctuation));
  const invalid: string[] = [];
  for (const char of filename) {
    if (/^[A-Za-z0-9 ]$/.test(char) || allowed.has(char)) {
      continue;
    }
    if (!invalid.includes(char)) {
      invalid.push(char);
    }
  }
  return invalid;
}

function formatCharacter(char: string): string {
  const codePoint = char.codePointAt(0) ?? 0;
  if (codePoint < 0x20 || codePoint === 0x7f) {
    return `U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}`;
  }
  return `"${char}"`;
}

export class TreeWalker {
  private readonly limits: VerifierLimits;
  private readonly logger: Logger;

  constructor(options: TreeWalkerOptions = {}) {
    this.limits = options.limits ?? DEFAULT_LIMITS;
    this.logger = options.logger ?? createLogger({ component: 'tree-walker' });
  }

  /**
   * Walk the tree under `root`. Throws RootUnreadableError when the root
   * itself cannot be listed; everything below it fails softly.
   */
  async walk(root: string): Promise<TreeWalkResult> {
    let entries: Dirent[];
    try {
      entries = await readdir(root, { withFileTypes: true });
    } catch (error) {
      throw new RootUnreadableError(root, describeFsError(error));
    }

    const state: WalkState = {
      root,
      files: [],
      issues: [],
      stats: { totalFiles: 0, rootFolders: 0, directories: 0, maxDepth: 0 },
    };

    await this.visitEntries(state, root, entries, 0);
    this.checkTotals(state);

    this.logger.debug(
      { root, files: state.files.length, ...state.stats, issues: state.issues.length },
      'Tree walk complete'
    );
    return { files: state.files, issues: state.issues, stats: state.stats };
  }

  private async visitDirectory(state: WalkState, directory: string, depth: number): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      state.issues.push(
        createIssue(
          computeRelativePath(state.root, directory),
          'ReadError',
          'error',
          `Cannot read folder: ${describeFsError(error)}`
        )
      );
      return;
    }
    await this.visitEntries(state, directory, entries, depth);
  }

  /**
   * `depth` is the depth of files directly inside `directory`
   */
  private async visitEntries(state: WalkState, directory: string, entries: Dirent[], depth: number): Promise<void> {
    const subdirectories: string[] = [];
    let fileCount = 0;

    for (const entry of [...entries].sort(byName)) {
      const fullPath = join(directory, entry.name);
      let isDirectory = entry.isDirectory();
      let isFile = entry.isFile();

      if (entry.isSymbolicLink()) {
        try {
          const target = await stat(fullPath);
          isDirectory = target.isDirectory();
          isFile = target.isFile();
        } catch (error) {
          // Dangling link: report it like any file that cannot be stat'ed
          isFile = true;
          this.logger.debug({ path: fullPath, error: describeFsError(error) }, 'Unresolvable symbolic link');
        }
      }

      if (isDirectory) {
        subdirectories.push(fullPath);
      } else if (isFile) {
        fileCount++;
        await this.visitFile(state, fullPath, depth);
      }
    }

    state.stats.directories++;
    if (depth === 0) {
      state.stats.rootFolders = subdirectories.length;
    }

    if (fileCount > this.limits.maxFilesPerFolder) {
      state.issues.push(
        createIssue(
          computeRelativePath(state.root, directory),
          'FilesPerFolder',
          'error',
          `Folder contains ${fileCount} files (max ${this.limits.maxFilesPerFolder})`
        )
      );
    }

    for (const subdirectory of subdirectories) {
      await this.visitDirectory(state, subdirectory, depth + 1);
    }
  }

  private async visitFile(state: WalkState, fullPath: string, depth: number): Promise<void> {
    const relativePath = computeRelativePath(state.root, fullPath);
    state.stats.totalFiles++;

    let sizeBytes: number;
    try {
      sizeBytes = (await stat(fullPath)).size;
    } catch (error) {
      state.issues.push(
        createIssue(relativePath, 'ReadError', 'error', `Cannot read file: ${describeFsError(error)}`)
      );
      return;
    }

    state.files.push({ path: fullPath, relativePath, depth, sizeBytes });
    state.stats.maxDepth = Math.max(state.stats.maxDepth, depth);
    state.issues.push(...this.checkFile(relativePath, depth));
  }

  /**
   * Per-file structural checks
   */
  checkFile(relativePath: string, depth: number): IssueRecord[] {
    const issues: IssueRecord[] = [];
    const limits = this.limits;
    const filename = basename(relativePath);

    if (depth > limits.maxNestingDepth) {
      issues.push(
        createIssue(relativePath, 'NestingDepth', 'error', `Nested ${depth} folders deep (max ${limits.maxNestingDepth})`)
      );
    }

    const pathLength = charLength(relativePath);
    if (pathLength > limits.maxPathLength) {
      issues.push(
        createIssue(relativePath, 'PathLength', 'error', `Path is ${pathLength} characters (max ${limits.maxPathLength})`)
      );
    }

    const nameLength = charLength(filename);
    if (nameLength > limits.maxFilenameLength) {
      issues.push(
        createIssue(
          relativePath,
          'FilenameLength',
          'warning',
          `Filename is ${nameLength} characters (max ${limits.maxFilenameLength})`
        )
      );
    }

    const invalid = findInvalidCharacters(filename, limits.allowedFilenamePunctuation);
    if (invalid.length > 0) {
      issues.push(
        createIssue(
          relativePath,
          'InvalidCharacters',
          'warning',
          `Filename contains unsupported characters: ${invalid.map(formatCharacter).join(' ')}`
        )
      );
    }

    return issues;
  }

  private checkTotals(state: WalkState): void {
    const { totalFiles, rootFolders } = state.stats;

    if (totalFiles > this.limits.maxTotalFiles) {
      state.issues.push(
        createIssue(
          ROOT_PATH,
          'TotalFileCount',
          'error',
          `Drive contains ${totalFiles} files (max ${this.limits.maxTotalFiles})`
        )
      );
    }

    if (rootFolders > this.limits.maxRootFolders) {
      state.issues.push(
        createIssue(
          ROOT_PATH,
          'RootFolderCount',
          'error',
          `Root contains ${rootFolders} folders (max ${this.limits.maxRootFolders})`
        )
      );
    }
  }
}
