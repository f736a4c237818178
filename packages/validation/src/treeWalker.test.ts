import { mkdir, mkdtemp, rm, symlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { RootUnreadableError, createIssue, resolveLimits } from '@drive-verify/core';
import { writeFixture } from '@drive-verify/media/testing';
import { TreeWalker, findInvalidCharacters } from './treeWalker.js';

describe('TreeWalker', () => {
  let root: string;
  const walker = new TreeWalker();

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), 'tree-walker-test-'));
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function tree(name: string, files: string[]): Promise<string> {
    const base = join(root, name);
    await mkdir(base, { recursive: true });
    for (const file of files) {
      await writeFixture(base, file, 'x');
    }
    return base;
  }

  it('lists files depth first in name order', async () => {
    const base = await tree('order', ['b.mp3', 'a.mp3', 'sub/c.mp3', 'sub/inner/d.mp3', 'z/e.mp3']);

    const result = await walker.walk(base);

    expect(result.files.map((file) => [file.relativePath, file.depth])).toEqual([
      ['a.mp3', 0],
      ['b.mp3', 0],
      [join('sub', 'c.mp3'), 1],
      [join('sub', 'inner', 'd.mp3'), 2],
      [join('z', 'e.mp3'), 1],
    ]);
    expect(result.files[0]).toEqual({ path: join(base, 'a.mp3'), relativePath: 'a.mp3', depth: 0, sizeBytes: 1 });
    expect(result.stats).toEqual({ totalFiles: 5, rootFolders: 2, directories: 4, maxDepth: 2 });
    expect(result.issues).toEqual([]);
  });

  it('reports paths longer than 60 characters with their length', async () => {
    const fits = `${'a'.repeat(56)}.mp3`;
    const tooLong = `${'b'.repeat(57)}.mp3`;
    const base = await tree('path-length', [fits, tooLong]);

    const { issues } = await walker.walk(base);

    expect(issues).toEqual([createIssue(tooLong, 'PathLength', 'error', 'Path is 61 characters (max 60)')]);
  });

  it('reports folders with more than 254 files', async () => {
    const names = (dir: string, count: number) =>
      Array.from({ length: count }, (_, i) => `${dir}/f${String(i).padStart(3, '0')}.txt`);
    const base = await tree('per-folder', [...names('fits', 254), ...names('full', 255)]);

    const { issues, stats } = await walker.walk(base);

    expect(stats.totalFiles).toBe(509);
    expect(issues).toEqual([createIssue('full', 'FilesPerFolder', 'error', 'Folder contains 255 files (max 254)')]);
  });

  it('reports the root folder as "."', async () => {
    const base = await tree('root-folder', ['1.mp3', '2.mp3', '3.mp3']);

    const { issues } = await new TreeWalker({ limits: resolveLimits({ maxFilesPerFolder: 2 }) }).walk(base);

    expect(issues).toEqual([createIssue('.', 'FilesPerFolder', 'error', 'Folder contains 3 files (max 2)')]);
  });

  it('reports files nested more than 8 folders deep', async () => {
    const base = await tree('nesting', ['d/1/2/3/4/5/6/7/ok.mp3', 'd/1/2/3/4/5/6/7/8/x.mp3']);

    const { issues, stats } = await walker.walk(base);

    expect(stats.maxDepth).toBe(9);
    expect(issues).toEqual([
      createIssue(join('d', '1', '2', '3', '4', '5', '6', '7', '8', 'x.mp3'), 'NestingDepth', 'error', 'Nested 9 folders deep (max 8)'),
    ]);
  });

  it('reports one record per file with invalid characters', async () => {
    const base = await tree('characters', ['Café.mp3', 'Ça va?.mp3', "ok-name_(1) & more's.mp3"]);

    const { issues } = await walker.walk(base);

    expect(issues).toEqual([
      createIssue('Café.mp3', 'InvalidCharacters', 'warning', 'Filename contains unsupported characters: "é"'),
      createIssue('Ça va?.mp3', 'InvalidCharacters', 'warning', 'Filename contains unsupported characters: "Ç" "?"'),
    ]);
  });

  it('warns about filenames longer than 64 characters', async () => {
    const name = `${'c'.repeat(61)}.mp3`;
    const base = await tree('filename-length', [name]);

    const { issues } = await walker.walk(base);

    expect(issues).toEqual([
      createIssue(name, 'PathLength', 'error', 'Path is 65 characters (max 60)'),
      createIssue(name, 'FilenameLength', 'warning', 'Filename is 65 characters (max 64)'),
    ]);
  });

  it('reports drive-wide totals', async () => {
    const base = await tree('totals', ['x/1.mp3', 'y/2.mp3', '3.mp3']);
    const limits = resolveLimits({ maxTotalFiles: 2, maxRootFolders: 1 });

    const { issues } = await new TreeWalker({ limits }).walk(base);

    expect(issues).toEqual([
      createIssue('.', 'TotalFileCount', 'error', 'Drive contains 3 files (max 2)'),
      createIssue('.', 'RootFolderCount', 'error', 'Root contains 2 folders (max 1)'),
    ]);
  });

  it('counts files that cannot be stat\'ed but leaves them out of the list', async () => {
    const base = await tree('dangling', []);
    await symlink(join(base, 'nowhere.mp3'), join(base, 'ghost.mp3'));

    const result = await walker.walk(base);

    expect(result.files).toEqual([]);
    expect(result.stats.totalFiles).toBe(1);
    expect(result.issues).toEqual([
      createIssue('ghost.mp3', 'ReadError', 'error', 'Cannot read file: ENOENT: no such file or directory'),
    ]);
  });

  it('follows symbolic links to folders', async () => {
    const base = await tree('linked', ['real/song.mp3']);
    await symlink(join(base, 'real'), join(base, 'alias'));

    const { files } = await walker.walk(base);

    expect(files.map((file) => file.relativePath)).toEqual([join('alias', 'song.mp3'), join('real', 'song.mp3')]);
  });

  it('fails when the root cannot be listed', async () => {
    await expect(walker.walk(join(root, 'missing'))).rejects.toBeInstanceOf(RootUnreadableError);
  });
});

describe('findInvalidCharacters', () => {
  it('allows ASCII letters, digits, space and the configured punctuation', () => {
    expect(findInvalidCharacters('Track 01 - Intro (Live).mp3', "-_.,'()[]&!+#")).toEqual([]);
  });

  it('lists each offending character once', () => {
    expect(findInvalidCharacters('naïve naïve*.mp3', '.')).toEqual(['ï', '*']);
  });
});
