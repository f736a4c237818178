/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { mkdir, writeFile, readFile, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf8');
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Read up to `length` bytes at `position`.
 * The returned buffer is shorter than requested when the file ends first.
 */
export async function readRange(
  handle: FileHandle,
  position: number,
  length: number
): Promise<Buffer> {
  if (length <= 0 || position < 0) {
    return Buffer.alloc(0);
  }
  const buffer = Buffer.alloc(length);
  const { bytesRead } = await handle.read(buffer, 0, length, position);
  return bytesRead === length ? buffer : buffer.subarray(0, bytesRead);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Short description of a filesystem error, e.g. "EACCES: permission denied"
 */
export function describeFsError(error: unknown): string {
  if (isErrnoException(error) && error.code) {
    const detail = error.message.replace(/^[A-Z]+:\s*/, '').split(',')[0] ?? error.message;
    return `${error.code}: ${detail}`;
  }
  return error instanceof Error ? error.message : String(error);
}
