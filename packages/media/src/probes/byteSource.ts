/**
 * Byte Source
 * 
 * Random access to the bytes of one file. Probes only ever read through this
 * interface, so they can be exercised against in-memory buffers.
 */

import type { FileHandle } from 'node:fs/promises';
import { readRange } from '@drive-verify/utils';

export interface ByteSource {
  readonly size: number;
  /** Resolves with fewer bytes than requested at end of file */
  read(position: number, length: number): Promise<Buffer>;
}

export function fileSource(handle: FileHandle, size: number): ByteSource {
  return {
    size,
    read: (position, length) => readRange(handle, position, Math.min(length, size - position)),
  };
}

export function bufferSource(buffer: Buffer): ByteSource {
  return {
    size: buffer.length,
    read: async (position, length) => buffer.subarray(position, Math.min(buffer.length, position + length)),
  };
}
