/**
 * ASF (WMA) Probe
 *
 * Reads the ASF header object: the audio stream's WAVEFORMATEX (sample rate,
 * average bitrate) and whether any content-encryption object is present.
 */

import type { ByteSource } from './byteSource.js';
import { parsed, parseFailure, type ParseResult } from '../types.js';

export interface AsfInfo {
  formatTag?: number;
  channels?: number;
  sampleRateHz?: number;
  bitrateKbps?: number;
  drmDetected: boolean;
}

/**
 * GUID as it is laid out on disk: the first three groups little-endian,
 * the last two as written.
 */
export function guidBytes(guid: string): Buffer {
  if (!/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(guid)) {
    throw new Error(`invalid GUID ${guid}`);
  }
  const [a = '', b = '', c = '', d = '', e = ''] = guid.split('-');
  const swap = (hex: string) => Buffer.from(hex, 'hex').reverse();
  return Buffer.concat([swap(a), swap(b), swap(c), Buffer.from(d + e, 'hex')]);
}

export const ASF_HEADER_OBJECT = guidBytes('75B22630-668E-11CF-A6D9-00AA0062CE6C');
export const ASF_STREAM_PROPERTIES = guidBytes('B7DC0791-A9B7-11CF-8EE6-00C00C205365');
export const ASF_AUDIO_MEDIA = guidBytes('F8699E40-5B4D-11CF-A8FD-00805F5C442B');
export const ASF_CONTENT_ENCRYPTION = guidBytes('2211B3FB-BD23-11D2-B4B7-00A0C955FC6E');
export const ASF_EXTENDED_CONTENT_ENCRYPTION = guidBytes('298AE614-2622-4C17-B935-DAE07EE9289C');

const OBJECT_HEADER_LENGTH = 24;
const HEADER_OBJECT_LENGTH = 30;
const MAX_HEADER_BYTES = 16 * 1024 * 1024;

// Offsets inside a Stream Properties object
const STREAM_TYPE_OFFSET = 24;
const TYPE_DATA_LENGTH_OFFSET = 64;
const FLAGS_OFFSET = 72;
const TYPE_DATA_OFFSET = 78;
const WAVEFORMATEX_LENGTH = 16;
const ENCRYPTED_STREAM_FLAG = 0x8000;

interface AsfObject {
  guid: Buffer;
  offset: number;
  size: number;
}

function listHeaderObjects(header: Buffer, count: number): ParseResult<AsfObject[]> {
  const objects: AsfObject[] = [];
  let cursor = HEADER_OBJECT_LENGTH;
  for (let i = 0; i < count; i++) {
    if (cursor + OBJECT_HEADER_LENGTH > header.length) {
      return parseFailure(`truncated ASF header object ${i + 1} of ${count}`);
    }
    const size = Number(header.readBigUInt64LE(cursor + 16));
    if (size < OBJECT_HEADER_LENGTH || cursor + size > header.length) {
      return parseFailure(`ASF header object ${i + 1} declares ${size} bytes`);
    }
    objects.push({ guid: header.subarray(cursor, cursor + 16), offset: cursor, size });
    cursor += size;
  }
  return parsed(objects);
}

export async function probeAsf(source: ByteSource): Promise<ParseResult<AsfInfo>> {
  const head = await source.read(0, HEADER_OBJECT_LENGTH);
  if (head.length < HEADER_OBJECT_LENGTH || !head.subarray(0, 16).equals(ASF_HEADER_OBJECT)) {
    return parseFailure('no ASF header object');
  }

  const headerSize = Number(head.readBigUInt64LE(16));
  if (headerSize < HEADER_OBJECT_LENGTH || headerSize > source.size) {
    return parseFailure(`ASF header declares ${headerSize} bytes but the file has ${source.size}`);
  }
  if (headerSize > MAX_HEADER_BYTES) {
    return parseFailure(`ASF header of ${headerSize} bytes is too large to inspect`);
  }

  const header = await source.read(0, headerSize);
  const objects = listHeaderObjects(header, head.readUInt32LE(24));
  if (!objects.ok) {
    return objects;
  }

  const info: AsfInfo = { drmDetected: false };
  for (const object of objects.value) {
    if (object.guid.equals(ASF_CONTENT_ENCRYPTION) || object.guid.equals(ASF_EXTENDED_CONTENT_ENCRYPTION)) {
      info.drmDetected = true;
      continue;
    }
    if (!object.guid.equals(ASF_STREAM_PROPERTIES) || object.size < TYPE_DATA_OFFSET) {
      continue;
    }

    const at = object.offset;
    const streamType = header.subarray(at + STREAM_TYPE_OFFSET, at + STREAM_TYPE_OFFSET + 16);
    if (!streamType.equals(ASF_AUDIO_MEDIA) || info.sampleRateHz !== undefined) {
      continue;
    }
    if (header.readUInt16LE(at + FLAGS_OFFSET) & ENCRYPTED_STREAM_FLAG) {
      info.drmDetected = true;
    }

    const typeDataLength = header.readUInt32LE(at + TYPE_DATA_LENGTH_OFFSET);
    if (typeDataLength < WAVEFORMATEX_LENGTH || TYPE_DATA_OFFSET + WAVEFORMATEX_LENGTH > object.size) {
      return parseFailure('audio stream properties carry no WAVEFORMATEX');
    }
    const format = at + TYPE_DATA_OFFSET;
    info.formatTag = header.readUInt16LE(format);
    info.channels = header.readUInt16LE(format + 2);
    info.sampleRateHz = header.readUInt32LE(format + 4);
    info.bitrateKbps = Math.round((header.readUInt32LE(format + 8) * 8) / 1000);
  }

  if (info.sampleRateHz === undefined && !info.drmDetected) {
    return parseFailure('no audio stream in ASF header');
  }
  return parsed(info);
}
