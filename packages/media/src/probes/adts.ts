/**
 * ADTS Header
 *
 * Raw `.aac` streams are a sequence of ADTS frames; the sampling frequency
 * index in the first header is all the verifier reads.
 */

import type { ByteSource } from './byteSource.js';
import { parsed, parseFailure, type ParseResult } from '../types.js';

export interface AdtsHeader {
  mpegVersion: 2 | 4;
  profile: number;
  sampleRateHz: number;
  channelConfiguration: number;
  frameLength: number;
}

const ADTS_HEADER_LENGTH = 7;

const SAMPLING_FREQUENCIES = [
  96000, 88200, 64000, 48000, 44100, 32000, 24000, 22050, 16000, 12000, 11025, 8000, 7350,
];

export function parseAdtsHeader(buffer: Buffer, offset: number): ParseResult<AdtsHeader> {
  if (offset + ADTS_HEADER_LENGTH > buffer.length) {
    return parseFailure('truncated ADTS header');
  }

  const b0 = buffer.readUInt8(offset);
  const b1 = buffer.readUInt8(offset + 1);
  if (b0 !== 0xff || (b1 & 0xf0) !== 0xf0) {
    return parseFailure('no ADTS sync word');
  }
  if ((b1 & 0b110) !== 0) {
    return parseFailure('non-zero ADTS layer');
  }

  const b2 = buffer.readUInt8(offset + 2);
  const b3 = buffer.readUInt8(offset + 3);
  const b4 = buffer.readUInt8(offset + 4);
  const b5 = buffer.readUInt8(offset + 5);

  const frequencyIndex = (b2 >> 2) & 0x0f;
  const sampleRateHz = SAMPLING_FREQUENCIES[frequencyIndex];
  if (sampleRateHz === undefined) {
    return parseFailure(`reserved sampling frequency index ${frequencyIndex}`);
  }

  const frameLength = ((b3 & 0b11) << 11) | (b4 << 3) | (b5 >> 5);
  if (frameLength < ADTS_HEADER_LENGTH) {
    return parseFailure(`ADTS frame length ${frameLength} is shorter than its header`);
  }

  return parsed({
    mpegVersion: (b1 & 0b1000) === 0 ? 4 : 2,
    profile: (b2 >> 6) + 1,
    sampleRateHz,
    channelConfiguration: ((b2 & 1) << 2) | (b3 >> 6),
    frameLength,
  });
}

/**
 * First ADTS header in [start, start + searchBytes)
 */
export async function findAdtsHeader(
  source: ByteSource,
  start: number,
  searchBytes: number
): Promise<ParseResult<AdtsHeader>> {
  const chunk = await source.read(start, searchBytes + ADTS_HEADER_LENGTH);
  for (let i = 0; i + ADTS_HEADER_LENGTH <= chunk.length; i++) {
    const header = parseAdtsHeader(chunk, i);
    if (header.ok) {
      return header;
    }
  }
  return parseFailure('no valid ADTS frame header found');
}
