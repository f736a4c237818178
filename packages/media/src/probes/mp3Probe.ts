/**
 * MP3 Probe
 *
 * Finds the first MPEG audio frame, reads sample rate and bitrate from it,
 * and classifies the file as CBR or VBR.
 *
 * CBR/VBR is a best-effort signal. A VBR header in the first frame settles
 * it; otherwise frame headers sampled at evenly spaced offsets are compared,
 * and any disagreement means VBR. Files are never decoded end to end.
 */

import type { ByteSource } from './byteSource.js';
import {
  FRAME_HEADER_LENGTH,
  MAX_FRAME_LENGTH,
  averageBitrateKbps,
  findVbrHeader,
  hasFrameSync,
  parseFrameHeader,
  type FrameHeader,
  type VbrHeader,
} from './mpegFrame.js';
import { readTagLayout, type TagLayout } from './tags.js';
import { parsed, parseFailure, type EncodingMode, type ParseResult } from '../types.js';

export interface LocatedFrame {
  offset: number;
  header: FrameHeader;
}

export interface Mp3Info {
  tags: TagLayout;
  firstFrame: LocatedFrame;
  vbrHeader?: VbrHeader;
  sampledBitratesKbps: number[];
  encodingMode: EncodingMode;
  bitrateKbps: number;
  sampleRateHz: number;
}

export interface Mp3ProbeOptions {
  /** Number of frame headers compared, the first frame included */
  sampleCount: number;
  /** How far past the tag to look for the first frame */
  firstFrameSearchBytes?: number;
  /** How far past each sample offset to look for a frame */
  sampleSearchBytes?: number;
}

const DEFAULT_FIRST_FRAME_SEARCH = 64 * 1024;
const DEFAULT_SAMPLE_SEARCH = 16 * 1024;

/** Enough of the first frame to reach the Xing and VBRI blocks */
const VBR_HEADER_WINDOW = 64;

/**
 * Find the first frame in [start, start + searchBytes) whose successor is also
 * a valid frame of the same version and layer. A frame that reaches `end` has
 * no successor and is accepted as is.
 */
export async function findFrame(
  source: ByteSource,
  start: number,
  end: number,
  searchBytes: number
): Promise<LocatedFrame | undefined> {
  if (start >= end) {
    return undefined;
  }

  const chunk = await source.read(start, Math.min(searchBytes + MAX_FRAME_LENGTH + FRAME_HEADER_LENGTH, end - start));
  const limit = Math.min(searchBytes, chunk.length - FRAME_HEADER_LENGTH + 1);

  for (let i = 0; i < limit; i++) {
    if (!hasFrameSync(chunk, i)) {
      continue;
    }
    const candidate = parseFrameHeader(chunk, i);
    if (!candidate.ok) {
      continue;
    }

    const header = candidate.value;
    const next = i + header.frameLength;
    if (start + next >= end) {
      return { offset: start + i, header };
    }
    if (next + FRAME_HEADER_LENGTH > chunk.length) {
      continue;
    }

    const successor = parseFrameHeader(chunk, next);
    if (successor.ok && successor.value.version === header.version && successor.value.layer === header.layer) {
      return { offset: start + i, header };
    }
  }

  return undefined;
}

export async function probeMp3(
  source: ByteSource,
  options: Mp3ProbeOptions
): Promise<ParseResult<Mp3Info>> {
  const tags = await readTagLayout(source);
  if (!tags.ok) {
    return tags;
  }
  const { audioStart, audioEnd } = tags.value;

  const firstFrame = await findFrame(
    source,
    audioStart,
    audioEnd,
    options.firstFrameSearchBytes ?? DEFAULT_FIRST_FRAME_SEARCH
  );
  if (!firstFrame) {
    return parseFailure('no valid MPEG audio frame header found');
  }

  const frameHead = await source.read(firstFrame.offset, VBR_HEADER_WINDOW);
  const vbrHeader = findVbrHeader(frameHead, 0, firstFrame.header);

  // Sample offsets evenly spaced between the first frame and the end of the audio
  const sampled: number[] = vbrHeader ? [] : [firstFrame.header.bitrateKbps];
  const span = audioEnd - firstFrame.offset;
  const sampleCount = Math.max(2, options.sampleCount);
  for (let i = 1; i < sampleCount; i++) {
    const position = firstFrame.offset + Math.floor((i * span) / sampleCount);
    const frame = await findFrame(
      source,
      position,
      audioEnd,
      options.sampleSearchBytes ?? DEFAULT_SAMPLE_SEARCH
    );
    if (frame && frame.offset !== firstFrame.offset) {
      sampled.push(frame.header.bitrateKbps);
    }
  }

  const distinct = new Set(sampled);
  const encodingMode: EncodingMode = vbrHeader || distinct.size > 1 ? 'VBR' : 'CBR';

  let bitrateKbps = firstFrame.header.bitrateKbps;
  if (encodingMode === 'VBR') {
    const declared = vbrHeader ? averageBitrateKbps(vbrHeader, firstFrame.header) : undefined;
    if (declared !== undefined) {
      bitrateKbps = declared;
    } else if (sampled.length > 0) {
      bitrateKbps = Math.round(sampled.reduce((sum, value) => sum + value, 0) / sampled.length);
    }
  }

  return parsed({
    tags: tags.value,
    firstFrame,
    vbrHeader,
    sampledBitratesKbps: sampled,
    encodingMode,
    bitrateKbps,
    sampleRateHz: firstFrame.header.sampleRateHz,
  });
}
