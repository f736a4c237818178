/**
 * MPEG Audio Frame Header
 *
 * Decodes the four-byte header at the start of every MPEG-1/2/2.5 audio frame
 * and the VBR side-information block (Xing/Info, VBRI) that encoders place
 * inside the first frame.
 */

import { parsed, parseFailure, type ParseResult } from '../types.js';

export type MpegVersion = '1' | '2' | '2.5';
export type MpegLayer = 1 | 2 | 3;
export type ChannelMode = 'stereo' | 'joint-stereo' | 'dual-channel' | 'mono';

export interface FrameHeader {
  version: MpegVersion;
  layer: MpegLayer;
  bitrateKbps: number;
  sampleRateHz: number;
  padding: boolean;
  channelMode: ChannelMode;
  crcProtected: boolean;
  samplesPerFrame: number;
  /** Total frame size in bytes, header included */
  frameLength: number;
}

export interface VbrHeader {
  marker: 'Xing' | 'Info' | 'VBRI';
  frameCount?: number;
  byteCount?: number;
}

/** Largest possible frame: MPEG-2 Layer II, 160 kbps, 8 kHz, padded */
export const MAX_FRAME_LENGTH = 2881;

export const FRAME_HEADER_LENGTH = 4;

// Index 0 is free-format, index 15 is forbidden; both are rejected
const BITRATES_V1: Record<MpegLayer, readonly number[]> = {
  1: [0, 32, 64, 96, 128, 160, 192, 224, 256, 288, 320, 352, 384, 416, 448],
  2: [0, 32, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320, 384],
  3: [0, 32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320],
};

const BITRATES_V2: Record<MpegLayer, readonly number[]> = {
  1: [0, 32, 48, 56, 64, 80, 96, 112, 128, 144, 160, 176, 192, 224, 256],
  2: [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160],
  3: [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160],
};

const SAMPLE_RATES: Record<MpegVersion, readonly number[]> = {
  '1': [44100, 48000, 32000],
  '2': [22050, 24000, 16000],
  '2.5': [11025, 12000, 8000],
};

const VERSION_BITS: Record<number, MpegVersion | undefined> = {
  0b00: '2.5',
  0b10: '2',
  0b11: '1',
};

const LAYER_BITS: Record<number, MpegLayer | undefined> = {
  0b01: 3,
  0b10: 2,
  0b11: 1,
};

const CHANNEL_MODES: readonly ChannelMode[] = ['stereo', 'joint-stereo', 'dual-channel', 'mono'];

/**
 * True when the two bytes at `offset` carry the 11-bit frame sync
 */
export function hasFrameSync(buffer: Buffer, offset: number): boolean {
  return (
    offset + 1 < buffer.length &&
    buffer.readUInt8(offset) === 0xff &&
    (buffer.readUInt8(offset + 1) & 0xe0) === 0xe0
  );
}

export function bitrateTable(version: MpegVersion, layer: MpegLayer): readonly number[] {
  return version === '1' ? BITRATES_V1[layer] : BITRATES_V2[layer];
}

export function samplesPerFrame(version: MpegVersion, layer: MpegLayer): number {
  if (layer === 1) return 384;
  if (layer === 2) return 1152;
  return version === '1' ? 1152 : 576;
}

export function frameLength(
  layer: MpegLayer,
  spf: number,
  bitrateKbps: number,
  sampleRateHz: number,
  padding: boolean
): number {
  const bitrate = bitrateKbps * 1000;
  if (layer === 1) {
    return (Math.floor((12 * bitrate) / sampleRateHz) + (padding ? 1 : 0)) * 4;
  }
  return Math.floor(((spf / 8) * bitrate) / sampleRateHz) + (padding ? 1 : 0);
}

/**
 * Decode the frame header at `offset`
 */
export function parseFrameHeader(buffer: Buffer, offset: number): ParseResult<FrameHeader> {
  if (offset < 0 || offset + FRAME_HEADER_LENGTH > buffer.length) {
    return parseFailure('truncated frame header');
  }
  if (!hasFrameSync(buffer, offset)) {
    return parseFailure('no frame sync');
  }

  const b1 = buffer.readUInt8(offset + 1);
  const b2 = buffer.readUInt8(offset + 2);
  const b3 = buffer.readUInt8(offset + 3);

  const version = VERSION_BITS[(b1 >> 3) & 0b11];
  if (!version) {
    return parseFailure('reserved MPEG version');
  }
  const layer = LAYER_BITS[(b1 >> 1) & 0b11];
  if (!layer) {
    return parseFailure('reserved layer');
  }

  const bitrateIndex = (b2 >> 4) & 0x0f;
  const bitrateKbps = bitrateTable(version, layer)[bitrateIndex];
  if (bitrateKbps === undefined || bitrateKbps === 0) {
    return parseFailure(`unsupported bitrate index ${bitrateIndex}`);
  }

  const sampleRateIndex = (b2 >> 2) & 0b11;
  const sampleRateHz = SAMPLE_RATES[version][sampleRateIndex];
  if (sampleRateHz === undefined) {
    return parseFailure('reserved sample rate index');
  }

  const padding = ((b2 >> 1) & 1) === 1;
  const spf = samplesPerFrame(version, layer);

  return parsed({
    version,
    layer,
    bitrateKbps,
    sampleRateHz,
    padding,
    channelMode: CHANNEL_MODES[(b3 >> 6) & 0b11] ?? 'stereo',
    crcProtected: (b1 & 1) === 0,
    samplesPerFrame: spf,
    frameLength: frameLength(layer, spf, bitrateKbps, sampleRateHz, padding),
  });
}

/**
 * Offset of the Xing/Info block from the start of a Layer III frame
 */
export function xingOffset(header: FrameHeader): number {
  const mono = header.channelMode === 'mono';
  const sideInfo = header.version === '1' ? (mono ? 17 : 32) : (mono ? 9 : 17);
  return FRAME_HEADER_LENGTH + sideInfo;
}

const VBRI_OFFSET = FRAME_HEADER_LENGTH + 32;

/**
 * Look for a VBR header inside the frame that starts at `offset`.
 * `frame` must hold at least the first 60 bytes of the frame.
 */
export function findVbrHeader(
  frame: Buffer,
  offset: number,
  header: FrameHeader
): VbrHeader | undefined {
  if (header.layer === 3) {
    const at = offset + xingOffset(header);
    if (at + 8 <= frame.length) {
      const tag = frame.toString('latin1', at, at + 4);
      if (tag === 'Xing' || tag === 'Info') {
        const flags = frame.readUInt32BE(at + 4);
        let cursor = at + 8;
        const vbr: VbrHeader = { marker: tag };
        if (flags & 0x1 && cursor + 4 <= frame.length) {
          vbr.frameCount = frame.readUInt32BE(cursor);
          cursor += 4;
        }
        if (flags & 0x2 && cursor + 4 <= frame.length) {
          vbr.byteCount = frame.readUInt32BE(cursor);
        }
        return vbr;
      }
    }
  }

  const vbri = offset + VBRI_OFFSET;
  if (vbri + 18 <= frame.length && frame.toString('latin1', vbri, vbri + 4) === 'VBRI') {
    return {
      marker: 'VBRI',
      byteCount: frame.readUInt32BE(vbri + 10),
      frameCount: frame.readUInt32BE(vbri + 14),
    };
  }

  return undefined;
}

/**
 * Average bitrate declared by a VBR header, when it carries both counts
 */
export function averageBitrateKbps(vbr: VbrHeader, header: FrameHeader): number | undefined {
  if (!vbr.frameCount || !vbr.byteCount) {
    return undefined;
  }
  const seconds = (vbr.frameCount * header.samplesPerFrame) / header.sampleRateHz;
  return Math.round((vbr.byteCount * 8) / seconds / 1000);
}
