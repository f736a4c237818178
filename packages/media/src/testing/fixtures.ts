/**
 * Synthetic audio files for tests: MPEG frames, ID3 tags, MP4 box trees,
 * ASF headers and ADTS frames, plus a helper that lays them out on disk.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import {
  ASF_AUDIO_MEDIA,
  ASF_CONTENT_ENCRYPTION,
  ASF_HEADER_OBJECT,
  ASF_STREAM_PROPERTIES,
  guidBytes,
} from '../probes/asf.js';
import { bitrateTable, frameLength, samplesPerFrame, xingOffset, type FrameHeader, type MpegVersion } from '../probes/mpegFrame.js';

// ============================================
// MPEG audio
// ============================================

export interface Mp3FrameOptions {
  bitrateKbps: number;
  sampleRateHz?: number;
  version?: MpegVersion;
  mono?: boolean;
}

const VERSION_BITS: Record<MpegVersion, number> = { '1': 0b11, '2': 0b10, '2.5': 0b00 };

const SAMPLE_RATES: Record<MpegVersion, readonly number[]> = {
  '1': [44100, 48000, 32000],
  '2': [22050, 24000, 16000],
  '2.5': [11025, 12000, 8000],
};

function frameHeaderFor(options: Mp3FrameOptions): FrameHeader {
  const version = options.version ?? '1';
  const sampleRateHz = options.sampleRateHz ?? SAMPLE_RATES[version][0] ?? 44100;
  const spf = samplesPerFrame(version, 3);
  return {
    version,
    layer: 3,
    bitrateKbps: options.bitrateKbps,
    sampleRateHz,
    padding: false,
    channelMode: options.mono ? 'mono' : 'stereo',
    crcProtected: false,
    samplesPerFrame: spf,
    frameLength: frameLength(3, spf, options.bitrateKbps, sampleRateHz, false),
  };
}

/**
 * One unpadded Layer III frame with a zeroed payload
 */
export function mp3Frame(options: Mp3FrameOptions): Buffer {
  const header = frameHeaderFor(options);
  const bitrateIndex = bitrateTable(header.version, 3).indexOf(header.bitrateKbps);
  const sampleRateIndex = SAMPLE_RATES[header.version].indexOf(header.sampleRateHz);
  if (bitrateIndex <= 0 || sampleRateIndex < 0) {
    throw new Error(`no MPEG ${header.version} frame at ${header.bitrateKbps} kbps / ${header.sampleRateHz} Hz`);
  }

  const frame = Buffer.alloc(header.frameLength);
  frame.writeUInt8(0xff, 0);
  // sync, version, layer III, no CRC
  frame.writeUInt8(0xe0 | (VERSION_BITS[header.version] << 3) | (0b01 << 1) | 1, 1);
  frame.writeUInt8((bitrateIndex << 4) | (sampleRateIndex << 2), 2);
  frame.writeUInt8(options.mono ? 0xc0 : 0x00, 3);
  return frame;
}

export interface VbrFrameOptions extends Mp3FrameOptions {
  marker?: 'Xing' | 'Info' | 'VBRI';
  frameCount?: number;
  byteCount?: number;
}

/**
 * First frame carrying a Xing/Info or VBRI block
 */
export function vbrHeaderFrame(options: VbrFrameOptions): Buffer {
  const frame = mp3Frame(options);
  const marker = options.marker ?? 'Xing';

  if (marker === 'VBRI') {
    const at = 36;
    frame.write('VBRI', at, 'latin1');
    frame.writeUInt32BE(options.byteCount ?? 0, at + 10);
    frame.writeUInt32BE(options.frameCount ?? 0, at + 14);
    return frame;
  }

  const at = xingOffset(frameHeaderFor(options));
  frame.write(marker, at, 'latin1');
  let flags = 0;
  let cursor = at + 8;
  if (options.frameCount !== undefined) {
    flags |= 0x1;
    frame.writeUInt32BE(options.frameCount, cursor);
    cursor += 4;
  }
  if (options.byteCount !== undefined) {
    flags |= 0x2;
    frame.writeUInt32BE(options.byteCount, cursor);
  }
  frame.writeUInt32BE(flags, at + 4);
  return frame;
}

/**
 * Consecutive frames, one per bitrate
 */
export function mp3Stream(bitrates: readonly number[], options: Omit<Mp3FrameOptions, 'bitrateKbps'> = {}): Buffer {
  return Buffer.concat(bitrates.map((bitrateKbps) => mp3Frame({ ...options, bitrateKbps })));
}

/**
 * `count` identical frames
 */
export function cbrStream(bitrateKbps: number, count: number, options: Omit<Mp3FrameOptions, 'bitrateKbps'> = {}): Buffer {
  return mp3Stream(Array.from({ length: count }, () => bitrateKbps), options);
}

// ============================================
// ID3
// ============================================

export function synchsafe(value: number): Buffer {
  const out = Buffer.alloc(4);
  out.writeUInt8((value >> 21) & 0x7f, 0);
  out.writeUInt8((value >> 14) & 0x7f, 1);
  out.writeUInt8((value >> 7) & 0x7f, 2);
  out.writeUInt8(value & 0x7f, 3);
  return out;
}

export interface Id3v2Options {
  major: number;
  title?: string;
  /** Size of the embedded picture's image bytes */
  pictureBytes?: number;
  padding?: number;
  footer?: boolean;
}

function id3Frame(major: number, id: string, payload: Buffer): Buffer {
  if (major === 2) {
    const size = Buffer.alloc(3);
    size.writeUIntBE(payload.length, 0, 3);
    return Buffer.concat([Buffer.from(id.slice(0, 3), 'latin1'), size, payload]);
  }
  const header = Buffer.alloc(10);
  header.write(id, 0, 'latin1');
  if (major === 4) {
    synchsafe(payload.length).copy(header, 4);
  } else {
    header.writeUInt32BE(payload.length, 4);
  }
  return Buffer.concat([header, payload]);
}

function pictureFrame(major: number, imageBytes: number): Buffer {
  const image = Buffer.alloc(imageBytes, 0xab);
  if (major === 2) {
    // encoding, image format, picture type, empty description
    return id3Frame(major, 'PIC', Buffer.concat([Buffer.from([0]), Buffer.from('JPG', 'latin1'), Buffer.from([3, 0]), image]));
  }
  const payload = Buffer.concat([
    Buffer.from([0]),
    Buffer.from('image/jpeg\0', 'latin1'),
    Buffer.from([3, 0]),
    image,
  ]);
  return id3Frame(major, 'APIC', payload);
}

export function id3v2Tag(options: Id3v2Options): Buffer {
  const { major } = options;
  const frames: Buffer[] = [];
  const title = Buffer.concat([Buffer.from([0]), Buffer.from(options.title ?? 'Test Track', 'latin1')]);
  frames.push(id3Frame(major, major === 2 ? 'TT2' : 'TIT2', title));
  if (options.pictureBytes !== undefined) {
    frames.push(pictureFrame(major, options.pictureBytes));
  }
  frames.push(Buffer.alloc(options.padding ?? 0));
  const body = Buffer.concat(frames);

  const header = Buffer.alloc(10);
  header.write('ID3', 0, 'latin1');
  header.writeUInt8(major, 3);
  header.writeUInt8(0, 4);
  header.writeUInt8(options.footer ? 0x10 : 0, 5);
  synchsafe(body.length).copy(header, 6);

  if (!options.footer) {
    return Buffer.concat([header, body]);
  }
  const footer = Buffer.from(header);
  footer.write('3DI', 0, 'latin1');
  return Buffer.concat([header, body, footer]);
}

export function id3v1Tag(title = 'Test Track'): Buffer {
  const tag = Buffer.alloc(128);
  tag.write('TAG', 0, 'latin1');
  tag.write(title.slice(0, 30), 3, 'latin1');
  return tag;
}

// ============================================
// MP4
// ============================================

export function box(type: string, ...payload: Buffer[]): Buffer {
  const body = Buffer.concat(payload);
  const header = Buffer.alloc(8);
  header.writeUInt32BE(body.length + 8, 0);
  header.write(type, 4, 'latin1');
  return Buffer.concat([header, body]);
}

function fullBox(type: string, ...payload: Buffer[]): Buffer {
  return box(type, Buffer.alloc(4), ...payload);
}

export interface Mp4Options {
  brand?: string;
  sampleRateHz?: number;
  entryType?: string;
  /** Put a `sinf` protection box inside the sample entry */
  protectedEntry?: boolean;
  coverArtBytes?: number;
}

export function mp4File(options: Mp4Options = {}): Buffer {
  const brand = options.brand ?? 'M4A ';
  const ftyp = box('ftyp', Buffer.from(brand, 'latin1'), Buffer.alloc(4), Buffer.from(`${brand}mp42isom`, 'latin1'));

  const entryFields = Buffer.alloc(28);
  entryFields.writeUInt16BE(1, 6); // data reference index
  entryFields.writeUInt16BE(2, 16); // channels
  entryFields.writeUInt16BE(16, 18); // sample size
  entryFields.writeUInt32BE((options.sampleRateHz ?? 44100) * 0x10000, 24);
  const entryChildren = [box('esds', Buffer.alloc(20))];
  if (options.protectedEntry) {
    entryChildren.push(box('sinf', box('frma', Buffer.from('mp4a', 'latin1'))));
  }
  const sampleEntry = box(options.entryType ?? 'mp4a', entryFields, ...entryChildren);

  const entryCount = Buffer.alloc(4);
  entryCount.writeUInt32BE(1, 0);
  const stsd = fullBox('stsd', entryCount, sampleEntry);

  const trak = box(
    'trak',
    box('tkhd', Buffer.alloc(84)),
    box('mdia', fullBox('mdhd', Buffer.alloc(20)), box('minf', fullBox('smhd', Buffer.alloc(4)), box('stbl', stsd)))
  );

  const moovChildren = [fullBox('mvhd', Buffer.alloc(96)), trak];
  if (options.coverArtBytes !== undefined) {
    const dataHeader = Buffer.alloc(8);
    dataHeader.writeUInt32BE(13, 0); // JPEG
    const covr = box('covr', box('data', dataHeader, Buffer.alloc(options.coverArtBytes, 0xab)));
    moovChildren.push(box('udta', fullBox('meta', box('ilst', covr))));
  }

  return Buffer.concat([ftyp, box('moov', ...moovChildren), box('mdat', Buffer.alloc(64))]);
}

// ============================================
// ASF
// ============================================

const ASF_DATA_OBJECT = guidBytes('75B22636-668E-11CF-A6D9-00AA0062CE6C');
const ASF_NO_ERROR_CORRECTION = guidBytes('20FB5700-5B55-11CF-A8FD-00805F5C442B');

function asfObject(guid: Buffer, ...payload: Buffer[]): Buffer {
  const body = Buffer.concat(payload);
  const size = Buffer.alloc(8);
  size.writeBigUInt64LE(BigInt(body.length + 24), 0);
  return Buffer.concat([guid, size, body]);
}

export interface AsfOptions {
  sampleRateHz?: number;
  bitrateKbps?: number;
  encrypted?: boolean;
}

export function asfFile(options: AsfOptions = {}): Buffer {
  const waveFormat = Buffer.alloc(18);
  waveFormat.writeUInt16LE(0x0161, 0); // WMA v2
  waveFormat.writeUInt16LE(2, 2);
  waveFormat.writeUInt32LE(options.sampleRateHz ?? 44100, 4);
  waveFormat.writeUInt32LE(Math.round(((options.bitrateKbps ?? 128) * 1000) / 8), 8);

  const streamFields = Buffer.alloc(24);
  streamFields.writeUInt32LE(waveFormat.length, 8); // type-specific data length
  streamFields.writeUInt16LE(1, 16); // stream number
  const streamProperties = asfObject(
    ASF_STREAM_PROPERTIES,
    ASF_AUDIO_MEDIA,
    ASF_NO_ERROR_CORRECTION,
    streamFields.subarray(0, 8), // time offset
    streamFields.subarray(8, 22), // lengths, flags, reserved
    waveFormat
  );

  const objects = [streamProperties];
  if (options.encrypted) {
    objects.push(asfObject(ASF_CONTENT_ENCRYPTION, Buffer.alloc(16)));
  }

  const headerFields = Buffer.alloc(6);
  headerFields.writeUInt32LE(objects.length, 0);
  headerFields.writeUInt8(1, 4);
  headerFields.writeUInt8(2, 5);
  const header = asfObject(ASF_HEADER_OBJECT, headerFields, ...objects);

  return Buffer.concat([header, asfObject(ASF_DATA_OBJECT, Buffer.alloc(50))]);
}

// ============================================
// ADTS
// ============================================

const ADTS_FREQUENCIES = [96000, 88200, 64000, 48000, 44100, 32000, 24000, 22050, 16000, 12000, 11025, 8000, 7350];

export function adtsFrame(sampleRateHz = 44100, payloadBytes = 32): Buffer {
  const index = ADTS_FREQUENCIES.indexOf(sampleRateHz);
  if (index < 0) {
    throw new Error(`no ADTS sampling frequency index for ${sampleRateHz} Hz`);
  }
  const length = 7 + payloadBytes;
  const frame = Buffer.alloc(length);
  const channels = 2;
  frame.writeUInt8(0xff, 0);
  frame.writeUInt8(0xf1, 1); // MPEG-4, layer 0, no CRC
  frame.writeUInt8((1 << 6) | (index << 2) | (channels >> 2), 2);
  frame.writeUInt8(((channels & 3) << 6) | ((length >> 11) & 0b11), 3);
  frame.writeUInt8((length >> 3) & 0xff, 4);
  frame.writeUInt8(((length & 0b111) << 5) | 0x1f, 5);
  frame.writeUInt8(0xfc, 6);
  return frame;
}

// ============================================
// Disk layout
// ============================================

/**
 * Write `content` at `root/relativePath`, creating directories on the way
 */
export async function writeFixture(root: string, relativePath: string, content: Buffer | string = ''): Promise<string> {
  const target = join(root, relativePath);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content);
  return target;
}
