/**
 * MP4 Probe
 *
 * Walks the ISO base media box tree of M4A/M4B/M4P files. Reads the audio
 * sample entry (sample rate), looks for protection boxes (DRM), and measures
 * the `covr` artwork.
 */

import type { ByteSource } from './byteSource.js';
import { parsed, parseFailure, type ParseResult } from '../types.js';

export interface Box {
  type: string;
  /** Offset of the box header */
  start: number;
  /** Offset of the payload */
  payloadStart: number;
  /** One past the last byte of the box */
  end: number;
}

export interface Mp4Info {
  majorBrand: string;
  sampleEntryType?: string;
  sampleRateHz?: number;
  channels?: number;
  drmDetected: boolean;
  coverArtBytes?: number;
}

const MAX_MOOV_BYTES = 64 * 1024 * 1024;

const CONTAINER_BOXES = new Set(['moov', 'trak', 'mdia', 'minf', 'stbl', 'udta', 'ilst', 'covr', 'sinf', 'schi']);

/** Sample entries that wrap a protected stream */
const PROTECTED_ENTRIES = new Set(['drms', 'enca', 'drma']);

const BOX_TYPE = /^[\x20-\x7e\xa9]{4}$/;

/**
 * Read the box header at `offset` of `buffer`; `base` is the absolute offset
 * of buffer[0] and `limit` the absolute end of the enclosing box.
 */
export function readBoxHeader(
  buffer: Buffer,
  offset: number,
  base: number,
  limit: number
): ParseResult<Box> {
  if (offset + 8 > buffer.length) {
    return parseFailure('truncated box header');
  }

  const type = buffer.toString('latin1', offset + 4, offset + 8);
  if (!BOX_TYPE.test(type)) {
    return parseFailure(`invalid box type at offset ${base + offset}`);
  }

  let size = buffer.readUInt32BE(offset);
  let headerLength = 8;
  if (size === 1) {
    if (offset + 16 > buffer.length) {
      return parseFailure(`truncated 64-bit size of '${type}' box`);
    }
    const large = buffer.readBigUInt64BE(offset + 8);
    if (large > BigInt(Number.MAX_SAFE_INTEGER)) {
      return parseFailure(`'${type}' box is too large`);
    }
    size = Number(large);
    headerLength = 16;
  } else if (size === 0) {
    size = limit - (base + offset);
  }

  if (size < headerLength) {
    return parseFailure(`'${type}' box declares ${size} bytes`);
  }

  const start = base + offset;
  const end = start + size;
  if (end > limit) {
    return parseFailure(`'${type}' box overruns its parent`);
  }

  return parsed({ type, start, payloadStart: start + headerLength, end });
}

/**
 * Children of the box whose payload spans [from, to) in `buffer` (absolute
 * offsets relative to `base`)
 */
export function readChildBoxes(
  buffer: Buffer,
  from: number,
  to: number,
  base: number
): ParseResult<Box[]> {
  const boxes: Box[] = [];
  let cursor = from;
  while (cursor + 8 <= to) {
    const box = readBoxHeader(buffer, cursor - base, base, to);
    if (!box.ok) {
      return box;
    }
    boxes.push(box.value);
    cursor = box.value.end;
  }
  return parsed(boxes);
}

function isZeroHeader(header: Buffer): boolean {
  return header.length >= 8 && header.subarray(0, 8).every((byte) => byte === 0);
}

/**
 * Top-level boxes of the file, read header by header. Zero padding ends the
 * walk, as does an unreadable header once `moov` has been seen.
 */
async function readTopLevelBoxes(source: ByteSource): Promise<ParseResult<Box[]>> {
  const boxes: Box[] = [];
  let cursor = 0;
  let moovSeen = false;
  while (cursor + 8 <= source.size) {
    const header = await source.read(cursor, 16);
    if (isZeroHeader(header)) {
      break;
    }
    const box = readBoxHeader(header, 0, cursor, source.size);
    if (!box.ok) {
      if (moovSeen) {
        break;
      }
      return box;
    }
    if (box.value.type === 'moov') {
      moovSeen = true;
    }
    boxes.push(box.value);
    cursor = box.value.end;
  }
  return parsed(boxes);
}

interface MoovTree {
  buffer: Buffer;
  base: number;
}

function childrenOf(tree: MoovTree, box: Box): Box[] {
  let from = box.payloadStart;
  if (box.type === 'meta') {
    from += 4; // full box: version and flags
  }
  const children = readChildBoxes(tree.buffer, from, box.end, tree.base);
  return children.ok ? children.value : [];
}

function findChild(tree: MoovTree, box: Box, type: string): Box | undefined {
  return childrenOf(tree, box).find((child) => child.type === type);
}

function findPath(tree: MoovTree, box: Box, path: string[]): Box | undefined {
  let current: Box | undefined = box;
  for (const type of path) {
    if (!current) return undefined;
    current = findChild(tree, current, type);
  }
  return current;
}

/**
 * Any box of `type` anywhere below `box`, including inside sample entries
 */
function containsBox(tree: MoovTree, box: Box, type: string): boolean {
  for (const child of childrenOf(tree, box)) {
    if (child.type === type) {
      return true;
    }
    if ((CONTAINER_BOXES.has(child.type) || child.type === 'meta') && containsBox(tree, child, type)) {
      return true;
    }
  }
  return false;
}

interface SampleEntry {
  type: string;
  sampleRateHz: number;
  channels: number;
  protectedStream: boolean;
}

const AUDIO_ENTRY_FIXED = 28;

function readAudioSampleEntry(tree: MoovTree, entry: Box): SampleEntry | undefined {
  const at = entry.payloadStart - tree.base;
  if (at + AUDIO_ENTRY_FIXED > tree.buffer.length || entry.payloadStart + AUDIO_ENTRY_FIXED > entry.end) {
    return undefined;
  }

  const version = tree.buffer.readUInt16BE(at + 8);
  const channels = tree.buffer.readUInt16BE(at + 16);
  let sampleRateHz = tree.buffer.readUInt32BE(at + 24) >>> 16;

  // QuickTime sound description v2 stores the rate as a float64
  if (version === 2 && at + 40 <= tree.buffer.length) {
    sampleRateHz = Math.round(tree.buffer.readDoubleBE(at + 32));
  }

  const extra = version === 1 ? 16 : version === 2 ? 36 : 0;
  const childStart = entry.payloadStart + AUDIO_ENTRY_FIXED + extra;
  let protectedStream = PROTECTED_ENTRIES.has(entry.type);
  if (!protectedStream && childStart < entry.end) {
    const children = readChildBoxes(tree.buffer, childStart, entry.end, tree.base);
    protectedStream = children.ok && children.value.some((child) => child.type === 'sinf');
  }

  return { type: entry.type, sampleRateHz, channels, protectedStream };
}

function findAudioSampleEntry(tree: MoovTree, moov: Box): SampleEntry | undefined {
  for (const trak of childrenOf(tree, moov).filter((box) => box.type === 'trak')) {
    const minf = findPath(tree, trak, ['mdia', 'minf']);
    if (!minf || !findChild(tree, minf, 'smhd')) {
      continue;
    }
    const stsd = findPath(tree, minf, ['stbl', 'stsd']);
    if (!stsd) {
      continue;
    }
    // Full box header (4) and entry count (4) precede the entries
    const entries = readChildBoxes(tree.buffer, stsd.payloadStart + 8, stsd.end, tree.base);
    const first = entries.ok ? entries.value[0] : undefined;
    if (first) {
      return readAudioSampleEntry(tree, first);
    }
  }
  return undefined;
}

function measureCoverArt(tree: MoovTree, moov: Box): number | undefined {
  const covr = findPath(tree, moov, ['udta', 'meta', 'ilst', 'covr']);
  if (!covr) {
    return undefined;
  }
  let largest: number | undefined;
  for (const data of childrenOf(tree, covr).filter((box) => box.type === 'data')) {
    // Type indicator (4) and locale (4) precede the image bytes
    const bytes = Math.max(0, data.end - data.payloadStart - 8);
    largest = Math.max(largest ?? 0, bytes);
  }
  return largest;
}

export async function probeMp4(source: ByteSource): Promise<ParseResult<Mp4Info>> {
  const boxes = await readTopLevelBoxes(source);
  if (!boxes.ok) {
    return parseFailure(`not a valid MP4 container: ${boxes.reason}`);
  }

  const ftyp = boxes.value[0];
  if (!ftyp || ftyp.type !== 'ftyp') {
    return parseFailure('not an MP4 container: missing ftyp box');
  }
  const brand = await source.read(ftyp.payloadStart, 4);
  const majorBrand = brand.toString('latin1').trim();

  const moov = boxes.value.find((box) => box.type === 'moov');
  if (!moov) {
    return parseFailure('no moov box');
  }
  if (moov.end - moov.start > MAX_MOOV_BYTES) {
    return parseFailure(`moov box of ${moov.end - moov.start} bytes is too large to inspect`);
  }

  const tree: MoovTree = {
    buffer: await source.read(moov.start, moov.end - moov.start),
    base: moov.start,
  };
  if (tree.buffer.length < moov.end - moov.start) {
    return parseFailure('moov box is truncated');
  }

  const entry = findAudioSampleEntry(tree, moov);
  const drmDetected = entry?.protectedStream === true || containsBox(tree, moov, 'sinf');

  return parsed({
    majorBrand,
    sampleEntryType: entry?.type,
    sampleRateHz: entry?.sampleRateHz,
    channels: entry?.channels,
    drmDetected,
    coverArtBytes: measureCoverArt(tree, moov),
  });
}
