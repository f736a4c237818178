/**
 * ID3 Tags
 *
 * ID3v2 header and frame walking (v2.2, v2.3, v2.4) and the 128-byte ID3v1
 * trailer. Only what the verifier needs is decoded: the tag version and the
 * size of embedded pictures.
 */

import { parsed, parseFailure, type ParseResult, type TagVersion } from '../types.js';

export const ID3V2_HEADER_LENGTH = 10;
export const ID3V1_LENGTH = 128;

export interface Id3v2Header {
  major: number;
  revision: number;
  flags: number;
  /** Size of everything after the 10-byte header, footer excluded */
  size: number;
  hasFooter: boolean;
  /** Header + body + footer */
  totalLength: number;
}

export interface Id3v2Frame {
  id: string;
  /** Offset of the frame payload inside the tag body */
  offset: number;
  size: number;
}

export interface PictureFrame {
  mimeType: string;
  pictureType: number;
  dataLength: number;
}

const FLAG_EXTENDED_HEADER = 0x40;
const FLAG_FOOTER = 0x10;

/**
 * Decode a 28-bit synchsafe integer; undefined if any byte has its top bit set
 */
export function readSynchsafe(buffer: Buffer, offset: number): number | undefined {
  let value = 0;
  for (let i = 0; i < 4; i++) {
    const byte = buffer.readUInt8(offset + i);
    if (byte & 0x80) {
      return undefined;
    }
    value = (value << 7) | byte;
  }
  return value;
}

export function isId3v2(buffer: Buffer): boolean {
  return buffer.length >= 3 && buffer.toString('latin1', 0, 3) === 'ID3';
}

export function parseId3v2Header(buffer: Buffer): ParseResult<Id3v2Header> {
  if (!isId3v2(buffer)) {
    return parseFailure('no ID3v2 identifier');
  }
  if (buffer.length < ID3V2_HEADER_LENGTH) {
    return parseFailure('truncated ID3v2 header');
  }

  const major = buffer.readUInt8(3);
  const revision = buffer.readUInt8(4);
  if (major === 0xff || revision === 0xff) {
    return parseFailure(`invalid ID3v2 version ${major}.${revision}`);
  }

  const size = readSynchsafe(buffer, 6);
  if (size === undefined) {
    return parseFailure('ID3v2 size is not synchsafe');
  }

  const flags = buffer.readUInt8(5);
  const hasFooter = major >= 4 && (flags & FLAG_FOOTER) !== 0;

  return parsed({
    major,
    revision,
    flags,
    size,
    hasFooter,
    totalLength: ID3V2_HEADER_LENGTH + size + (hasFooter ? ID3V2_HEADER_LENGTH : 0),
  });
}

export function tagVersionOf(header: Id3v2Header): TagVersion {
  switch (header.major) {
    case 2:
      return 'ID3v22';
    case 3:
      return 'ID3v23';
    case 4:
      return 'ID3v24';
    default:
      return 'Other';
  }
}

export function hasId3v1(trailer: Buffer): boolean {
  return trailer.length === ID3V1_LENGTH && trailer.toString('latin1', 0, 3) === 'TAG';
}

function extendedHeaderLength(body: Buffer, header: Id3v2Header): number {
  if (header.major < 3 || (header.flags & FLAG_EXTENDED_HEADER) === 0 || body.length < 4) {
    return 0;
  }
  if (header.major === 3) {
    // Size excludes its own four bytes
    return 4 + body.readUInt32BE(0);
  }
  return readSynchsafe(body, 0) ?? 0;
}

/**
 * List the frames of a tag body (the bytes after the 10-byte header).
 * Walking stops at padding or at the first frame that does not fit.
 */
export function listId3v2Frames(body: Buffer, header: Id3v2Header): Id3v2Frame[] {
  const frames: Id3v2Frame[] = [];
  const v22 = header.major === 2;
  const idLength = v22 ? 3 : 4;
  const headerLength = v22 ? 6 : 10;
  const idPattern = v22 ? /^[A-Z0-9]{3}$/ : /^[A-Z0-9]{4}$/;

  let cursor = extendedHeaderLength(body, header);

  while (cursor + headerLength <= body.length) {
    if (body.readUInt8(cursor) === 0) {
      break;
    }
    const id = body.toString('latin1', cursor, cursor + idLength);
    if (!idPattern.test(id)) {
      break;
    }

    let size: number | undefined;
    if (v22) {
      size = body.readUIntBE(cursor + 3, 3);
    } else if (header.major === 3) {
      size = body.readUInt32BE(cursor + 4);
    } else {
      size = readSynchsafe(body, cursor + 4);
    }

    const offset = cursor + headerLength;
    if (size === undefined || size === 0 || offset + size > body.length) {
      break;
    }

    frames.push({ id, offset, size });
    cursor = offset + size;
  }

  return frames;
}

function findTerminator(payload: Buffer, start: number, wide: boolean): number {
  if (!wide) {
    const end = payload.indexOf(0, start);
    return end === -1 ? -1 : end + 1;
  }
  for (let i = start; i + 1 < payload.length; i += 2) {
    if (payload.readUInt8(i) === 0 && payload.readUInt8(i + 1) === 0) {
      return i + 2;
    }
  }
  return -1;
}

/**
 * Decode an APIC (v2.3/v2.4) or PIC (v2.2) payload down to the image bytes
 */
export function parsePictureFrame(payload: Buffer, v22: boolean): ParseResult<PictureFrame> {
  if (payload.length < (v22 ? 5 : 3)) {
    return parseFailure('picture frame too short');
  }

  const encoding = payload.readUInt8(0);
  if (encoding > 3) {
    return parseFailure(`unknown text encoding ${encoding}`);
  }

  let cursor: number;
  let mimeType: string;
  if (v22) {
    mimeType = `image/${payload.toString('latin1', 1, 4).toLowerCase()}`;
    cursor = 4;
  } else {
    const mimeEnd = findTerminator(payload, 1, false);
    if (mimeEnd === -1) {
      return parseFailure('unterminated MIME type');
    }
    mimeType = payload.toString('latin1', 1, mimeEnd - 1);
    cursor = mimeEnd;
  }

  if (cursor >= payload.length) {
    return parseFailure('picture frame ends before picture type');
  }
  const pictureType = payload.readUInt8(cursor);
  cursor += 1;

  const wide = encoding === 1 || encoding === 2;
  const descriptionEnd = findTerminator(payload, cursor, wide);
  if (descriptionEnd === -1) {
    return parseFailure('unterminated picture description');
  }

  return parsed({
    mimeType,
    pictureType,
    dataLength: payload.length - descriptionEnd,
  });
}

export interface Id3v2Summary {
  header: Id3v2Header;
  tagVersion: TagVersion;
  /** Largest embedded picture, undefined when the tag has none */
  largestPictureBytes?: number;
}

/**
 * Summarise a complete tag: header plus body
 */
export function summarizeId3v2(header: Id3v2Header, body: Buffer): Id3v2Summary {
  const v22 = header.major === 2;
  const pictureId = v22 ? 'PIC' : 'APIC';
  let largest: number | undefined;

  for (const frame of listId3v2Frames(body, header)) {
    if (frame.id !== pictureId) {
      continue;
    }
    const payload = body.subarray(frame.offset, frame.offset + frame.size);
    const picture = parsePictureFrame(payload, v22);
    // A frame we cannot decode still occupies its full size on the drive
    const bytes = picture.ok ? picture.value.dataLength : frame.size;
    largest = Math.max(largest ?? 0, bytes);
  }

  return {
    header,
    tagVersion: tagVersionOf(header),
    largestPictureBytes: largest,
  };
}
