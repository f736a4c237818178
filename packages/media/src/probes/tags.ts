/**
 * Tag Container Reader
 *
 * Locates the ID3 tags around an audio stream and reports where the audio
 * itself starts and ends.
 */

import type { ByteSource } from './byteSource.js';
import {
  ID3V1_LENGTH,
  ID3V2_HEADER_LENGTH,
  hasId3v1,
  isId3v2,
  parseId3v2Header,
  summarizeId3v2,
  type Id3v2Summary,
} from './id3.js';
import { parsed, parseFailure, type ParseResult, type TagVersion } from '../types.js';

export interface TagLayout {
  id3v2?: Id3v2Summary;
  hasId3v1: boolean;
  tagVersion: TagVersion;
  /** First byte after the leading tag */
  audioStart: number;
  /** One past the last audio byte (the ID3v1 trailer is excluded) */
  audioEnd: number;
}

export async function readTagLayout(source: ByteSource): Promise<ParseResult<TagLayout>> {
  const head = await source.read(0, ID3V2_HEADER_LENGTH);

  let id3v2: Id3v2Summary | undefined;
  let audioStart = 0;
  if (isId3v2(head)) {
    const header = parseId3v2Header(head);
    if (!header.ok) {
      return parseFailure(`malformed ID3v2 tag: ${header.reason}`);
    }
    if (header.value.totalLength > source.size) {
      return parseFailure(
        `ID3v2 tag declares ${header.value.totalLength} bytes but the file has ${source.size}`
      );
    }
    const body = await source.read(ID3V2_HEADER_LENGTH, header.value.size);
    id3v2 = summarizeId3v2(header.value, body);
    audioStart = header.value.totalLength;
  }

  let trailerFound = false;
  let audioEnd = source.size;
  if (source.size - audioStart >= ID3V1_LENGTH) {
    const trailer = await source.read(source.size - ID3V1_LENGTH, ID3V1_LENGTH);
    trailerFound = hasId3v1(trailer);
    if (trailerFound) {
      audioEnd -= ID3V1_LENGTH;
    }
  }

  let tagVersion: TagVersion = 'None';
  if (id3v2) {
    tagVersion = id3v2.tagVersion;
  } else if (trailerFound) {
    tagVersion = 'ID3v1Only';
  }

  return parsed({
    id3v2,
    hasId3v1: trailerFound,
    tagVersion,
    audioStart,
    audioEnd,
  });
}
