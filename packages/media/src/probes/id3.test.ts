import { describe, expect, it } from 'vitest';
import { id3v1Tag, id3v2Tag } from '../testing/fixtures.js';
import { bufferSource } from './byteSource.js';
import {
  ID3V2_HEADER_LENGTH,
  listId3v2Frames,
  parseId3v2Header,
  parsePictureFrame,
  readSynchsafe,
  summarizeId3v2,
} from './id3.js';
import { readTagLayout } from './tags.js';

function summarize(tag: Buffer) {
  const header = parseId3v2Header(tag);
  if (!header.ok) throw new Error(header.reason);
  return summarizeId3v2(header.value, tag.subarray(ID3V2_HEADER_LENGTH, ID3V2_HEADER_LENGTH + header.value.size));
}

describe('readSynchsafe', () => {
  it('decodes seven bits per byte', () => {
    expect(readSynchsafe(Buffer.from([0x00, 0x00, 0x02, 0x01]), 0)).toBe(257);
  });

  it('rejects bytes with the top bit set', () => {
    expect(readSynchsafe(Buffer.from([0x00, 0x00, 0x80, 0x00]), 0)).toBeUndefined();
  });
});

describe('parseId3v2Header', () => {
  it('reads version and size', () => {
    const result = parseId3v2Header(id3v2Tag({ major: 4 }));

    expect(result).toEqual({
      ok: true,
      value: { major: 4, revision: 0, flags: 0, size: 21, hasFooter: false, totalLength: 31 },
    });
  });

  it('counts the v2.4 footer in the total length', () => {
    const result = parseId3v2Header(id3v2Tag({ major: 4, footer: true }));

    expect(result.ok && result.value.totalLength).toBe(41);
  });

  it('rejects a size that is not synchsafe', () => {
    const tag = id3v2Tag({ major: 3 });
    tag.writeUInt8(0x80, 8);

    expect(parseId3v2Header(tag)).toEqual({ ok: false, reason: 'ID3v2 size is not synchsafe' });
  });
});

describe('summarizeId3v2', () => {
  it('measures APIC image bytes in a v2.3 tag', () => {
    const summary = summarize(id3v2Tag({ major: 3, pictureBytes: 1000, padding: 64 }));

    expect(summary.tagVersion).toBe('ID3v23');
    expect(summary.largestPictureBytes).toBe(1000);
  });

  it('measures PIC image bytes in a v2.2 tag', () => {
    const summary = summarize(id3v2Tag({ major: 2, pictureBytes: 500 }));

    expect(summary.tagVersion).toBe('ID3v22');
    expect(summary.largestPictureBytes).toBe(500);
  });

  it('reads synchsafe frame sizes in a v2.4 tag', () => {
    const summary = summarize(id3v2Tag({ major: 4, pictureBytes: 2000 }));

    expect(summary.tagVersion).toBe('ID3v24');
    expect(summary.largestPictureBytes).toBe(2000);
  });

  it('reports no picture when the tag has none', () => {
    expect(summarize(id3v2Tag({ major: 3 })).largestPictureBytes).toBeUndefined();
  });

  it('lists frames up to the padding', () => {
    const tag = id3v2Tag({ major: 3, pictureBytes: 10, padding: 20 });
    const header = parseId3v2Header(tag);
    if (!header.ok) throw new Error(header.reason);

    const frames = listId3v2Frames(tag.subarray(ID3V2_HEADER_LENGTH), header.value);
    expect(frames.map((frame) => frame.id)).toEqual(['TIT2', 'APIC']);
  });
});

describe('parsePictureFrame', () => {
  it('skips a UTF-16 description', () => {
    const payload = Buffer.concat([
      Buffer.from([1]),
      Buffer.from('image/png\0', 'latin1'),
      Buffer.from([3, 0xff, 0xfe, 0x61, 0x00, 0x00, 0x00]),
      Buffer.from([1, 2, 3, 4]),
    ]);

    expect(parsePictureFrame(payload, false)).toEqual({
      ok: true,
      value: { mimeType: 'image/png', pictureType: 3, dataLength: 4 },
    });
  });

  it('fails on an unterminated MIME type', () => {
    const payload = Buffer.concat([Buffer.from([0]), Buffer.from('image/jpeg', 'latin1')]);

    expect(parsePictureFrame(payload, false)).toEqual({ ok: false, reason: 'unterminated MIME type' });
  });
});

describe('readTagLayout', () => {
  it('finds both tags and the audio between them', async () => {
    const tag = id3v2Tag({ major: 3 });
    const file = Buffer.concat([tag, Buffer.alloc(500), id3v1Tag()]);

    const result = await readTagLayout(bufferSource(file));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.tagVersion).toBe('ID3v23');
    expect(result.value.hasId3v1).toBe(true);
    expect(result.value.audioStart).toBe(tag.length);
    expect(result.value.audioEnd).toBe(file.length - 128);
  });

  it('classifies a trailer-only file as ID3v1Only', async () => {
    const result = await readTagLayout(bufferSource(Buffer.concat([Buffer.alloc(500), id3v1Tag()])));

    expect(result.ok && result.value.tagVersion).toBe('ID3v1Only');
  });

  it('classifies an untagged file as None', async () => {
    const result = await readTagLayout(bufferSource(Buffer.alloc(500)));

    expect(result.ok && result.value.tagVersion).toBe('None');
  });

  it('fails when the tag is larger than the file', async () => {
    const truncated = id3v2Tag({ major: 3, padding: 1000 }).subarray(0, 100);

    const result = await readTagLayout(bufferSource(truncated));

    expect(result).toEqual({ ok: false, reason: 'ID3v2 tag declares 1031 bytes but the file has 100' });
  });
});
