import { describe, expect, it } from 'vitest';
import { cbrStream, id3v1Tag, id3v2Tag, mp3Stream, vbrHeaderFrame } from '../testing/fixtures.js';
import { bufferSource } from './byteSource.js';
import { findFrame, probeMp3 } from './mp3Probe.js';

const options = { sampleCount: 8 };

function repeat(bitrate: number, count: number): number[] {
  return Array.from({ length: count }, () => bitrate);
}

describe('findFrame', () => {
  it('skips a false sync whose successor is not a frame', async () => {
    const stream = cbrStream(128, 4);
    const file = Buffer.concat([Buffer.from([0xff, 0xfb, 0x90, 0x00, 0x00, 0x00]), stream]);

    const frame = await findFrame(bufferSource(file), 0, file.length, 4096);

    expect(frame?.offset).toBe(6);
  });

  it('returns undefined when nothing syncs', async () => {
    const file = Buffer.alloc(2048);

    expect(await findFrame(bufferSource(file), 0, file.length, 4096)).toBeUndefined();
  });
});

describe('probeMp3', () => {
  it('classifies agreeing frames as CBR', async () => {
    const result = await probeMp3(bufferSource(cbrStream(128, 40)), options);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.encodingMode).toBe('CBR');
    expect(result.value.bitrateKbps).toBe(128);
    expect(result.value.sampleRateHz).toBe(44100);
    expect(new Set(result.value.sampledBitratesKbps)).toEqual(new Set([128]));
    expect(result.value.vbrHeader).toBeUndefined();
  });

  it('classifies disagreeing frames as VBR', async () => {
    const stream = mp3Stream([...repeat(128, 20), ...repeat(192, 20)]);

    const result = await probeMp3(bufferSource(stream), options);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.encodingMode).toBe('VBR');
    expect(new Set(result.value.sampledBitratesKbps)).toEqual(new Set([128, 192]));
  });

  it('treats a Xing header as VBR even when every frame agrees', async () => {
    const file = Buffer.concat([
      vbrHeaderFrame({ bitrateKbps: 128, frameCount: 100, byteCount: 41700 }),
      cbrStream(128, 20),
    ]);

    const result = await probeMp3(bufferSource(file), options);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.encodingMode).toBe('VBR');
    expect(result.value.vbrHeader?.marker).toBe('Xing');
    expect(result.value.bitrateKbps).toBe(128);
  });

  it('reports the average declared by the Xing header', async () => {
    const file = Buffer.concat([
      vbrHeaderFrame({ bitrateKbps: 128, frameCount: 100, byteCount: 62600 }),
      cbrStream(192, 20),
    ]);

    const result = await probeMp3(bufferSource(file), options);

    expect(result.ok && result.value.bitrateKbps).toBe(192);
  });

  it('treats an Info header as VBR', async () => {
    const file = Buffer.concat([vbrHeaderFrame({ bitrateKbps: 128, marker: 'Info' }), cbrStream(128, 20)]);

    const result = await probeMp3(bufferSource(file), options);

    expect(result.ok && result.value.encodingMode).toBe('VBR');
  });

  it('reads 144 kbps MPEG-2 streams', async () => {
    const result = await probeMp3(bufferSource(cbrStream(144, 30, { version: '2' })), options);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.bitrateKbps).toBe(144);
    expect(result.value.sampleRateHz).toBe(22050);
    expect(result.value.encodingMode).toBe('CBR');
  });

  it('starts after the ID3v2 tag and stops before the ID3v1 trailer', async () => {
    const tag = id3v2Tag({ major: 4, pictureBytes: 300 });
    const file = Buffer.concat([tag, cbrStream(128, 12), id3v1Tag()]);

    const result = await probeMp3(bufferSource(file), options);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.firstFrame.offset).toBe(tag.length);
    expect(result.value.tags.tagVersion).toBe('ID3v24');
    expect(result.value.tags.hasId3v1).toBe(true);
    expect(result.value.tags.id3v2?.largestPictureBytes).toBe(300);
    expect(result.value.encodingMode).toBe('CBR');
  });

  it('fails when no frame header can be found', async () => {
    const result = await probeMp3(bufferSource(Buffer.alloc(5000)), options);

    expect(result).toEqual({ ok: false, reason: 'no valid MPEG audio frame header found' });
  });

  it('passes tag failures through', async () => {
    const truncated = id3v2Tag({ major: 3, padding: 1000 }).subarray(0, 200);

    const result = await probeMp3(bufferSource(truncated), options);

    expect(result).toEqual({ ok: false, reason: 'ID3v2 tag declares 1031 bytes but the file has 200' });
  });
});
