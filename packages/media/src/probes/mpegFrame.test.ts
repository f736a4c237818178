import { describe, expect, it } from 'vitest';
import { mp3Frame, vbrHeaderFrame } from '../testing/fixtures.js';
import { averageBitrateKbps, findVbrHeader, parseFrameHeader } from './mpegFrame.js';

describe('parseFrameHeader', () => {
  it('decodes an MPEG-1 Layer III header', () => {
    const result = parseFrameHeader(mp3Frame({ bitrateKbps: 128 }), 0);

    expect(result).toEqual({
      ok: true,
      value: {
        version: '1',
        layer: 3,
        bitrateKbps: 128,
        sampleRateHz: 44100,
        padding: false,
        channelMode: 'stereo',
        crcProtected: false,
        samplesPerFrame: 1152,
        frameLength: 417,
      },
    });
  });

  it('decodes 144 kbps from the MPEG-2 table', () => {
    const result = parseFrameHeader(mp3Frame({ bitrateKbps: 144, version: '2' }), 0);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.bitrateKbps).toBe(144);
      expect(result.value.sampleRateHz).toBe(22050);
      expect(result.value.frameLength).toBe(470);
    }
  });

  it('rejects free-format and forbidden bitrate indexes', () => {
    expect(parseFrameHeader(Buffer.from([0xff, 0xfb, 0x00, 0x00]), 0)).toEqual({
      ok: false,
      reason: 'unsupported bitrate index 0',
    });
    expect(parseFrameHeader(Buffer.from([0xff, 0xfb, 0xf0, 0x00]), 0)).toEqual({
      ok: false,
      reason: 'unsupported bitrate index 15',
    });
  });

  it('rejects the reserved sample rate index', () => {
    expect(parseFrameHeader(Buffer.from([0xff, 0xfb, 0x9c, 0x00]), 0)).toEqual({
      ok: false,
      reason: 'reserved sample rate index',
    });
  });

  it('rejects missing sync and truncated input', () => {
    expect(parseFrameHeader(Buffer.from([0x00, 0xfb, 0x90, 0x00]), 0)).toEqual({ ok: false, reason: 'no frame sync' });
    expect(parseFrameHeader(Buffer.from([0xff, 0xfb]), 0)).toEqual({ ok: false, reason: 'truncated frame header' });
  });
});

describe('findVbrHeader', () => {
  it('reads the Xing frame and byte counts', () => {
    const frame = vbrHeaderFrame({ bitrateKbps: 128, frameCount: 100, byteCount: 41700 });
    const header = parseFrameHeader(frame, 0);
    expect(header.ok).toBe(true);
    if (!header.ok) return;

    const vbr = findVbrHeader(frame, 0, header.value);
    expect(vbr).toEqual({ marker: 'Xing', frameCount: 100, byteCount: 41700 });
    expect(vbr && averageBitrateKbps(vbr, header.value)).toBe(128);
  });

  it('finds an Info block after mono side information', () => {
    const frame = vbrHeaderFrame({ bitrateKbps: 64, mono: true, marker: 'Info' });
    const header = parseFrameHeader(frame, 0);
    expect(header.ok).toBe(true);
    if (!header.ok) return;

    expect(findVbrHeader(frame, 0, header.value)).toEqual({ marker: 'Info' });
  });

  it('reads a VBRI block', () => {
    const frame = vbrHeaderFrame({ bitrateKbps: 128, marker: 'VBRI', frameCount: 50, byteCount: 20000 });
    const header = parseFrameHeader(frame, 0);
    expect(header.ok).toBe(true);
    if (!header.ok) return;

    expect(findVbrHeader(frame, 0, header.value)).toEqual({ marker: 'VBRI', byteCount: 20000, frameCount: 50 });
  });

  it('returns undefined for a plain frame', () => {
    const frame = mp3Frame({ bitrateKbps: 192 });
    const header = parseFrameHeader(frame, 0);
    expect(header.ok).toBe(true);
    if (!header.ok) return;

    expect(findVbrHeader(frame, 0, header.value)).toBeUndefined();
  });

  it('has no average without both counts', () => {
    const frame = mp3Frame({ bitrateKbps: 128 });
    const header = parseFrameHeader(frame, 0);
    if (!header.ok) throw new Error(header.reason);

    expect(averageBitrateKbps({ marker: 'Xing', frameCount: 10 }, header.value)).toBeUndefined();
  });
});
