/**
 * @drive-verify/media
 * 
 * Audio analysis layer.
 * 
 * Responsibilities:
 * - Detect the container from the file extension
 * - Parse MPEG frame headers and classify CBR/VBR
 * - Read ID3 tag versions and embedded artwork sizes
 * - Read MP4 and ASF sample rates, bitrates and DRM markers
 * 
 * Everything is read from the file's own bytes; no external tools.
 */

// Combined probe
export { AudioProbe, type AudioProbeOptions } from './analyzer.js';

// Format table
export {
  lookupFormat,
  supportedExtensions,
  unsupportedExtensions,
  type FormatEntry,
} from './formats.js';

// Binary parsers
export { bufferSource, fileSource, type ByteSource } from './probes/byteSource.js';
export {
  parseFrameHeader,
  findVbrHeader,
  averageBitrateKbps,
  type FrameHeader,
  type VbrHeader,
  type MpegVersion,
  type MpegLayer,
} from './probes/mpegFrame.js';
export {
  parseId3v2Header,
  parsePictureFrame,
  listId3v2Frames,
  summarizeId3v2,
  type Id3v2Header,
  type Id3v2Summary,
  type PictureFrame,
} from './probes/id3.js';
export { readTagLayout, type TagLayout } from './probes/tags.js';
export { probeMp3, findFrame, type Mp3Info, type Mp3ProbeOptions } from './probes/mp3Probe.js';
export { probeMp4, type Mp4Info } from './probes/mp4.js';
export { probeAsf, type AsfInfo } from './probes/asf.js';
export { parseAdtsHeader, findAdtsHeader, type AdtsHeader } from './probes/adts.js';

// Types
export type {
  AudioContainer,
  AudioAnalysis,
  EncodingMode,
  TagVersion,
  FormatSupport,
  ProbeFailure,
  ProbeFailureKind,
  ProbeResult,
  ParseResult,
} from './types.js';
