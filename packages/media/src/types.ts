/**
 * Audio Types
 * 
 * Result of probing one file. Produced once per file and not retained after
 * issues have been derived from it.
 */

export type AudioContainer =
  | 'MP3'
  | 'WMA'
  | 'AAC'
  | 'M4A'
  | 'M4B'
  | 'FLAC'
  | 'OGG'
  | 'WAV'
  | 'Unknown';

export type EncodingMode = 'CBR' | 'VBR' | 'Unknown';

export type TagVersion = 'None' | 'ID3v1Only' | 'ID3v22' | 'ID3v23' | 'ID3v24' | 'Other';

export interface AudioAnalysis {
  container: AudioContainer;
  bitrateKbps?: number;
  encodingMode?: EncodingMode;
  sampleRateHz?: number;
  tagVersion?: TagVersion;
  albumArtBytesEstimate?: number;
  drmDetected: boolean;
}

/**
 * How the file extension relates to the player:
 * - supported: parsed in full
 * - unsupported: a known audio format the player cannot decode
 * - not-audio: anything else (cover images, playlists, text files)
 */
export type FormatSupport = 'supported' | 'unsupported' | 'not-audio';

/**
 * - unreadable: the file could not be opened or read
 * - malformed: the bytes were read but a header did not parse
 */
export type ProbeFailureKind = 'unreadable' | 'malformed';

export interface ProbeFailure {
  kind: ProbeFailureKind;
  reason: string;
}

export interface ProbeResult {
  /** Lowercase extension without the dot */
  extension: string;
  support: FormatSupport;
  analysis: AudioAnalysis;
  /** Set when the file could not be read or parsed; the analysis is then incomplete */
  failure?: ProbeFailure;
}

/**
 * Outcome of parsing one binary structure
 */
export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export function parsed<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

export function parseFailure<T>(reason: string): ParseResult<T> {
  return { ok: false, reason };
}
