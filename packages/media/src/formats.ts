/**
 * Format Table
 *
 * Extension-first container detection. Supported formats are parsed; known
 * audio formats the player cannot decode are flagged without parsing.
 */

import type { AudioContainer, FormatSupport } from './types.js';

export interface FormatEntry {
  container: AudioContainer;
  support: FormatSupport;
  /** Extension alone implies DRM */
  drm?: boolean;
}

const FORMATS: Readonly<Record<string, FormatEntry>> = {
  mp3: { container: 'MP3', support: 'supported' },
  wma: { container: 'WMA', support: 'supported' },
  aac: { container: 'AAC', support: 'supported' },
  m4a: { container: 'M4A', support: 'supported' },
  m4b: { container: 'M4B', support: 'supported' },
  m4p: { container: 'M4A', support: 'supported', drm: true },
  flac: { container: 'FLAC', support: 'unsupported' },
  ogg: { container: 'OGG', support: 'unsupported' },
  wav: { container: 'WAV', support: 'unsupported' },
  ape: { container: 'Unknown', support: 'unsupported' },
  alac: { container: 'Unknown', support: 'unsupported' },
};

const NOT_AUDIO: FormatEntry = { container: 'Unknown', support: 'not-audio' };

export function lookupFormat(extension: string): FormatEntry {
  return Object.hasOwn(FORMATS, extension) ? (FORMATS[extension] ?? NOT_AUDIO) : NOT_AUDIO;
}

export function supportedExtensions(): string[] {
  return Object.keys(FORMATS).filter((ext) => FORMATS[ext]?.support === 'supported');
}

export function unsupportedExtensions(): string[] {
  return Object.keys(FORMATS).filter((ext) => FORMATS[ext]?.support === 'unsupported');
}
