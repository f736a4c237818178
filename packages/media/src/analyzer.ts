/**
 * Audio Probe
 *
 * Analyses one file from its bytes alone. The container is taken from the
 * extension; supported containers are then parsed structurally.
 *
 * `analyze` never rejects. Files that cannot be opened or read come back
 * with an `unreadable` failure, files whose headers do not parse with a
 * `malformed` one and `container: 'Unknown'`.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { MalformedHeaderError } from '@drive-verify/core';
import { createLogger, describeFsError, getExtension, type Logger } from '@drive-verify/utils';
import { lookupFormat, type FormatEntry } from './formats.js';
import { fileSource, type ByteSource } from './probes/byteSource.js';
import { probeMp3 } from './probes/mp3Probe.js';
import { probeMp4 } from './probes/mp4.js';
import { probeAsf } from './probes/asf.js';
import { findAdtsHeader } from './probes/adts.js';
import { readTagLayout } from './probes/tags.js';
import type { AudioAnalysis, ParseResult, ProbeResult } from './types.js';

export interface AudioProbeOptions {
  /** Frame headers compared for CBR/VBR classification */
  vbrSampleCount?: number;
  /** How far past the tag to look for the first audio frame */
  frameSearchBytes?: number;
  logger?: Logger;
}

const DEFAULT_VBR_SAMPLE_COUNT = 8;
const DEFAULT_FRAME_SEARCH_BYTES = 64 * 1024;

export class AudioProbe {
  private readonly vbrSampleCount: number;
  private readonly frameSearchBytes: number;
  private readonly logger: Logger;

  constructor(options: AudioProbeOptions = {}) {
    this.vbrSampleCount = options.vbrSampleCount ?? DEFAULT_VBR_SAMPLE_COUNT;
    this.frameSearchBytes = options.frameSearchBytes ?? DEFAULT_FRAME_SEARCH_BYTES;
    this.logger = options.logger ?? createLogger({ component: 'audio-probe' });
  }

  async analyze(filePath: string): Promise<ProbeResult> {
    const extension = getExtension(filePath);
    const format = lookupFormat(extension);
    const base: AudioAnalysis = { container: format.container, drmDetected: format.drm === true };

    if (format.support !== 'supported') {
      return { extension, support: format.support, analysis: base };
    }

    let handle: FileHandle | undefined;
    try {
      handle = await open(filePath, 'r');
      const { size } = await handle.stat();
      const analysis = await this.parse(fileSource(handle, size), format, filePath);
      return { extension, support: format.support, analysis };
    } catch (error) {
      if (error instanceof MalformedHeaderError) {
        this.logger.debug({ filePath, reason: error.reason }, 'Malformed audio header');
        return {
          extension,
          support: format.support,
          analysis: { container: 'Unknown', drmDetected: base.drmDetected },
          failure: { kind: 'malformed', reason: error.reason },
        };
      }
      const reason = describeFsError(error);
      this.logger.debug({ filePath, reason }, 'Audio file unreadable');
      return {
        extension,
        support: format.support,
        analysis: { container: 'Unknown', drmDetected: base.drmDetected },
        failure: { kind: 'unreadable', reason },
      };
    } finally {
      await handle?.close().catch((error: unknown) => {
        this.logger.debug({ filePath, error: describeFsError(error) }, 'Failed to close audio file');
      });
    }
  }

  private async parse(source: ByteSource, format: FormatEntry, filePath: string): Promise<AudioAnalysis> {
    switch (format.container) {
      case 'MP3':
        return this.parseMp3(source, filePath);
      case 'WMA':
        return this.parseWma(source, filePath);
      case 'AAC':
        return (await isMp4(source)) ? this.parseMp4(source, format, filePath) : this.parseAdts(source, filePath);
      case 'M4A':
      case 'M4B':
        return this.parseMp4(source, format, filePath);
      default:
        return { container: format.container, drmDetected: false };
    }
  }

  private async parseMp3(source: ByteSource, filePath: string): Promise<AudioAnalysis> {
    const info = unwrap(
      filePath,
      await probeMp3(source, {
        sampleCount: this.vbrSampleCount,
        firstFrameSearchBytes: this.frameSearchBytes,
      })
    );
    return {
      container: 'MP3',
      bitrateKbps: info.bitrateKbps,
      encodingMode: info.encodingMode,
      sampleRateHz: info.sampleRateHz,
      tagVersion: info.tags.tagVersion,
      albumArtBytesEstimate: info.tags.id3v2?.largestPictureBytes,
      drmDetected: false,
    };
  }

  private async parseAdts(source: ByteSource, filePath: string): Promise<AudioAnalysis> {
    const tags = unwrap(filePath, await readTagLayout(source));
    const header = unwrap(filePath, await findAdtsHeader(source, tags.audioStart, this.frameSearchBytes));
    return {
      container: 'AAC',
      sampleRateHz: header.sampleRateHz,
      tagVersion: tags.tagVersion,
      albumArtBytesEstimate: tags.id3v2?.largestPictureBytes,
      drmDetected: false,
    };
  }

  private async parseMp4(source: ByteSource, format: FormatEntry, filePath: string): Promise<AudioAnalysis> {
    const info = unwrap(filePath, await probeMp4(source));
    return {
      container: format.container,
      sampleRateHz: info.sampleRateHz,
      albumArtBytesEstimate: info.coverArtBytes,
      drmDetected: info.drmDetected || format.drm === true,
    };
  }

  private async parseWma(source: ByteSource, filePath: string): Promise<AudioAnalysis> {
    const info = unwrap(filePath, await probeAsf(source));
    return {
      container: 'WMA',
      bitrateKbps: info.bitrateKbps,
      sampleRateHz: info.sampleRateHz,
      drmDetected: info.drmDetected,
    };
  }
}

function unwrap<T>(filePath: string, result: ParseResult<T>): T {
  if (!result.ok) {
    throw new MalformedHeaderError(filePath, result.reason);
  }
  return result.value;
}

async function isMp4(source: ByteSource): Promise<boolean> {
  const head = await source.read(4, 4);
  return head.toString('latin1') === 'ftyp';
}
