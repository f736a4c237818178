/**
 * Audio Rules
 *
 * Turns one probe result into issue records. Each rule looks at a single
 * property of the analysis; the limits decide the thresholds.
 */

import { createIssue, type IssueCategory, type IssueRecord, type IssueSeverity, type VerifierLimits } from '@drive-verify/core';
import type { AudioAnalysis, AudioContainer, ProbeResult, TagVersion } from '@drive-verify/media';

export interface RuleFinding {
  severity: IssueSeverity;
  message: string;
}

export interface AudioRule {
  id: string;
  name: string;
  category: IssueCategory;
  /** Containers the rule is evaluated for */
  containers: readonly AudioContainer[] | 'all';
  check: (analysis: AudioAnalysis, limits: VerifierLimits) => RuleFinding | undefined;
}

const MP4_FAMILY: readonly AudioContainer[] = ['AAC', 'M4A', 'M4B'];

const TAG_VERSION_FINDINGS: Partial<Record<TagVersion, string>> = {
  ID3v24: 'ID3v2.4 problematic, ID3v2.3 recommended',
  ID3v22: 'ID3v2.2 outdated, ID3v2.3 recommended',
  Other: 'Unrecognised ID3v2 version, ID3v2.3 recommended',
  ID3v1Only: 'No ID3v2 tags (ID3v1 only), ID3v2.3 recommended',
  None: 'No ID3 tags found',
};

export const AUDIO_RULES: readonly AudioRule[] = [
  {
    id: 'drm',
    name: 'DRM protection',
    category: 'EncodingMode',
    containers: 'all',
    check: (analysis) =>
      analysis.drmDetected
        ? { severity: 'error', message: 'likely DRM-protected, will not play' }
        : undefined,
  },
  {
    id: 'vbr',
    name: 'Constant bitrate',
    category: 'EncodingMode',
    containers: ['MP3'],
    check: (analysis) =>
      analysis.encodingMode === 'VBR'
        ? { severity: 'warning', message: 'VBR instead of CBR strongly discouraged' }
        : undefined,
  },
  {
    id: 'forbidden-bitrate',
    name: 'Forbidden bitrate',
    category: 'Bitrate',
    containers: ['MP3'],
    check: (analysis, limits) => {
      const bitrate = analysis.bitrateKbps;
      if (bitrate === undefined || !limits.forbiddenBitratesKbps.includes(bitrate)) {
        return undefined;
      }
      return { severity: 'error', message: `${bitrate} kbps is explicitly not supported` };
    },
  },
  {
    id: 'bitrate-range',
    name: 'Bitrate range',
    category: 'Bitrate',
    containers: ['MP3', 'WMA'],
    check: (analysis, limits) => {
      const bitrate = analysis.bitrateKbps;
      if (bitrate === undefined || (bitrate >= limits.minBitrateKbps && bitrate <= limits.maxBitrateKbps)) {
        return undefined;
      }
      return {
        // WMA bitrates come from the declared average and are less reliable
        severity: analysis.container === 'MP3' ? 'error' : 'warning',
        message: `Bitrate ${bitrate} kbps outside supported range (${limits.minBitrateKbps}-${limits.maxBitrateKbps})`,
      };
    },
  },
  {
    id: 'mp3-sample-rate',
    name: 'MP3 sample rate',
    category: 'SampleRate',
    containers: ['MP3'],
    check: (analysis, limits) => {
      const rate = analysis.sampleRateHz;
      if (rate === undefined || limits.mp3SampleRates.includes(rate)) {
        return undefined;
      }
      return {
        severity: 'warning',
        message: `Sample rate ${rate} Hz not supported (use ${limits.mp3SampleRates.join(', ')} Hz)`,
      };
    },
  },
  {
    id: 'aac-sample-rate',
    name: 'AAC sample rate',
    category: 'SampleRate',
    containers: MP4_FAMILY,
    check: (analysis, limits) => {
      const rate = analysis.sampleRateHz;
      if (rate === undefined || (rate >= limits.minAacSampleRate && rate <= limits.maxAacSampleRate)) {
        return undefined;
      }
      return {
        severity: 'warning',
        message: `Sample rate ${rate} Hz outside supported range (${limits.minAacSampleRate}-${limits.maxAacSampleRate})`,
      };
    },
  },
  {
    id: 'tag-version',
    name: 'ID3 tag version',
    category: 'TagVersion',
    containers: ['MP3'],
    check: (analysis) => {
      const message = analysis.tagVersion ? TAG_VERSION_FINDINGS[analysis.tagVersion] : undefined;
      return message ? { severity: 'warning', message } : undefined;
    },
  },
  {
    id: 'album-art',
    name: 'Embedded artwork size',
    category: 'AlbumArtSize',
    containers: 'all',
    check: (analysis, limits) => {
      const bytes = analysis.albumArtBytesEstimate;
      if (bytes === undefined || bytes <= limits.maxAlbumArtBytes) {
        return undefined;
      }
      return {
        severity: 'warning',
        message: `Large embedded artwork (${Math.floor(bytes / 1024)} KB, keep under ~${Math.round(limits.maxAlbumArtBytes / 1000)} KB)`,
      };
    },
  },
];

function appliesTo(rule: AudioRule, container: AudioContainer): boolean {
  return rule.containers === 'all' || rule.containers.includes(container);
}

/**
 * Issue records for one probed file. Files that are not audio yield nothing;
 * unsupported formats yield only the format record.
 */
export function evaluateAudio(
  relativePath: string,
  probe: ProbeResult,
  limits: VerifierLimits,
  rules: readonly AudioRule[] = AUDIO_RULES
): IssueRecord[] {
  const label = probe.extension.toUpperCase();

  if (probe.support === 'not-audio') {
    return [];
  }
  if (probe.support === 'unsupported') {
    return [createIssue(relativePath, 'UnsupportedFormat', 'error', `${label} format not supported`)];
  }

  const issues: IssueRecord[] = [];

  if (probe.failure) {
    issues.push(
      probe.failure.kind === 'unreadable'
        ? createIssue(relativePath, 'ReadError', 'error', `Cannot read file: ${probe.failure.reason}`)
        : createIssue(relativePath, 'ReadError', 'warning', `Error reading ${label}: ${probe.failure.reason}`)
    );
    // The extension alone can still tell us the file is protected
    if (probe.analysis.drmDetected) {
      issues.push(createIssue(relativePath, 'EncodingMode', 'error', 'likely DRM-protected, will not play'));
    }
    return issues;
  }

  for (const rule of rules) {
    if (!appliesTo(rule, probe.analysis.container)) {
      continue;
    }
    const finding = rule.check(probe.analysis, limits);
    if (finding) {
      issues.push(createIssue(relativePath, rule.category, finding.severity, finding.message));
    }
  }
  return issues;
}
