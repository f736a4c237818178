/**
 * Verifier Limits
 * 
 * Thresholds the head unit is known to enforce. The numbers come from
 * owner reports rather than published documentation, so every one of them
 * can be overridden from a JSON file or programmatically.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

const positiveInt = z.number().int().positive();

export const limitsSchema = z.object({
  maxTotalFiles: positiveInt.default(15000),
  maxRootFolders: positiveInt.default(1000),
  maxFilesPerFolder: positiveInt.default(254),
  maxNestingDepth: z.number().int().nonnegative().default(8),
  maxPathLength: positiveInt.default(60),
  maxFilenameLength: positiveInt.default(64),
  recommendedClusterSize: positiveInt.default(32768),

  minBitrateKbps: positiveInt.default(32),
  maxBitrateKbps: positiveInt.default(320),
  forbiddenBitratesKbps: z.array(positiveInt).default([144]),
  mp3SampleRates: z.array(positiveInt).default([32000, 44100, 48000]),
  minAacSampleRate: positiveInt.default(8000),
  maxAacSampleRate: positiveInt.default(96000),

  // 500x500 RGB, roughly 750 KB
  maxAlbumArtBytes: positiveInt.default(750000),

  // Besides ASCII letters, digits and space
  allowedFilenamePunctuation: z.string().default("-_.,'()[]&!+#"),

  // Frame headers compared when classifying CBR/VBR
  vbrSampleCount: z.number().int().min(2).max(64).default(8),
}).strict();

export type VerifierLimits = z.infer<typeof limitsSchema>;
export type VerifierLimitsInput = z.input<typeof limitsSchema>;

export const DEFAULT_LIMITS: VerifierLimits = limitsSchema.parse({});

/**
 * Validate overrides and fill in defaults
 */
export function resolveLimits(overrides: unknown = {}): VerifierLimits {
  const parsed = limitsSchema.safeParse(overrides ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError('limits', details);
  }
  return parsed.data;
}
