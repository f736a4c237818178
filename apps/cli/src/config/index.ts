/**
 * CLI Configuration
 *
 * Environment variables (optionally from a .env file in the working
 * directory) validated with zod. Command-line flags override them.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, resolveLimits, type VerifierLimits } from '@drive-verify/core';
import { safeReadFile } from '@drive-verify/utils';

dotenvConfig();

const envSchema = z.object({
  DRIVE_VERIFY_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  DRIVE_VERIFY_WORKERS: z
    .string()
    .regex(/^[1-9]\d*$/, 'must be a positive integer')
    .transform(Number)
    .optional(),
  DRIVE_VERIFY_OUTPUT_DIR: z.string().min(1).default('./logs'),
  DRIVE_VERIFY_LIMITS: z.string().min(1).optional(),
});

export interface CliConfig {
  logLevel: z.infer<typeof envSchema>['DRIVE_VERIFY_LOG_LEVEL'];
  workers?: number;
  outputDir: string;
  /** JSON file of limit overrides */
  limitsFile?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError('environment', details);
  }

  const data = parsed.data;
  return {
    logLevel: data.DRIVE_VERIFY_LOG_LEVEL,
    workers: data.DRIVE_VERIFY_WORKERS,
    outputDir: data.DRIVE_VERIFY_OUTPUT_DIR,
    limitsFile: data.DRIVE_VERIFY_LIMITS,
  };
}

/**
 * Parse a positive integer flag such as --workers
 */
export function parsePositiveInteger(field: string, value: string): number {
  if (!/^[1-9]\d*$/.test(value.trim())) {
    throw new ConfigurationError(field, `expected a positive integer, got "${value}"`);
  }
  return Number(value.trim());
}

/**
 * Default limits, with the overrides of `filePath` applied when given
 */
export async function loadLimits(filePath?: string): Promise<VerifierLimits> {
  if (!filePath) {
    return resolveLimits();
  }

  const absolute = resolve(filePath);
  const content = await safeReadFile(absolute);
  if (content === null) {
    throw new ConfigurationError('limits', `file not found: ${absolute}`);
  }

  let overrides: unknown;
  try {
    overrides = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError('limits', `${absolute} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return resolveLimits(overrides);
}
