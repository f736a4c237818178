/**
 * Subprocess helper shared by the platform backends
 */

import { CommandExecutionError } from '@drive-verify/core';
import type { CommandRunner } from '@drive-verify/utils';

const TOOL_TIMEOUT_MS = 10000;

/**
 * Run a volume tool and return its stdout; non-zero exits throw
 */
export async function runTool(runner: CommandRunner, command: string, args: string[]): Promise<string> {
  const result = await runner(command, args, { timeout: TOOL_TIMEOUT_MS, maxOutputSize: 256 * 1024 });
  if (result.timedOut) {
    throw new CommandExecutionError(command, -1, `timed out after ${TOOL_TIMEOUT_MS}ms`);
  }
  if (result.exitCode !== 0) {
    throw new CommandExecutionError(command, result.exitCode, result.stderr);
  }
  return result.stdout;
}

/**
 * "Key: value" lines into a map; keys are trimmed, the first occurrence wins
 */
export function parseColonLines(output: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const line of output.split(/\r?\n/)) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    const key = line.slice(0, colon).trim();
    if (!fields.has(key)) {
      fields.set(key, line.slice(colon + 1).trim());
    }
  }
  return fields;
}
