/**
 * Command Execution Wrapper
 * 
 * Safe wrapper for executing external commands with:
 * - Timeout handling
 * - Output capture
 * - Error handling
 * - Signal forwarding
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

/**
 * Runs a command and resolves with its captured output.
 * Volume introspection tools print a few lines, so the defaults are small.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command safely
 * 
 * @param command - The command to execute
 * @param args - Command arguments
 * @returns Promise resolving to CommandResult; rejects only when the process cannot be spawned
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 15000,
    maxOutputSize = 1024 * 1024,
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, timeout);

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
}
