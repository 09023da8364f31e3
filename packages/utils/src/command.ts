/**
 * Command Execution Wrapper
 *
 * Runs an external executable with:
 * - Output capture
 * - Optional timeout
 * - Spawn errors surfaced as rejections
 *
 * A non-zero exit code is not an error here; callers inspect `exitCode`.
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
  timeout?: number; // milliseconds, none by default
  maxOutputSize?: number; // bytes
}

/**
 * Signature shared by `executeCommand` and the stand-ins used in tests
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command safely
 *
 * @param command - The executable to run
 * @param args - Command arguments
 */
export const executeCommand: CommandRunner = async (command, args, options = {}) => {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout,
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise<CommandResult>((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      // The child must not compete with the menus for stdin
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    const timeoutId = timeout === undefined
      ? undefined
      : setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, timeout);

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

    child.on('close', (code, signal) => {
      clearTimeout(timeoutId);

      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      reject(error);
    });
  });
};
