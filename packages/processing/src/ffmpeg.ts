/**
 * FFmpeg Wrapper
 *
 * Single-file conversion through the ffmpeg executable. The engine picks
 * container and codecs from the output extension.
 */

import { dirname } from 'node:path';
import {
  createLogger,
  ensureDir,
  executeCommand,
  type CommandRunner,
} from '@mediaconv/utils';
import { CommandExecutionError, type ConversionOutcome } from '@mediaconv/core';

const log = createLogger({ module: 'ffmpeg' });

export interface FFmpegOptions {
  ffmpegPath?: string;
  runner?: CommandRunner;
}

/**
 * Anything that turns one input file into one output file
 */
export interface FileConverter {
  convert(inputPath: string, outputPath: string): Promise<ConversionOutcome>;
}

export class FFmpeg implements FileConverter {
  private readonly ffmpegPath: string;
  private readonly runner: CommandRunner;

  constructor(options: FFmpegOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.runner = options.runner ?? executeCommand;
  }

  getPath(): string {
    return this.ffmpegPath;
  }

  /**
   * Arguments for a plain conversion: errors-only diagnostics, overwrite output
   */
  buildConvertArgs(inputPath: string, outputPath: string): string[] {
    return [
      '-hide_banner',
      '-loglevel', 'error',
      '-y',
      '-i', inputPath,
      outputPath,
    ];
  }

  /**
   * Convert one file. Failures are returned, never thrown.
   */
  async convert(inputPath: string, outputPath: string): Promise<ConversionOutcome> {
    const args = this.buildConvertArgs(inputPath, outputPath);

    try {
      await ensureDir(dirname(outputPath));

      log.debug({ command: this.ffmpegPath, args }, 'Running ffmpeg');
      const result = await this.runner(this.ffmpegPath, args);

      if (result.exitCode !== 0) {
        throw new CommandExecutionError(this.ffmpegPath, result.exitCode, result.stderr);
      }

      log.info({ inputPath, outputPath, duration: result.duration }, 'Conversion finished');
      return { ok: true, outputPath };
    } catch (error) {
      if (error instanceof CommandExecutionError) {
        log.warn({ inputPath, outputPath, ...error.details }, 'ffmpeg reported an error');
        return { ok: false, reason: 'engine', detail: error.diagnostic };
      }

      const detail = error instanceof Error ? error.message : String(error);
      log.error({ inputPath, outputPath, err: error }, 'Conversion could not run');
      return { ok: false, reason: 'unexpected', detail };
    }
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner(this.ffmpegPath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
