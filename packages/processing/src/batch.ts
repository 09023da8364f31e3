/**
 * Batch Converter
 *
 * Converts a list of files one at a time. Cancellation is cooperative: the
 * signal is checked before each file, a conversion already running finishes.
 */

import { join } from 'node:path';
import { createLogger, getBasename } from '@mediaconv/utils';
import type { ConversionJob, ConversionOutcome, ConversionResult } from '@mediaconv/core';

import type { FileConverter } from './ffmpeg.js';

const log = createLogger({ module: 'batch' });

/**
 * Per-file notifications for whoever renders the batch
 */
export interface BatchReporter {
  onFileStart?(job: ConversionJob, index: number, total: number): void;
  onFileComplete?(job: ConversionJob, outcome: ConversionOutcome): void;
  onCancelled?(result: ConversionResult): void;
}

export interface BatchOptions {
  files: readonly string[];
  outputFormat: string;
  /** Directory for converted files; the working directory when empty */
  outputDir?: string;
  signal?: AbortSignal;
  reporter?: BatchReporter;
}

/**
 * `<outputDir>/<input name without extension>.<format>`
 */
export function resolveOutputPath(
  inputPath: string,
  outputFormat: string,
  outputDir?: string
): string {
  const filename = `${getBasename(inputPath)}.${outputFormat}`;
  return outputDir ? join(outputDir, filename) : filename;
}

export function createConversionJob(
  inputPath: string,
  outputFormat: string,
  outputDir?: string
): ConversionJob {
  return {
    inputPath,
    outputPath: resolveOutputPath(inputPath, outputFormat, outputDir),
    outputFormat,
  };
}

export async function convertBatch(
  converter: FileConverter,
  options: BatchOptions
): Promise<ConversionResult> {
  const { files, outputFormat, outputDir, signal, reporter } = options;
  const result: ConversionResult = { succeeded: 0, failed: 0, cancelled: false };

  for (const [i, inputPath] of files.entries()) {
    if (signal?.aborted) {
      result.cancelled = true;
      log.info({ ...result, remaining: files.length - i }, 'Batch cancelled');
      reporter?.onCancelled?.(result);
      return result;
    }

    const job = createConversionJob(inputPath, outputFormat, outputDir);
    reporter?.onFileStart?.(job, i + 1, files.length);

    const outcome = await converter.convert(job.inputPath, job.outputPath);
    if (outcome.ok) {
      result.succeeded++;
    } else {
      result.failed++;
    }

    reporter?.onFileComplete?.(job, outcome);
  }

  // Interrupted while the last file was converting
  if (signal?.aborted) {
    result.cancelled = true;
    reporter?.onCancelled?.(result);
  }

  log.info({ ...result, total: files.length }, 'Batch finished');
  return result;
}
