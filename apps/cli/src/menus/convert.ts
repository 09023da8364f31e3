/**
 * Conversion Step
 *
 * Asks for the output directory, then converts the selected files one by one.
 */

import {
  DirectoryCreationError,
  type ConversionResult,
} from '@mediaconv/core';
import { convertBatch, type BatchReporter, type FileConverter } from '@mediaconv/processing';

import { printError, printInfo, printWarning } from '../lib/output.js';
import type { MenuContext } from './context.js';
import { promptOutputDirectory } from './outputDirectory.js';

export interface ConversionRequest {
  files: readonly string[];
  inputFormat: string;
  outputFormat: string;
}

const NOTHING_CONVERTED: ConversionResult = { succeeded: 0, failed: 0, cancelled: false };

export async function runConversion(
  ctx: MenuContext,
  converter: FileConverter,
  request: ConversionRequest,
  reporter: BatchReporter
): Promise<ConversionResult> {
  const { files, inputFormat, outputFormat } = request;
  if (files.length === 0) {
    return { ...NOTHING_CONVERTED };
  }

  let outputDir: string | undefined;
  try {
    const choice = await promptOutputDirectory(ctx);
    if (choice.kind === 'cancel') {
      printWarning('Conversion cancelled.');
      return { ...NOTHING_CONVERTED };
    }
    if (choice.kind === 'declined') {
      return { ...NOTHING_CONVERTED };
    }
    outputDir = choice.outputDir;
  } catch (error) {
    if (error instanceof DirectoryCreationError) {
      printError(`Error creating directory: ${error.message}`);
      return { ...NOTHING_CONVERTED };
    }
    throw error;
  }

  console.log();
  printInfo(`Converting ${files.length} file(s) from .${inputFormat} to .${outputFormat}...`);
  printInfo('Press Ctrl+C at any time to cancel the conversion process.');
  console.log();

  const controller = new AbortController();

  return ctx.prompter.withInterruptHandler(
    () => controller.abort(),
    () => convertBatch(converter, {
      files,
      outputFormat,
      outputDir,
      signal: controller.signal,
      reporter,
    })
  );
}
