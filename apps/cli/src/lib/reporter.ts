/**
 * Batch Progress
 *
 * One spinner per file, settled into a success or failure line.
 */

import ora from 'ora';
import { basename } from 'node:path';
import type { BatchReporter } from '@mediaconv/processing';

import { printWarning } from './output.js';

export function createConsoleReporter(
  stream: NodeJS.WritableStream = process.stdout
): BatchReporter {
  let spinner: ora.Ora | undefined;

  return {
    onFileStart(job, index, total) {
      spinner = ora({
        text: `[${index}/${total}] Converting: ${basename(job.inputPath)}`,
        stream,
        // readline keeps stdin; Ctrl+C has to reach it
        discardStdin: false,
      }).start();
    },

    onFileComplete(job, outcome) {
      const current = spinner ?? ora({ stream, discardStdin: false });
      spinner = undefined;

      if (outcome.ok) {
        current.succeed(`Conversion successful: ${outcome.outputPath}`);
      } else if (outcome.reason === 'engine') {
        current.fail(`Error converting ${job.inputPath}: ${outcome.detail}`);
      } else {
        current.fail(`Unexpected error converting ${job.inputPath}: ${outcome.detail}`);
      }
    },

    onCancelled() {
      spinner?.stop();
      spinner = undefined;
      printWarning('Conversion process cancelled by user.');
    },
  };
}
