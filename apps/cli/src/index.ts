#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Interactive batch media converter. No flags, no subcommands: the menu
 * loop starts straight away and runs until the user exits.
 */

import 'dotenv/config';

import { FFmpeg } from '@mediaconv/processing';
import { logger, setLogLevel } from '@mediaconv/utils';

import { loadConfig } from './config/index.js';
import { printError } from './lib/output.js';
import { ReadlinePrompter } from './lib/prompt.js';
import { run } from './session.js';

async function main(): Promise<number> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  logger.debug({ config }, 'Configuration loaded');

  const prompter = new ReadlinePrompter();

  // Ctrl+C delivered as a signal (stdin not a terminal)
  process.on('SIGINT', () => prompter.interrupt());

  const ffmpeg = new FFmpeg({ ffmpegPath: config.ffmpegPath });
  const notices: string[] = [];
  if (!(await ffmpeg.isAvailable())) {
    notices.push(
      `ffmpeg not found at '${config.ffmpegPath}'. Conversions will fail until it is installed or FFMPEG_PATH is set.`
    );
  }

  return run({
    prompter,
    converter: ffmpeg,
    scanDir: config.scanDir,
    clearScreen: config.clearScreen,
    notices,
  });
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    printError(`An unexpected error occurred: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
