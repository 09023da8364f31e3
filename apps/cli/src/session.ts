/**
 * Interactive Session
 *
 * The main menu loop. Each pass scans, asks for formats and files, converts,
 * and comes back to the main menu; cancelling any step comes back early.
 */

import {
  InputClosedError,
  NoMediaFilesError,
  SessionStateMachine,
  UserInterruptError,
} from '@mediaconv/core';
import { scanDirectory } from '@mediaconv/media';
import type { BatchReporter, FileConverter } from '@mediaconv/processing';
import { createLogger } from '@mediaconv/utils';

import { printError, printInfo, printSuccess, printWarning } from './lib/output.js';
import { pause, type Prompter } from './lib/prompt.js';
import { createConsoleReporter } from './lib/reporter.js';
import type { MenuContext } from './menus/context.js';
import { runConversion } from './menus/convert.js';
import { selectFiles } from './menus/fileSelection.js';
import { selectInputFormat } from './menus/inputFormat.js';
import { showMainMenu } from './menus/mainMenu.js';
import { selectOutputFormat } from './menus/outputFormat.js';

const log = createLogger({ module: 'session' });

export interface SessionOptions {
  prompter: Prompter;
  converter: FileConverter;
  /** Directory scanned for media files */
  scanDir: string;
  clearScreen: boolean;
  reporter?: BatchReporter;
  /** Warnings shown once, before the first menu */
  notices?: readonly string[];
}

/**
 * One conversion pass, from scanning to the batch summary
 */
async function runConversionPass(
  ctx: MenuContext,
  machine: SessionStateMachine,
  options: SessionOptions
): Promise<void> {
  machine.transitionTo('SCANNING');
  const filesByExtension = await scanDirectory(options.scanDir);

  machine.transitionTo('SELECT_INPUT');
  const inputFormat = await selectInputFormat(ctx, filesByExtension, options.scanDir);
  if (inputFormat === null) {
    machine.reset('input format not chosen');
    return;
  }

  machine.transitionTo('SELECT_OUTPUT');
  const outputFormat = await selectOutputFormat(ctx);
  if (outputFormat === null) {
    machine.reset('output format not chosen');
    return;
  }

  machine.transitionTo('SELECT_FILES');
  const files = await selectFiles(ctx, inputFormat, filesByExtension.get(inputFormat) ?? []);
  if (files.length === 0) {
    printInfo('No files selected for conversion.');
    await pause(ctx.prompter);
    machine.reset('no files selected');
    return;
  }

  machine.transitionTo('CONVERTING');
  const result = await runConversion(
    ctx,
    options.converter,
    { files, inputFormat, outputFormat },
    options.reporter ?? createConsoleReporter()
  );

  console.log();
  printSuccess(`Conversion complete: ${result.succeeded} succeeded, ${result.failed} failed.`);
  await pause(ctx.prompter);
  machine.reset('batch finished');
}

/**
 * Run menus until the user exits. Fatal conditions are thrown.
 */
export async function runSession(options: SessionOptions): Promise<void> {
  const ctx: MenuContext = { prompter: options.prompter, clearScreen: options.clearScreen };
  const machine = new SessionStateMachine();

  if (options.notices && options.notices.length > 0) {
    options.notices.forEach(printWarning);
    await pause(ctx.prompter);
  }

  while (!machine.isTerminal()) {
    const choice = await showMainMenu(ctx);

    if (choice === 'exit') {
      machine.transitionTo('EXITED', 'user exit');
    } else if (choice === 'invalid') {
      machine.reset('invalid main menu choice');
    } else {
      await runConversionPass(ctx, machine, options);
    }
  }

  log.debug({ transitions: machine.getHistory().length }, 'Session ended');
}

/**
 * Run a session and map how it ended to a process exit code
 */
export async function run(options: SessionOptions): Promise<number> {
  try {
    await runSession(options);
    console.log();
    printInfo('Exiting program. Goodbye!');
    return 0;
  } catch (error) {
    if (error instanceof UserInterruptError || error instanceof InputClosedError) {
      console.log();
      printInfo('Exiting program. Goodbye!');
      return error.exitCode;
    }
    if (error instanceof NoMediaFilesError) {
      // Already shown by the input format menu
      return error.exitCode;
    }

    log.error({ err: error }, 'Session failed');
    printError(`An unexpected error occurred: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  } finally {
    options.prompter.close();
  }
}
