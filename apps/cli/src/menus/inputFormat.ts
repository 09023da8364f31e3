/**
 * Input Format Menu
 */

import { NoMediaFilesError, type FilesByExtension, type MediaExtension } from '@mediaconv/core';

import { printBanner, printError, printHeader, printOption } from '../lib/output.js';
import { isKeyword, parseInteger } from '../lib/selection.js';
import { EXIT_KEYWORDS, type MenuContext } from './context.js';

/**
 * Pick the extension to convert from. Resolves null to go back to the main
 * menu; throws NoMediaFilesError when nothing was found.
 */
export async function selectInputFormat(
  ctx: MenuContext,
  filesByExtension: FilesByExtension,
  directory: string = '.'
): Promise<MediaExtension | null> {
  printBanner(ctx.clearScreen);
  printHeader(`Available input formats in ${directory === '.' ? 'current directory' : directory}:`);

  if (filesByExtension.size === 0) {
    const error = new NoMediaFilesError(directory);
    printError(error.message);
    throw error;
  }

  const extensions = [...filesByExtension.keys()].sort();

  extensions.forEach((ext, i) => {
    const count = filesByExtension.get(ext)?.length ?? 0;
    printOption(i + 1, `${ext} (${count} file${count > 1 ? 's' : ''})`);
  });
  console.log();
  printOption(0, 'Back to main menu');
  console.log();

  for (;;) {
    const answer = await ctx.prompter.ask('Select input format (number or 0 to exit): ');
    if (isKeyword(answer, EXIT_KEYWORDS)) {
      return null;
    }

    const choice = parseInteger(answer);
    if (choice === null) {
      printError('Please enter a valid number.');
      continue;
    }
    if (choice === 0) {
      return null;
    }

    const selected = extensions[choice - 1];
    if (choice >= 1 && selected !== undefined) {
      return selected;
    }
    printError('Invalid choice. Please try again.');
  }
}
