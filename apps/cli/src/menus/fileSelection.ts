/**
 * File Selection Menu
 */

import { basename } from 'node:path';

import { printBanner, printError, printHeader, printOption } from '../lib/output.js';
import { parseFileSelection } from '../lib/selection.js';
import type { MenuContext } from './context.js';

/**
 * Pick which files of the chosen format to convert. An empty result means
 * the user cancelled.
 */
export async function selectFiles(
  ctx: MenuContext,
  inputFormat: string,
  files: readonly string[]
): Promise<string[]> {
  const sorted = [...files].sort();

  printBanner(ctx.clearScreen);
  printHeader(`Files with .${inputFormat} extension:`);

  sorted.forEach((file, i) => printOption(i + 1, basename(file)));
  console.log();
  printOption(-1, 'Convert ALL files');
  printOption(' 0', 'Cancel/Go back');
  console.log();

  const pick = (index: number): string[] => {
    const file = sorted[index - 1];
    return file === undefined ? [] : [file];
  };

  for (;;) {
    const answer = await ctx.prompter.ask(
      'Select file to convert (number, -1 for all, comma-separated list, or 0 to cancel): '
    );
    const selection = parseFileSelection(answer, sorted.length);

    switch (selection.kind) {
      case 'cancel':
        selection.rejected?.forEach((index) => printError(`Invalid selection: ${index}`));
        return [];
      case 'all':
        return sorted;
      case 'single':
        return pick(selection.index);
      case 'list': {
        for (const index of selection.rejected) {
          printError(`Invalid selection: ${index}`);
        }
        if (selection.indices.length > 0) {
          return selection.indices.flatMap(pick);
        }
        printError('Invalid choice. Please try again.');
        break;
      }
      case 'invalid':
        printError('Invalid choice. Please try again.');
        break;
      case 'malformed':
        printError('Please enter a valid number or comma-separated list.');
        break;
    }
  }
}
