/**
 * Output Format Menu
 */

import { COMMON_OUTPUT_FORMATS } from '@mediaconv/core';

import { printBanner, printError, printHeader, printOption } from '../lib/output.js';
import { isKeyword, parseInteger } from '../lib/selection.js';
import type { MenuContext } from './context.js';

const COLUMNS = 4;
const CANCEL_KEYWORDS: readonly string[] = ['q', 'cancel', 'back'];

/**
 * Common formats laid out `COLUMNS` per row: "1. mp4  2. avi  3. mkv  4. mov"
 */
export function formatColumns(formats: readonly string[], columns: number = COLUMNS): string[] {
  const rows: string[] = [];
  for (let i = 0; i < formats.length; i += columns) {
    rows.push(
      formats
        .slice(i, i + columns)
        .map((format, j) => `${i + j + 1}. ${format}`)
        .join('  ')
    );
  }
  return rows;
}

/**
 * Pick the target format, without a leading dot. Resolves null on cancel.
 */
export async function selectOutputFormat(ctx: MenuContext): Promise<string | null> {
  printBanner(ctx.clearScreen);
  printHeader('Common output formats:');

  for (const row of formatColumns(COMMON_OUTPUT_FORMATS)) {
    console.log(row);
  }
  console.log();
  printOption('C', 'Custom format (enter your own)');
  printOption(0, 'Cancel/Go back');
  console.log();

  for (;;) {
    const answer = await ctx.prompter.ask('Select output format (number, C for custom, or 0 to cancel): ');
    const choice = parseInteger(answer);
    if (choice === 0 || isKeyword(answer, CANCEL_KEYWORDS)) {
      return null;
    }

    if (isKeyword(answer, ['c'])) {
      const custom = (await ctx.prompter.ask('Enter custom output format (without dot, or 0 to cancel): '))
        .trim()
        .toLowerCase();

      if (custom === '0') {
        return null;
      }
      if (custom.startsWith('.')) {
        printError('Enter the format without a leading dot.');
        continue;
      }
      if (custom.length > 0) {
        return custom;
      }
    } else {
      const selected = choice !== null && choice >= 1 ? COMMON_OUTPUT_FORMATS[choice - 1] : undefined;
      if (selected !== undefined) {
        return selected;
      }
    }

    printError('Invalid choice. Please try again.');
  }
}
