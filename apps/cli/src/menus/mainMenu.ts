/**
 * Main Menu
 */

import { printBanner, printError, printOption } from '../lib/output.js';
import { pause } from '../lib/prompt.js';
import { isKeyword } from '../lib/selection.js';
import { EXIT_KEYWORDS, type MenuContext } from './context.js';

export type MainMenuChoice = 'convert' | 'exit' | 'invalid';

export async function showMainMenu(ctx: MenuContext): Promise<MainMenuChoice> {
  printBanner(ctx.clearScreen);
  printOption(1, 'Convert media files');
  printOption(0, 'Exit program');
  console.log();

  const answer = (await ctx.prompter.ask('Select an option (0-1): ')).trim();

  if (answer === '0' || isKeyword(answer, EXIT_KEYWORDS)) {
    return 'exit';
  }
  if (answer === '1') {
    return 'convert';
  }

  printError('Invalid choice. Please try again.');
  await pause(ctx.prompter);
  return 'invalid';
}
