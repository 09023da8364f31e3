import type { Prompter } from '../lib/prompt.js';

/**
 * What every menu screen needs
 */
export interface MenuContext {
  prompter: Prompter;
  /** Clear the terminal before each screen */
  clearScreen: boolean;
}

export const EXIT_KEYWORDS: readonly string[] = ['q', 'exit', 'quit'];
