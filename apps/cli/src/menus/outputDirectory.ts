/**
 * Output Directory Prompt
 */

import { DirectoryCreationError } from '@mediaconv/core';
import { ensureDir, pathExists } from '@mediaconv/utils';

import { isKeyword } from '../lib/selection.js';
import type { MenuContext } from './context.js';

export type OutputDirectoryChoice =
  | { kind: 'cancel' }
  | { kind: 'declined'; directory: string }
  | { kind: 'ready'; outputDir?: string };

const CANCEL_KEYWORDS: readonly string[] = ['cancel', 'exit', 'quit'];

/**
 * Ask where converted files go. An empty answer means the working directory.
 * A missing directory is created only when the user agrees; a directory that
 * cannot be created raises DirectoryCreationError.
 */
export async function promptOutputDirectory(ctx: MenuContext): Promise<OutputDirectoryChoice> {
  const directory = (await ctx.prompter.ask(
    "Enter output directory (leave empty for current directory, or 'cancel' to abort): "
  )).trim();

  if (isKeyword(directory, CANCEL_KEYWORDS)) {
    return { kind: 'cancel' };
  }
  if (directory === '') {
    return { kind: 'ready' };
  }
  if (await pathExists(directory)) {
    return { kind: 'ready', outputDir: directory };
  }

  const answer = await ctx.prompter.ask(`Directory '${directory}' doesn't exist. Create it? (y/n): `);
  if (!isKeyword(answer, ['y'])) {
    return { kind: 'declined', directory };
  }

  try {
    await ensureDir(directory);
  } catch (error) {
    throw new DirectoryCreationError(directory, error instanceof Error ? error.message : String(error));
  }
  return { kind: 'ready', outputDir: directory };
}
