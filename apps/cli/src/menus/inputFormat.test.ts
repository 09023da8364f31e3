import { NoMediaFilesError, type MediaExtension } from '@mediaconv/core';

import { captureConsole, ScriptedPrompter } from '../testing/scriptedPrompter.js';
import { selectInputFormat } from './inputFormat.js';

const FILES = new Map<MediaExtension, string[]>([
  ['mp4', ['a.mp4', 'b.mp4']],
  ['flac', ['song.flac']],
]);

describe('selectInputFormat', () => {
  let output: ReturnType<typeof captureConsole>;

  beforeEach(() => {
    output = captureConsole();
  });

  afterEach(() => {
    output.restore();
  });

  it('lists extensions alphabetically with file counts', async () => {
    const prompter = new ScriptedPrompter(['1']);

    await selectInputFormat({ prompter, clearScreen: false }, FILES);

    expect(output.lines()).toEqual(expect.arrayContaining([
      'Available input formats in current directory:',
      '1. flac (1 file)',
      '2. mp4 (2 files)',
      '0. Back to main menu',
    ]));
  });

  it('returns the extension at the chosen position', async () => {
    const prompter = new ScriptedPrompter(['2']);

    await expect(selectInputFormat({ prompter, clearScreen: false }, FILES)).resolves.toBe('mp4');
  });

  it('re-prompts on invalid answers until one is valid', async () => {
    const prompter = new ScriptedPrompter(['abc', '5', '-1', '1']);

    const result = await selectInputFormat({ prompter, clearScreen: false }, FILES);

    expect(result).toBe('flac');
    expect(prompter.questions).toHaveLength(4);
    expect(output.lines().filter((line) => line.startsWith('✗'))).toEqual([
      '✗ Please enter a valid number.',
      '✗ Invalid choice. Please try again.',
      '✗ Invalid choice. Please try again.',
    ]);
  });

  it.each(['0', 'q', 'EXIT', ' Quit '])('goes back on %p', async (answer) => {
    const prompter = new ScriptedPrompter([answer]);

    await expect(selectInputFormat({ prompter, clearScreen: false }, FILES)).resolves.toBeNull();
  });

  it('fails with nothing to convert on an empty scan', async () => {
    const prompter = new ScriptedPrompter([]);

    await expect(selectInputFormat({ prompter, clearScreen: false }, new Map())).rejects.toThrow(NoMediaFilesError);
    expect(output.lines()).toContain('✗ No media files found.');
    expect(prompter.questions).toEqual([]);
  });

  it('names a scan directory other than the working directory', async () => {
    const prompter = new ScriptedPrompter(['0']);

    await selectInputFormat({ prompter, clearScreen: false }, FILES, '/srv/media');

    expect(output.lines()).toContain('Available input formats in /srv/media:');
  });
});
