import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { run, type SessionOptions } from './session.js';
import { RecordingConverter } from './testing/recordingConverter.js';
import { captureConsole, ScriptedPrompter } from './testing/scriptedPrompter.js';

describe('run', () => {
  let dir: string;
  let outDir: string;
  let output: ReturnType<typeof captureConsole>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mediaconv-session-'));
    outDir = join(dir, 'out');
    await mkdir(outDir);
    output = captureConsole();
  });

  afterEach(async () => {
    output.restore();
    await rm(dir, { recursive: true, force: true });
  });

  function session(prompter: ScriptedPrompter, converter = new RecordingConverter()): SessionOptions {
    return { prompter, converter, scanDir: dir, clearScreen: false, reporter: {} };
  }

  async function addFiles(...names: string[]): Promise<void> {
    for (const name of names) {
      await writeFile(join(dir, name), 'data');
    }
  }

  it('converts all files of a format and exits cleanly', async () => {
    await addFiles('b.mp4', 'a.mp4', 'notes.txt');
    const prompter = new ScriptedPrompter([
      '1', // Convert media files
      '1', // mp4
      '3', // mkv
      '-1', // all files
      outDir,
      '', // Press Enter
      '0', // Exit
    ]);
    const converter = new RecordingConverter();

    const code = await run(session(prompter, converter));

    expect(code).toBe(0);
    expect(converter.calls).toEqual([
      { inputPath: join(dir, 'a.mp4'), outputPath: join(outDir, 'a.mkv') },
      { inputPath: join(dir, 'b.mp4'), outputPath: join(outDir, 'b.mkv') },
    ]);
    expect(output.lines()).toContain('✓ Conversion complete: 2 succeeded, 0 failed.');
    expect(output.lines()[output.lines().length - 1]).toBe('i Exiting program. Goodbye!');
    expect(prompter.remaining).toBe(0);
    expect(prompter.closed).toBe(true);
  });

  it('counts failures in the batch summary', async () => {
    await addFiles('a.flac', 'b.flac');
    const prompter = new ScriptedPrompter(['1', '1', '7', '-1', outDir, '', '0']);
    const converter = new RecordingConverter((inputPath) =>
      inputPath.endsWith('a.flac') ? { ok: false, reason: 'engine', detail: 'bad input' } : undefined
    );

    await expect(run(session(prompter, converter))).resolves.toBe(0);
    expect(output.lines()).toContain('✓ Conversion complete: 1 succeeded, 1 failed.');
  });

  it('fails when the directory holds no media', async () => {
    await addFiles('readme.md');
    const prompter = new ScriptedPrompter(['1']);

    const code = await run(session(prompter));

    expect(code).toBe(1);
    expect(output.lines()).toContain('✗ No media files found.');
    expect(prompter.closed).toBe(true);
  });

  it('summarises an empty batch when directory creation is declined', async () => {
    await addFiles('a.mp4');
    const missing = join(dir, 'missing');
    const prompter = new ScriptedPrompter(['1', '1', '3', '1', missing, 'n', '', '0']);
    const converter = new RecordingConverter();

    await expect(run(session(prompter, converter))).resolves.toBe(0);
    expect(converter.calls).toEqual([]);
    expect(output.lines()).toContain('✓ Conversion complete: 0 succeeded, 0 failed.');
    expect(await readdir(dir)).not.toContain('missing');
  });

  it('returns to the main menu from each step', async () => {
    await addFiles('a.mp4');
    const prompter = new ScriptedPrompter([
      '1', '0', // back from input formats
      '1', '1', 'back', // back from output formats
      '1', '1', '3', 'cancel', // back from file selection
      '', // Press Enter after "no files selected"
      '0',
    ]);
    const converter = new RecordingConverter();

    await expect(run(session(prompter, converter))).resolves.toBe(0);
    expect(converter.calls).toEqual([]);
    expect(output.lines()).toContain('i No files selected for conversion.');
    expect(prompter.remaining).toBe(0);
  });

  it('shows startup notices before the first menu', async () => {
    const prompter = new ScriptedPrompter(['', '0']);

    const code = await run({ ...session(prompter), notices: ['ffmpeg not found'] });

    expect(code).toBe(0);
    expect(output.lines()[0]).toBe('! ffmpeg not found');
    expect(prompter.questions).toEqual(['Press Enter to continue...', 'Select an option (0-1): ']);
  });

  it('treats the end of input as an exit', async () => {
    const prompter = new ScriptedPrompter(['1', '1']);
    await addFiles('a.mp4');

    const code = await run(session(prompter));

    expect(code).toBe(0);
    expect(output.lines()[output.lines().length - 1]).toBe('i Exiting program. Goodbye!');
  });

  it('reports an unexpected failure with exit code 1', async () => {
    await addFiles('a.mp4');
    const prompter = new ScriptedPrompter(['1', '1', '3', '1', outDir]);
    const converter = new RecordingConverter(() => {
      throw new Error('disk full');
    });

    const code = await run(session(prompter, converter));

    expect(code).toBe(1);
    expect(output.lines()).toContain('✗ An unexpected error occurred: disk full');
    expect(prompter.closed).toBe(true);
  });
});
