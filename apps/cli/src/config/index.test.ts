import { ZodError } from 'zod';

import { loadConfig, parseConfig } from './index.js';

describe('parseConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(parseConfig({})).toEqual({
      nodeEnv: 'production',
      logLevel: 'warn',
      ffmpegPath: 'ffmpeg',
      scanDir: '.',
      clearScreen: true,
    });
  });

  it('reads overrides', () => {
    const config = parseConfig({
      NODE_ENV: 'development',
      LOG_LEVEL: 'debug',
      FFMPEG_PATH: '/usr/local/bin/ffmpeg',
      MEDIACONV_SCAN_DIR: '/srv/media',
      MEDIACONV_CLEAR_SCREEN: 'false',
    });

    expect(config).toEqual({
      nodeEnv: 'development',
      logLevel: 'debug',
      ffmpegPath: '/usr/local/bin/ffmpeg',
      scanDir: '/srv/media',
      clearScreen: false,
    });
  });

  it('rejects an unknown log level', () => {
    expect(() => parseConfig({ LOG_LEVEL: 'verbose' })).toThrow(ZodError);
  });

  it('rejects a clear-screen flag that is not true or false', () => {
    expect(() => parseConfig({ MEDIACONV_CLEAR_SCREEN: 'yes' })).toThrow(ZodError);
  });
});

describe('loadConfig', () => {
  const saved = process.env['LOG_LEVEL'];

  afterEach(() => {
    jest.restoreAllMocks();
    if (saved === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = saved;
    }
  });

  it('lets the workspace packages load before an invalid level is reported', async () => {
    process.env['LOG_LEVEL'] = 'verbose';
    const errors = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const exit = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    await jest.isolateModulesAsync(async () => {
      const processing = await import('@mediaconv/processing');
      expect(typeof processing.convertBatch).toBe('function');

      const config = await import('./index.js');
      expect(() => config.loadConfig()).toThrow('exit 1');
    });

    expect(exit).toHaveBeenCalledWith(1);
    expect(errors).toHaveBeenCalledWith('Invalid environment configuration:');
  });

  it('returns the parsed settings for a valid environment', () => {
    process.env['LOG_LEVEL'] = 'info';

    expect(loadConfig().logLevel).toBe('info');
  });
});
