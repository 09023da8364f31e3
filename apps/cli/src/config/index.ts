/**
 * CLI Configuration
 *
 * Read from the environment (and `.env`, loaded by the entry point).
 */

import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

// Environment schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),

  // Media tools
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),

  // Session
  MEDIACONV_SCAN_DIR: z.string().min(1).default('.'),
  MEDIACONV_CLEAR_SCREEN: booleanString,
});

export interface CliConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  ffmpegPath: string;
  scanDir: string;
  clearScreen: boolean;
}

/**
 * Validate an environment; throws a ZodError when it is invalid
 */
export function parseConfig(source: NodeJS.ProcessEnv): CliConfig {
  const env = envSchema.parse(source);

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    ffmpegPath: env.FFMPEG_PATH,
    scanDir: env.MEDIACONV_SCAN_DIR,
    clearScreen: env.MEDIACONV_CLEAR_SCREEN,
  };
}

/**
 * Configuration for this process; exits on invalid settings
 */
export function loadConfig(): CliConfig {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Invalid environment configuration:');
      console.error(error.format());
      process.exit(1);
    }
    throw error;
  }
}
