/**
 * Conversion Types
 */

import type { MediaExtension } from './formats.js';

/**
 * A discovered media file
 */
export interface MediaFile {
  readonly path: string;
  readonly extension: MediaExtension;
}

/**
 * Discovered files grouped by extension, in catalog order
 */
export type FilesByExtension = ReadonlyMap<MediaExtension, readonly string[]>;

/**
 * One input file paired with where its converted copy goes
 */
export interface ConversionJob {
  inputPath: string;
  outputPath: string;
  outputFormat: string;
}

/**
 * Result of a single engine invocation
 */
export type ConversionOutcome =
  | { ok: true; outputPath: string }
  | { ok: false; reason: 'engine' | 'unexpected'; detail: string };

/**
 * Tally for one batch
 */
export interface ConversionResult {
  succeeded: number;
  failed: number;
  cancelled: boolean;
}
