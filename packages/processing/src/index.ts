/**
 * @mediaconv/processing
 *
 * Conversion layer.
 *
 * RULES:
 * - One ffmpeg process at a time
 * - A failed file never stops the batch
 * - Cancellation is only observed between files
 */

// FFmpeg wrapper
export { FFmpeg, type FFmpegOptions, type FileConverter } from './ffmpeg.js';

// Batch conversion
export {
  convertBatch,
  createConversionJob,
  resolveOutputPath,
  type BatchOptions,
  type BatchReporter,
} from './batch.js';
