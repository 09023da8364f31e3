import type { ConversionOutcome } from '@mediaconv/core';
import type { FileConverter } from '@mediaconv/processing';

/**
 * Converter for tests: records each call and answers with a fixed outcome
 */
export class RecordingConverter implements FileConverter {
  readonly calls: Array<{ inputPath: string; outputPath: string }> = [];

  constructor(
    private readonly onConvert?: (inputPath: string, outputPath: string) => ConversionOutcome | undefined
  ) {}

  async convert(inputPath: string, outputPath: string): Promise<ConversionOutcome> {
    this.calls.push({ inputPath, outputPath });
    return this.onConvert?.(inputPath, outputPath) ?? { ok: true, outputPath };
  }
}
