/**
 * Format Catalogs
 *
 * Fixed tables of media extensions. The scan catalog decides which files are
 * offered for conversion; the common output list backs the output-format menu.
 */

export const VIDEO_EXTENSIONS = [
  'mp4', 'avi', 'mkv', 'mov', 'wmv', 'flv', 'webm', 'm4v', 'ts', '3gp',
] as const;

export const AUDIO_EXTENSIONS = [
  'mp3', 'wav', 'flac', 'aac', 'ogg', 'wma', 'm4a', 'opus',
] as const;

export const IMAGE_EXTENSIONS = [
  'jpg', 'jpeg', 'png', 'gif', 'bmp', 'tiff', 'webp',
] as const;

export const OTHER_MEDIA_EXTENSIONS = [
  'vob', 'mpg', 'mpeg', 'mxf', 'divx', 'm2ts',
] as const;

export type MediaExtension =
  | typeof VIDEO_EXTENSIONS[number]
  | typeof AUDIO_EXTENSIONS[number]
  | typeof IMAGE_EXTENSIONS[number]
  | typeof OTHER_MEDIA_EXTENSIONS[number];

/**
 * Every scannable extension, in catalog order
 */
export const MEDIA_EXTENSIONS: readonly MediaExtension[] = Object.freeze([
  ...VIDEO_EXTENSIONS,
  ...AUDIO_EXTENSIONS,
  ...IMAGE_EXTENSIONS,
  ...OTHER_MEDIA_EXTENSIONS,
]);

/**
 * Output formats offered by number in the output-format menu
 */
export const COMMON_OUTPUT_FORMATS = [
  // Video
  'mp4', 'avi', 'mkv', 'mov', 'webm', 'm4v',
  // Audio
  'mp3', 'wav', 'flac', 'aac', 'ogg', 'm4a',
  // Image
  'jpg', 'png', 'gif', 'webp',
] as const;

const EXTENSION_SET: ReadonlySet<string> = new Set(MEDIA_EXTENSIONS);

/**
 * Check whether an extension (lower-case, no dot) is in the scan catalog
 */
export function isMediaExtension(ext: string): ext is MediaExtension {
  return EXTENSION_SET.has(ext);
}
