/**
 * Directory Scanner
 *
 * Finds convertible media files directly inside a directory.
 * Subdirectories are never entered.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, getExtension } from '@mediaconv/utils';
import {
  MEDIA_EXTENSIONS,
  isMediaExtension,
  type FilesByExtension,
  type MediaExtension,
  type MediaFile,
} from '@mediaconv/core';

const log = createLogger({ module: 'scanner' });

/**
 * List media files in a directory, in the order the directory yields them.
 * Hidden entries and anything that is not a regular file are skipped.
 */
export async function listMediaFiles(directory: string = '.'): Promise<MediaFile[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: MediaFile[] = [];

  for (const entry of entries) {
    if (!entry.isFile() || entry.name.startsWith('.')) {
      continue;
    }

    const extension = getExtension(entry.name);
    if (isMediaExtension(extension)) {
      files.push({ path: join(directory, entry.name), extension });
    }
  }

  return files;
}

/**
 * Group a directory's media files by extension.
 * Keys follow catalog order; extensions without matches are left out.
 */
export async function scanDirectory(directory: string = '.'): Promise<FilesByExtension> {
  const files = await listMediaFiles(directory);

  const grouped = new Map<MediaExtension, string[]>();
  for (const extension of MEDIA_EXTENSIONS) {
    const paths = files
      .filter((file) => file.extension === extension)
      .map((file) => file.path);

    if (paths.length > 0) {
      grouped.set(extension, paths);
    }
  }

  log.debug({ directory, files: files.length, formats: grouped.size }, 'Directory scanned');

  return grouped;
}
