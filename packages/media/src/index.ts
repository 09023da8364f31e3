/**
 * @mediaconv/media
 *
 * Media discovery layer.
 *
 * Responsibilities:
 * - Find convertible files in a directory by extension
 * - Group them per extension for the format menus
 */

export { scanDirectory, listMediaFiles } from './scanner.js';
