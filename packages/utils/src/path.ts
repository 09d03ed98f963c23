/**
 * Path Utilities
 */

import { extname, basename, sep } from 'node:path';

/** Marker carried by the names of in-progress transcode outputs */
export const PARTIAL_OUTPUT_MARKER = '.vidbatch-partial';

/**
 * Replace characters that are not allowed in a single path segment
 */
export function sanitizeFilename(filename: string): string {
  return filename
    // Replace reserved characters (including separators)
    .replace(/[<>:"/\\|?*]/g, '_')
    // Replace control characters
    .replace(/[\x00-\x1f\x7f]/g, '_');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Normalise an extension to the dotted form: "mkv" and ".mkv" both give ".mkv"
 */
export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim();
  if (trimmed === '') return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * Convert a platform path to forward-slash form
 */
export function toPosixPath(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}
