/**
 * Path Utilities
 */

import { extname, basename, dirname, join } from 'node:path';

/**
 * Sanitize a filename to be safe for filesystem
 */
export function sanitizeFilename(filename: string): string {
  return filename
    // Remove null bytes
    .replace(/\0/g, '')
    // Replace Windows reserved characters
    .replace(/[<>:"/\\|?*]/g, '_')
    // Replace control characters
    .replace(/[\x00-\x1f\x80-\x9f]/g, '')
    // Trim whitespace and dots
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .substring(0, 200);
}

/**
 * Drop the extension from a path, keeping its directory
 */
export function stripExtension(filePath: string): string {
  const ext = extname(filePath);
  return join(dirname(filePath), basename(filePath, ext));
}
