/**
 * Log sanitization utilities.
 *
 * Keeps home directory paths and long metadata strings out of console output.
 */

import { homedir } from 'os';

const homeDir = homedir();

/**
 * Truncate a string for safe logging.
 * Returns the first `maxLen` characters followed by "..." if truncated.
 */
export function truncateContent(text: string, maxLen = 64): string {
  if (text.length <= maxLen) return text;
  return text.substring(0, maxLen) + '...';
}

/**
 * Replace the user's home directory path with `~` in a string.
 */
export function sanitizePath(text: string, home: string = homeDir): string {
  if (!home) return text;
  return text.replaceAll(home, '~');
}

/**
 * Replace control characters other than tab and newline with '.'.
 */
export function stripControlChars(text: string): string {
  return text.replace(/[\u0000-\u0008\u000b-\u001f\u007f]/g, '.');
}

export function sanitizeForLog(message: string): string {
  return stripControlChars(sanitizePath(message));
}
