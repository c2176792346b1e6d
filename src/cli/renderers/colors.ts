/**
 * Terminal color utilities for the text report.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain text when color is not supported.
 */

/** Whether ANSI color escape codes should be used on this stream. */
export function colorSupported(stream: { isTTY?: boolean } = process.stdout): boolean {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return stream.isTTY === true;
}

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

export const BOLD = '\x1b[1m';
export const NC = '\x1b[0m';  // reset
export const RED = '\x1b[0;31m';
export const YELLOW = '\x1b[1;33m';

/** Map a level name to its color escape, or '' for uncolored levels. */
export function levelColor(level: string): string {
  switch (level) {
    case 'ERROR':   return RED;
    case 'WARNING': return YELLOW;
    default: return '';
  }
}

/**
 * Wrap every standalone ERROR / WARNING word in bold color.
 * Returns the text unchanged when `enabled` is false.
 */
export function colorizeLevels(text: string, enabled: boolean): string {
  if (!enabled) return text;
  return text.replace(/\b(ERROR|WARNING)\b/g, (word) => `${BOLD}${levelColor(word)}${word}${NC}`);
}
