/**
 * Human-facing error formatting for the CLI (stderr).
 */

import { AnalyzerError } from './errors.js';

/**
 * Format an error for stderr: "Error: <message>", plus a "Fix:" line
 * when the error carries one.
 */
export function formatError(error: AnalyzerError | Error): string {
  const lines = [`Error: ${error.message}`];
  if (error instanceof AnalyzerError && error.fix) {
    lines.push(`  Fix: ${error.fix}`);
  }
  return lines.join('\n');
}
