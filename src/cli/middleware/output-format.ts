/**
 * Shared CLI middleware for resolving the report format.
 *
 * An explicit --format flag wins; otherwise the configured default
 * (config file or LOGLYZER_FORMAT) applies.
 */

import type { OutputFormat } from '../../types/config.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'csv'];

/** A resolved format with its provenance. */
export interface FormatResolution {
  format: OutputFormat;
  source: 'flag' | 'config';
}

/**
 * Resolve the output format from the --format flag and the configured default.
 */
export function resolveFormat(flag: OutputFormat | undefined, configDefault: OutputFormat): FormatResolution {
  if (flag !== undefined) {
    return { format: flag, source: 'flag' };
  }
  return { format: configDefault, source: 'config' };
}
