/**
 * Central report dispatch for CLI commands.
 *
 * Maps the resolved output format to its renderer.
 */

import type { LogStats } from '../../core/analysis/types.js';
import type { OutputFormat } from '../../types/config.js';
import { renderText, renderJson, renderCsv, type TextRenderOptions } from './stats.js';

export { renderText, renderJson, renderCsv, type TextRenderOptions } from './stats.js';
export { renderTable } from './table.js';
export { colorSupported, colorizeLevels } from './colors.js';

/** Printed instead of a report when the filters leave nothing. */
export const NO_MATCHES_MESSAGE = 'No entries match the given filters.';

type StatsRenderer = (stats: LogStats, options: TextRenderOptions) => string;

const renderers: Record<OutputFormat, StatsRenderer> = {
  text: renderText,
  json: (stats) => renderJson(stats),
  csv: (stats) => renderCsv(stats),
};

/**
 * Render stats in the requested format.
 */
export function renderReport(stats: LogStats, format: OutputFormat, options: TextRenderOptions): string {
  return renderers[format](stats, options);
}
