/**
 * Renderers for LogStats: text report, JSON and CSV.
 */

import type { LogStats } from '../../core/analysis/types.js';
import { colorizeLevels } from './colors.js';
import { renderTable } from './table.js';

/** Entries of a record sorted by key. */
function sortedEntries<T>(record: Record<string, T>): Array<[string, T]> {
  return Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

// ---------------------------------------------------------------------------
// text
// ---------------------------------------------------------------------------

export interface TextRenderOptions {
  /** Requested top-N, shown in the top errors heading */
  topN: number;
  /** Colorize ERROR / WARNING level names */
  color: boolean;
}

export function renderText(stats: LogStats, options: TextRenderOptions): string {
  const lines: string[] = [];
  lines.push('Log Analysis Results');
  lines.push('====================');
  lines.push('');
  lines.push(`Total entries: ${stats.totalEntries}`);
  lines.push('');

  if (stats.skippedLines > 0) {
    lines.push(`Skipped lines (invalid format): ${stats.skippedLines}`);
    lines.push('');
  }

  if (stats.since !== null || stats.until !== null) {
    lines.push('Filters applied:');
    if (stats.since !== null) lines.push(`- Since: ${stats.since}`);
    if (stats.until !== null) lines.push(`- Until: ${stats.until}`);
    lines.push('');
  }

  const levels = sortedEntries(stats.byLevel);
  if (levels.length > 0) {
    lines.push('Breakdown by level:');
    const rows = levels.map(([level, count]) => {
      const pct = stats.totalEntries > 0 ? (count / stats.totalEntries) * 100 : 0;
      return [level, String(count), `${pct.toFixed(1)}%`];
    });
    lines.push(renderTable(
      ['Level', 'Count', 'Percentage'],
      rows,
      (cell, col) => (col === 0 ? colorizeLevels(cell, options.color) : cell),
    ));
  }

  if (stats.topErrors.length > 0) {
    lines.push('');
    lines.push(`Top errors (max ${options.topN}):`);
    lines.push(renderTable(
      ['Error Message', 'Occurrences'],
      stats.topErrors.map(e => [e.message, String(e.count)]),
    ));
  }

  const hours = sortedEntries(stats.errorsByHour);
  if (hours.length > 0) {
    lines.push('');
    lines.push('Errors by hour:');
    lines.push(renderTable(['Hour', 'Count'], hours.map(([hour, count]) => [hour, String(count)])));
  }

  const rates = sortedEntries(stats.errorRateByHour);
  if (rates.length > 0) {
    lines.push('');
    lines.push('Error rate by hour:');
    lines.push(renderTable(['Hour', 'Error %'], rates.map(([hour, rate]) => [hour, `${rate.toFixed(2)}%`])));
  }

  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// json
// ---------------------------------------------------------------------------

export function renderJson(stats: LogStats): string {
  return JSON.stringify(stats, null, 2);
}

// ---------------------------------------------------------------------------
// csv
// ---------------------------------------------------------------------------

function quoteCsv(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * One `metric,key,value` table. Top error messages are always quoted;
 * rates carry four decimals.
 */
export function renderCsv(stats: LogStats): string {
  const rows: string[] = ['metric,key,value'];
  rows.push(`total,,${stats.totalEntries}`);
  if (stats.skippedLines > 0) rows.push(`skipped,,${stats.skippedLines}`);
  if (stats.since !== null) rows.push(`filter,since,${stats.since}`);
  if (stats.until !== null) rows.push(`filter,until,${stats.until}`);

  for (const [level, count] of sortedEntries(stats.byLevel)) {
    rows.push(`level,${level},${count}`);
  }
  for (const err of stats.topErrors) {
    rows.push(`top_error,${quoteCsv(err.message)},${err.count}`);
  }
  for (const [hour, count] of sortedEntries(stats.errorsByHour)) {
    rows.push(`error_by_hour,${hour},${count}`);
  }
  for (const [hour, rate] of sortedEntries(stats.errorRateByHour)) {
    rows.push(`error_rate_by_hour,${hour},${rate.toFixed(4)}`);
  }
  return rows.join('\n');
}
