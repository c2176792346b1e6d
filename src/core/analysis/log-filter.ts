/**
 * Entry filtering.
 *
 * Applies filter criteria to parsed LogEntry arrays.
 * All filter fields use AND logic when multiple are specified.
 */

import type { LogEntry, LogFilter } from './types.js';

/**
 * Canonical one-line rendering of an entry, the text `search` matches against.
 */
export function renderEntry(entry: LogEntry): string {
  return `${entry.timestamp} [${entry.level}] ${entry.message}`;
}

/**
 * Check if a single entry matches the filter criteria.
 * Time bounds are inclusive on both ends.
 */
export function matchesFilter(entry: LogEntry, filter: LogFilter): boolean {
  if (filter.errorsOnly === true && entry.level !== 'ERROR') return false;

  const time = entry.datetime.getTime();
  if (filter.since !== undefined && time < filter.since.getTime()) return false;

  if (filter.until !== undefined && time > filter.until.getTime()) return false;

  if (filter.search !== undefined) {
    if (!renderEntry(entry).toLowerCase().includes(filter.search.toLowerCase())) return false;
  }

  return true;
}

/**
 * Filter an array of parsed entries against criteria.
 * Returns a new array in the original order; entries are not copied.
 */
export function filterEntries(entries: readonly LogEntry[], filter: LogFilter): LogEntry[] {
  return entries.filter(entry => matchesFilter(entry, filter));
}
