/**
 * Statistics over a filtered entry batch.
 */

import { formatTimestamp } from './line-parser.js';
import type { AggregateOptions, ErrorFrequency, LogEntry, LogStats } from './types.js';

/**
 * Hour bucket of a stored timestamp: the HH of the time field as "HH:00".
 * Purely lexical; returns null when there is no time field.
 */
export function hourBucket(timestamp: string): string | null {
  const time = timestamp.trim().split(/\s+/)[1];
  if (!time) return null;
  const hour = time.split(':')[0];
  return hour ? `${hour}:00` : null;
}

function increment(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}

/**
 * Rank error messages by count, descending, keeping at most `limit`.
 * Map iteration is insertion order and Array#sort is stable, so equal
 * counts keep first-seen order.
 */
export function rankErrors(frequencies: Map<string, number>, limit: number): ErrorFrequency[] {
  return Array.from(frequencies, ([message, count]) => ({ message, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(1, limit));
}

/**
 * Compute level counts, top errors and hourly error counts/rates.
 */
export function aggregate(entries: readonly LogEntry[], options: AggregateOptions): LogStats {
  const byLevel = new Map<string, number>();
  const errorMessages = new Map<string, number>();
  const errorsByHour = new Map<string, number>();

  for (const entry of entries) {
    increment(byLevel, entry.level);

    if (entry.level === 'ERROR') {
      increment(errorMessages, entry.message);
      const hour = hourBucket(entry.timestamp);
      if (hour) increment(errorsByHour, hour);
    }
  }

  const total = entries.length;
  const errorRateByHour: Record<string, number> = {};
  if (total > 0) {
    for (const [hour, count] of errorsByHour) {
      errorRateByHour[hour] = (count / total) * 100;
    }
  }

  return {
    totalEntries: total,
    byLevel: Object.fromEntries(byLevel),
    topErrors: rankErrors(errorMessages, options.topN),
    errorsByHour: Object.fromEntries(errorsByHour),
    errorRateByHour,
    since: options.since ? formatTimestamp(options.since) : null,
    until: options.until ? formatTimestamp(options.until) : null,
    skippedLines: options.skipped ?? 0,
  };
}
