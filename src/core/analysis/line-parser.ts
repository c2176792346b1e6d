/**
 * Log line parser.
 *
 * Parses lines of the form
 *   YYYY-MM-DD HH:MM:SS [LEVEL] message
 * into frozen LogEntry objects. Lines that do not match, carry an
 * impossible date, or an unknown level yield null; nothing here throws.
 */

import { LOG_LEVELS, type LogEntry, type LogLevel } from './types.js';

const LINE_PATTERN = /^(\d{4}-\d{2}-\d{2}\s+\d{2}:\d{2}:\d{2})\s+\[(\w+)\]\s+(.+)$/s;

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/;

/** Level tokens (uppercased) and the level they stand for. */
const LEVEL_ALIASES: ReadonlyMap<string, LogLevel> = new Map<string, LogLevel>([
  ...LOG_LEVELS.map((level): [string, LogLevel] => [level, level]),
  ['WARN', 'WARNING'],
]);

/** Milliseconds a leap second (`:60`) is stored with, on second 59. */
const LEAP_SECOND_MS = 999;

/**
 * Map a level token to its level, case-insensitively.
 * Returns null for tokens outside the alias table.
 */
export function toLogLevel(token: string): LogLevel | null {
  return LEVEL_ALIASES.get(token.toUpperCase()) ?? null;
}

/**
 * Parse "YYYY-MM-DD HH:MM:SS" (any run of whitespace between date and time)
 * into a Date carrying the wall-clock value as UTC.
 * A leap second (`:60`) is kept as `:59.999`, so it sorts after `:59` and
 * before the next minute.
 * Returns null when the shape is wrong or the date does not exist.
 */
export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (
    year === undefined || month === undefined || day === undefined
    || hour === undefined || minute === undefined || second === undefined
  ) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 60) return null;

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (second === 60) {
    date.setUTCHours(hour, minute, 59, LEAP_SECOND_MS);
  } else {
    date.setUTCHours(hour, minute, second, 0);
  }
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Render a Date in canonical "YYYY-MM-DD HH:MM:SS" form (UTC fields).
 * A stored leap second renders as `:60` again.
 */
export function formatTimestamp(date: Date): string {
  const leap = date.getUTCSeconds() === 59 && date.getUTCMilliseconds() === LEAP_SECOND_MS;
  const second = leap ? 60 : date.getUTCSeconds();
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`
    + ` ${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(second, 2)}`;
}

/**
 * Build a frozen LogEntry. Every entry, whichever thread parsed it,
 * is constructed here.
 */
export function createLogEntry(timestamp: string, datetime: Date, level: LogLevel, message: string): LogEntry {
  return Object.freeze({ timestamp, datetime, level, message });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Rebuild entries received from another thread (structured clone drops
 * the frozen state). Returns null when the payload is not a list of
 * well-formed entries.
 */
export function reviveLogEntries(payload: unknown): LogEntry[] | null {
  if (!Array.isArray(payload)) return null;
  const entries: LogEntry[] = [];
  for (const item of payload) {
    if (!isRecord(item)) return null;
    const { timestamp, datetime, level, message } = item;
    if (typeof timestamp !== 'string' || typeof message !== 'string') return null;
    if (!(datetime instanceof Date) || Number.isNaN(datetime.getTime())) return null;
    const canonical = typeof level === 'string' ? toLogLevel(level) : null;
    if (!canonical) return null;
    entries.push(createLogEntry(timestamp, datetime, canonical, message));
  }
  return entries;
}

/**
 * Parse a single log line (line terminator already stripped).
 */
export function parseLogLine(line: string): LogEntry | null {
  const match = LINE_PATTERN.exec(line);
  if (!match) return null;

  const [, timestamp, token, message] = match;
  if (timestamp === undefined || token === undefined || message === undefined) return null;

  const datetime = parseTimestamp(timestamp);
  if (!datetime) return null;

  const level = toLogLevel(token);
  if (!level) return null;

  return createLogEntry(timestamp, datetime, level, message);
}

/**
 * Parse multiple lines, skipping the ones that do not parse.
 */
export function parseLogLines(lines: readonly string[]): LogEntry[] {
  const entries: LogEntry[] = [];
  for (const line of lines) {
    const entry = parseLogLine(line);
    if (entry) entries.push(entry);
  }
  return entries;
}
