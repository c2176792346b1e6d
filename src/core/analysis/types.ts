/**
 * Type definitions for the log analysis pipeline.
 *
 * Covers parsed entries, ingestion results, filter criteria,
 * and aggregated statistics.
 */

/** Severity levels recognised in a log line, in canonical spelling. */
export const LOG_LEVELS = ['INFO', 'WARNING', 'ERROR', 'DEBUG'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * A parsed log line.
 * `datetime` holds the wall-clock time of `timestamp` as UTC; no timezone
 * conversion is ever applied.
 */
export interface LogEntry {
  /** Timestamp exactly as written in the line */
  readonly timestamp: string;
  readonly datetime: Date;
  readonly level: LogLevel;
  /** Remainder of the line after the level token, verbatim */
  readonly message: string;
}

/** Which ingestion strategy produced a result. */
export type IngestionMode = 'sequential' | 'parallel';

/** Parsed entries of one source plus bookkeeping. */
export interface IngestionResult {
  /** Parsed entries, in source line order */
  entries: LogEntry[];
  /** Lines that did not match the log line grammar */
  skipped: number;
  mode: IngestionMode;
  /** Lines read from the source, including skipped ones */
  linesRead: number;
  bytesRead: number;
}

/**
 * Filter criteria for an entry batch.
 * All fields are optional; when multiple are provided, they are ANDed.
 */
export interface LogFilter {
  /** Keep only ERROR entries */
  errorsOnly?: boolean;
  /** Case-insensitive substring of "<timestamp> [<LEVEL>] <message>" */
  search?: string;
  /** Start time (inclusive) */
  since?: Date;
  /** End time (inclusive) */
  until?: Date;
}

/** One row of the top-errors ranking. */
export interface ErrorFrequency {
  message: string;
  count: number;
}

/** Aggregated statistics over a filtered batch. */
export interface LogStats {
  totalEntries: number;
  /** Only levels actually observed appear as keys */
  byLevel: Record<string, number>;
  topErrors: ErrorFrequency[];
  /** "HH:00" -> number of ERROR entries in that hour */
  errorsByHour: Record<string, number>;
  /** "HH:00" -> ERROR entries of that hour as a percentage of all filtered entries */
  errorRateByHour: Record<string, number>;
  /** Echoed lower bound, canonical form */
  since: string | null;
  /** Echoed upper bound, canonical form */
  until: string | null;
  skippedLines: number;
}

/** Options for aggregate(). */
export interface AggregateOptions {
  /** Number of top error messages; values below 1 count as 1 */
  topN: number;
  since?: Date;
  until?: Date;
  /** Unparsable line count from ingestion */
  skipped?: number;
}
