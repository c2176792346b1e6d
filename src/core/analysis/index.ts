/**
 * Log analysis module: ingestion, filtering, aggregation.
 *
 * analyzeLogFile() runs the whole pipeline for one file; the individual
 * stages are exported for library use and tests.
 */

export type {
  LogLevel,
  LogEntry,
  IngestionMode,
  IngestionResult,
  LogFilter,
  ErrorFrequency,
  LogStats,
  AggregateOptions,
} from './types.js';

export { LOG_LEVELS } from './types.js';

export {
  parseLogLine,
  parseLogLines,
  parseTimestamp,
  formatTimestamp,
  toLogLevel,
  createLogEntry,
  reviveLogEntries,
} from './line-parser.js';

export { readLogLines, getLogFileSize, classifyIoError } from './log-reader.js';

export {
  selectIngestionMode,
  shouldShowProgress,
  createIngestionStrategy,
  SequentialIngestion,
  ParallelIngestion,
  PARALLEL_THRESHOLD_BYTES,
  PROGRESS_THRESHOLD_BYTES,
} from './ingest.js';
export type { IngestionStrategy, IngestOptions, ModeSelection } from './ingest.js';

export { createParsePool, InlineParsePool, WorkerParsePool, chunkLines } from './parse-pool.js';
export type { ParsePool } from './parse-pool.js';

export { filterEntries, matchesFilter, renderEntry } from './log-filter.js';

export { aggregate, hourBucket, rankErrors } from './aggregator.js';

import { performance } from 'node:perf_hooks';
import type { IngestionMode, IngestionResult, LogFilter, LogStats } from './types.js';
import type { ProgressReporter } from '../ui/progress.js';
import { getLogFileSize } from './log-reader.js';
import {
  createIngestionStrategy,
  selectIngestionMode,
  shouldShowProgress,
  PARALLEL_THRESHOLD_BYTES,
  PROGRESS_THRESHOLD_BYTES,
} from './ingest.js';
import { filterEntries } from './log-filter.js';
import { aggregate } from './aggregator.js';
import { AnalyzerError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../logger.js';

/** Default number of top error messages. */
export const DEFAULT_TOP_N = 5;

/** Options for analyzeLogFile(). */
export interface AnalyzeOptions {
  filter?: LogFilter;
  /** Integer >= 1 (default 5) */
  topN?: number;
  /** Force parallel ingestion regardless of size */
  forceParallel?: boolean;
  parallelThresholdBytes?: number;
  progressThresholdBytes?: number;
  /** Parallel pool size; 0 or undefined for available parallelism */
  workers?: number;
  /**
   * Called with the input size once it passes the progress threshold.
   * May return undefined to decline (e.g. stderr is not a TTY).
   */
  createProgress?: (totalBytes: number) => ProgressReporter | undefined;
  /** Called once the input has been sized and the mode chosen */
  onStart?: (info: { sizeBytes: number; mode: IngestionMode }) => void;
}

/** Wall-clock milliseconds spent per phase. */
export interface AnalysisTimings {
  parseMs: number;
  analysisMs: number;
  totalMs: number;
}

/** Result of analyzeLogFile(): either stats, or nothing matched the filters. */
export type AnalysisOutcome =
  | { kind: 'stats'; stats: LogStats; ingestion: IngestionResult; timings: AnalysisTimings }
  | { kind: 'no-matches'; ingestion: IngestionResult; timings: AnalysisTimings };

/**
 * Reject top-N values that are not integers >= 1.
 */
export function validateTopN(topN: number): number {
  if (!Number.isInteger(topN) || topN < 1) {
    throw new AnalyzerError(ExitCode.INVALID_INPUT, `Top-N must be an integer of at least 1 (got ${topN})`);
  }
  return topN;
}

/**
 * Ingest, filter and aggregate one log file.
 *
 * An empty filtered batch is reported as `no-matches` instead of an
 * all-zero report.
 */
export async function analyzeLogFile(
  filePath: string,
  options: AnalyzeOptions = {},
): Promise<AnalysisOutcome> {
  const log = getLogger('analysis');
  const topN = validateTopN(options.topN ?? DEFAULT_TOP_N);
  const filter = options.filter ?? {};
  const start = performance.now();

  const sizeBytes = await getLogFileSize(filePath);
  const mode = selectIngestionMode({
    forceParallel: options.forceParallel,
    sizeBytes,
    thresholdBytes: options.parallelThresholdBytes ?? PARALLEL_THRESHOLD_BYTES,
  });
  options.onStart?.({ sizeBytes, mode });

  const progress = shouldShowProgress(sizeBytes, options.progressThresholdBytes ?? PROGRESS_THRESHOLD_BYTES)
    ? options.createProgress?.(sizeBytes)
    : undefined;

  const ingestion = await createIngestionStrategy(mode, options.workers).ingest(filePath, { progress });
  const parsedAt = performance.now();
  log.info(
    { file: filePath, sizeBytes, mode, entries: ingestion.entries.length, skipped: ingestion.skipped },
    'log file ingested',
  );

  const filtered = filterEntries(ingestion.entries, filter);
  if (filtered.length === 0) {
    const end = performance.now();
    log.info({ file: filePath }, 'no entries matched the filters');
    return {
      kind: 'no-matches',
      ingestion,
      timings: { parseMs: parsedAt - start, analysisMs: end - parsedAt, totalMs: end - start },
    };
  }

  const stats = aggregate(filtered, {
    topN,
    since: filter.since,
    until: filter.until,
    skipped: ingestion.skipped,
  });
  const end = performance.now();

  return {
    kind: 'stats',
    stats,
    ingestion,
    timings: { parseMs: parsedAt - start, analysisMs: end - parsedAt, totalMs: end - start },
  };
}
