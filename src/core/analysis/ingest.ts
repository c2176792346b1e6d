/**
 * Ingestion strategies: turn a log file into parsed entries plus a count
 * of unparsable lines.
 *
 * SequentialIngestion parses while streaming. ParallelIngestion reads all
 * lines first, then hands them to a ParsePool. The choice between them is
 * made by selectIngestionMode(), a pure function of the override flag and
 * the input size.
 */

import { parseLogLine } from './line-parser.js';
import { readLogLines } from './log-reader.js';
import { createParsePool, type ParsePool } from './parse-pool.js';
import type { IngestionMode, IngestionResult, LogEntry } from './types.js';
import type { ProgressReporter } from '../ui/progress.js';

const MIB = 1024 * 1024;

/** Inputs strictly larger than this are ingested in parallel by default. */
export const PARALLEL_THRESHOLD_BYTES = 10 * MIB;

/** Inputs of at least this size get a progress indicator by default. */
export const PROGRESS_THRESHOLD_BYTES = 5 * MIB;

/** Inputs to selectIngestionMode(). */
export interface ModeSelection {
  forceParallel?: boolean;
  sizeBytes: number;
  thresholdBytes?: number;
}

/**
 * Pick the ingestion mode: parallel when forced or when the input is
 * larger than the threshold, sequential otherwise.
 */
export function selectIngestionMode(selection: ModeSelection): IngestionMode {
  const threshold = selection.thresholdBytes ?? PARALLEL_THRESHOLD_BYTES;
  return selection.forceParallel === true || selection.sizeBytes > threshold
    ? 'parallel'
    : 'sequential';
}

/** Whether an input of this size warrants a progress indicator. */
export function shouldShowProgress(
  sizeBytes: number,
  thresholdBytes: number = PROGRESS_THRESHOLD_BYTES,
): boolean {
  return sizeBytes >= thresholdBytes;
}

/** Options shared by both strategies. */
export interface IngestOptions {
  /** Advanced by bytes read; finished once reading completes */
  progress?: ProgressReporter;
}

/** Reads one log file into an IngestionResult. */
export interface IngestionStrategy {
  readonly mode: IngestionMode;
  ingest(filePath: string, options?: IngestOptions): Promise<IngestionResult>;
}

export class SequentialIngestion implements IngestionStrategy {
  readonly mode = 'sequential' as const;

  async ingest(filePath: string, options?: IngestOptions): Promise<IngestionResult> {
    const entries: LogEntry[] = [];
    let skipped = 0;
    let linesRead = 0;
    let bytesRead = 0;

    try {
      const lines = readLogLines(filePath, {
        onBytes: (bytes) => {
          bytesRead += bytes;
          options?.progress?.advance(bytes);
        },
      });
      for await (const line of lines) {
        linesRead++;
        const entry = parseLogLine(line);
        if (entry) {
          entries.push(entry);
        } else {
          skipped++;
        }
      }
    } finally {
      options?.progress?.finish();
    }

    return { entries, skipped, mode: this.mode, linesRead, bytesRead };
  }
}

export class ParallelIngestion implements IngestionStrategy {
  readonly mode = 'parallel' as const;

  constructor(private readonly pool: ParsePool = createParsePool()) {}

  async ingest(filePath: string, options?: IngestOptions): Promise<IngestionResult> {
    const lines: string[] = [];
    let bytesRead = 0;

    try {
      const source = readLogLines(filePath, {
        onBytes: (bytes) => {
          bytesRead += bytes;
          options?.progress?.advance(bytes);
        },
      });
      for await (const line of source) {
        lines.push(line);
      }
    } finally {
      options?.progress?.finish();
    }

    const entries = await this.pool.parse(lines);
    return {
      entries,
      // Failures are inferred, not tracked per line
      skipped: Math.max(0, lines.length - entries.length),
      mode: this.mode,
      linesRead: lines.length,
      bytesRead,
    };
  }
}

/**
 * Build the strategy for a mode.
 * @param workers - Parallel pool size, 0 or undefined for available parallelism
 */
export function createIngestionStrategy(mode: IngestionMode, workers?: number): IngestionStrategy {
  return mode === 'parallel'
    ? new ParallelIngestion(createParsePool(workers))
    : new SequentialIngestion();
}
