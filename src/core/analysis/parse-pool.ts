/**
 * Concurrent parsing of materialized lines.
 *
 * Lines are split into contiguous chunks, each parsed independently, and
 * the results concatenated in chunk order, so source order survives.
 * WorkerParsePool runs each chunk on its own worker thread; InlineParsePool
 * runs chunks as in-process tasks and is used when the compiled worker
 * script is not present (e.g. when running from TypeScript sources).
 */

import { Worker } from 'node:worker_threads';
import { existsSync } from 'node:fs';
import { availableParallelism } from 'node:os';
import { fileURLToPath } from 'node:url';
import { parseLogLines, reviveLogEntries } from './line-parser.js';
import { getLogger } from '../logger.js';
import type { LogEntry } from './types.js';

/** Parses a batch of lines, keeping only the successful parses. */
export interface ParsePool {
  readonly kind: 'worker' | 'inline';
  readonly size: number;
  parse(lines: readonly string[]): Promise<LogEntry[]>;
}

/**
 * Split lines into at most `count` contiguous, non-empty chunks of
 * near-equal size.
 */
export function chunkLines(lines: readonly string[], count: number): string[][] {
  if (lines.length === 0) return [];
  const chunkCount = Math.max(1, Math.min(count, lines.length));
  const size = Math.ceil(lines.length / chunkCount);
  const chunks: string[][] = [];
  for (let start = 0; start < lines.length; start += size) {
    chunks.push(lines.slice(start, start + size));
  }
  return chunks;
}

/** Resolve a configured worker count (0 = available parallelism). */
export function resolvePoolSize(workers?: number): number {
  if (workers !== undefined && workers > 0) return Math.floor(workers);
  return Math.max(1, availableParallelism());
}

export class InlineParsePool implements ParsePool {
  readonly kind = 'inline' as const;

  constructor(readonly size: number) {}

  async parse(lines: readonly string[]): Promise<LogEntry[]> {
    const chunks = chunkLines(lines, this.size);
    const results = await Promise.all(
      chunks.map(chunk => new Promise<LogEntry[]>(resolve => {
        setImmediate(() => resolve(parseLogLines(chunk)));
      })),
    );
    return results.flat();
  }
}

export class WorkerParsePool implements ParsePool {
  readonly kind = 'worker' as const;

  constructor(
    private readonly workerUrl: URL,
    readonly size: number,
  ) {}

  async parse(lines: readonly string[]): Promise<LogEntry[]> {
    const chunks = chunkLines(lines, this.size);
    const results = await Promise.all(chunks.map(chunk => this.runChunk(chunk)));
    return results.flat();
  }

  private runChunk(chunk: string[]): Promise<LogEntry[]> {
    return new Promise((resolve, reject) => {
      const worker = new Worker(this.workerUrl, { workerData: chunk });
      let settled = false;
      worker.once('message', (payload: unknown) => {
        settled = true;
        const entries = reviveLogEntries(payload);
        if (entries) {
          resolve(entries);
        } else {
          reject(new Error('Parse worker sent a malformed reply'));
        }
      });
      worker.once('error', (err: Error) => {
        settled = true;
        reject(err);
      });
      worker.once('exit', (code: number) => {
        if (!settled) {
          reject(new Error(`Parse worker exited with code ${code} before replying`));
        }
      });
    });
  }
}

/** URL of the compiled worker script next to this module. */
export function defaultWorkerUrl(): URL {
  return new URL('./parse-worker.js', import.meta.url);
}

/**
 * Create the parse pool for parallel ingestion.
 * Falls back to in-process tasks when the worker script does not exist.
 */
export function createParsePool(workers?: number, workerUrl: URL = defaultWorkerUrl()): ParsePool {
  const size = resolvePoolSize(workers);
  const log = getLogger('ingest');
  if (workerUrl.protocol === 'file:' && existsSync(fileURLToPath(workerUrl))) {
    log.debug({ size, kind: 'worker' }, 'parse pool created');
    return new WorkerParsePool(workerUrl, size);
  }
  log.debug({ size, kind: 'inline' }, 'parse pool created');
  return new InlineParsePool(size);
}
