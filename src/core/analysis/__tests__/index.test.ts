/**
 * Tests for the analyzeLogFile() pipeline.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { analyzeLogFile, validateTopN, parseTimestamp } from '../index.js';
import type { IngestionMode } from '../index.js';
import { ExitCode } from '../../../types/exit-codes.js';
import type { ProgressReporter } from '../../ui/progress.js';

const LINES = [
  '2024-01-15 10:00:00 [INFO] Server started',
  '2024-01-15 10:15:00 [ERROR] Database timeout',
  'corrupted line',
  '2024-01-15 10:45:00 [WARNING] Cache nearly full',
  '2024-01-15 11:05:00 [ERROR] Database timeout',
  '2024-01-15 11:10:00 [ERROR] Upstream unavailable',
  '2024-01-15 12:00:00 [DEBUG] heartbeat',
];

describe('validateTopN', () => {
  it('accepts positive integers', () => {
    expect(validateTopN(1)).toBe(1);
    expect(validateTopN(20)).toBe(20);
  });

  it('rejects zero, negatives and fractions', () => {
    for (const n of [0, -1, 2.5]) {
      expect(() => validateTopN(n)).toThrow(`Top-N must be an integer of at least 1 (got ${n})`);
    }
  });
});

describe('analyzeLogFile', () => {
  let tmpDir: string;
  let logPath: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'loglyzer-analyze-'));
    logPath = join(tmpDir, 'app.log');
    await writeFile(logPath, LINES.join('\n') + '\n');
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('produces stats for the whole file', async () => {
    const outcome = await analyzeLogFile(logPath);
    expect(outcome.kind).toBe('stats');
    if (outcome.kind !== 'stats') return;

    expect(outcome.stats.totalEntries).toBe(6);
    expect(outcome.stats.byLevel).toEqual({ INFO: 1, ERROR: 3, WARNING: 1, DEBUG: 1 });
    expect(outcome.stats.topErrors).toEqual([
      { message: 'Database timeout', count: 2 },
      { message: 'Upstream unavailable', count: 1 },
    ]);
    expect(outcome.stats.errorsByHour).toEqual({ '10:00': 1, '11:00': 2 });
    expect(outcome.stats.skippedLines).toBe(1);
    expect(outcome.ingestion.mode).toBe('sequential');
    expect(outcome.timings.totalMs).toBeGreaterThanOrEqual(0);
  });

  it('aggregates only the filtered entries', async () => {
    const since = parseTimestamp('2024-01-15 11:00:00') ?? undefined;
    const outcome = await analyzeLogFile(logPath, { filter: { errorsOnly: true, since } });
    expect(outcome.kind).toBe('stats');
    if (outcome.kind !== 'stats') return;

    expect(outcome.stats.totalEntries).toBe(2);
    expect(outcome.stats.byLevel).toEqual({ ERROR: 2 });
    expect(outcome.stats.errorRateByHour).toEqual({ '11:00': 100 });
    expect(outcome.stats.since).toBe('2024-01-15 11:00:00');
    expect(outcome.stats.until).toBeNull();
  });

  it('reports no-matches instead of empty stats', async () => {
    const outcome = await analyzeLogFile(logPath, { filter: { search: 'kernel panic' } });
    expect(outcome.kind).toBe('no-matches');
    expect(outcome.ingestion.entries).toHaveLength(6);
  });

  it('reports no-matches for a file with no valid lines', async () => {
    const junk = join(tmpDir, 'junk.log');
    await writeFile(junk, 'nothing\nparses\nhere\n');
    const outcome = await analyzeLogFile(junk);
    expect(outcome.kind).toBe('no-matches');
    expect(outcome.ingestion.skipped).toBe(3);
  });

  it('gives the same stats in forced parallel mode', async () => {
    const sequential = await analyzeLogFile(logPath, { topN: 1 });
    const parallel = await analyzeLogFile(logPath, { topN: 1, forceParallel: true, workers: 2 });
    expect(parallel.ingestion.mode).toBe('parallel');
    expect(sequential.kind === 'stats' && sequential.stats).toEqual(parallel.kind === 'stats' && parallel.stats);
  });

  it('reports the size and mode before ingesting', async () => {
    const seen: Array<{ sizeBytes: number; mode: IngestionMode }> = [];
    await analyzeLogFile(logPath, { parallelThresholdBytes: 10, onStart: info => seen.push(info) });
    const size = Buffer.byteLength(LINES.join('\n') + '\n');
    expect(seen).toEqual([{ sizeBytes: size, mode: 'parallel' }]);
  });

  it('asks for a progress reporter only past the progress threshold', async () => {
    const requested: number[] = [];
    const reporter: ProgressReporter = { advance: () => {}, finish: () => {} };
    const createProgress = (total: number): ProgressReporter => {
      requested.push(total);
      return reporter;
    };

    await analyzeLogFile(logPath, { createProgress });
    expect(requested).toEqual([]);

    await analyzeLogFile(logPath, { createProgress, progressThresholdBytes: 0 });
    expect(requested).toEqual([Buffer.byteLength(LINES.join('\n') + '\n')]);
  });

  it('rejects an invalid top-N before reading', async () => {
    await expect(analyzeLogFile(join(tmpDir, 'missing.log'), { topN: 0 })).rejects.toMatchObject({
      code: ExitCode.INVALID_INPUT,
    });
  });

  it('rejects a missing file with NOT_FOUND', async () => {
    await expect(analyzeLogFile(join(tmpDir, 'missing.log'))).rejects.toMatchObject({
      code: ExitCode.NOT_FOUND,
    });
  });
});
