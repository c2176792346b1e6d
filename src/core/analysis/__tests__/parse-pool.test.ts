/**
 * Tests for the parse pool.
 */

import { describe, it, expect } from 'vitest';
import { chunkLines, createParsePool, InlineParsePool, WorkerParsePool, resolvePoolSize } from '../parse-pool.js';
import { parseLogLines } from '../line-parser.js';

const LINES = [
  '2024-01-15 10:00:00 [INFO] Server started',
  'noise',
  '2024-01-15 10:05:00 [ERROR] Database timeout',
  '2024-01-15 10:06:00 [DEBUG] retrying',
  '2024-01-15 10:07:00 [ERROR] Database timeout',
];

describe('chunkLines', () => {
  it('splits into contiguous near-equal chunks', () => {
    expect(chunkLines(['a', 'b', 'c', 'd', 'e'], 2)).toEqual([['a', 'b', 'c'], ['d', 'e']]);
  });

  it('never produces more chunks than lines', () => {
    expect(chunkLines(['a', 'b'], 8)).toEqual([['a'], ['b']]);
  });

  it('returns no chunks for no lines', () => {
    expect(chunkLines([], 4)).toEqual([]);
  });

  it('treats a count below 1 as a single chunk', () => {
    expect(chunkLines(['a', 'b', 'c'], 0)).toEqual([['a', 'b', 'c']]);
  });
});

describe('resolvePoolSize', () => {
  it('uses an explicit worker count', () => {
    expect(resolvePoolSize(3)).toBe(3);
  });

  it('falls back to available parallelism', () => {
    expect(resolvePoolSize(0)).toBeGreaterThanOrEqual(1);
    expect(resolvePoolSize()).toBeGreaterThanOrEqual(1);
  });
});

describe('InlineParsePool', () => {
  it('preserves source order across chunks', async () => {
    const lines = Array.from({ length: 10 }, (_, i) =>
      i % 3 === 0 ? `noise ${i}` : `2024-01-15 10:00:0${i} [INFO] line ${i}`);
    const entries = await new InlineParsePool(4).parse(lines);
    expect(entries.map(e => e.message)).toEqual([
      'line 1', 'line 2', 'line 4', 'line 5', 'line 7', 'line 8',
    ]);
  });

  it('returns nothing for no lines', async () => {
    expect(await new InlineParsePool(2).parse([])).toEqual([]);
  });
});

describe('WorkerParsePool', () => {
  const workerUrl = new URL('./fixtures/line-parse-worker.mjs', import.meta.url);

  it('runs on worker threads when the worker script exists', () => {
    const pool = createParsePool(2, workerUrl);
    expect(pool.kind).toBe('worker');
    expect(pool.size).toBe(2);
  });

  it('returns the sequential entries in source order, frozen', async () => {
    const entries = await createParsePool(3, workerUrl).parse(LINES);
    expect(entries).toEqual(parseLogLines(LINES));
    expect(entries.map(e => Object.isFrozen(e))).toEqual([true, true, true, true]);
  });

  it('rejects a malformed worker reply', async () => {
    const pool = new WorkerParsePool(new URL('./fixtures/malformed-reply-worker.mjs', import.meta.url), 1);
    await expect(pool.parse(['anything'])).rejects.toThrow('Parse worker sent a malformed reply');
  });
});

describe('createParsePool', () => {
  it('falls back to the inline pool when the worker script is missing', () => {
    const pool = createParsePool(2, new URL('file:///nonexistent/parse-worker.js'));
    expect(pool.kind).toBe('inline');
    expect(pool.size).toBe(2);
  });
});
