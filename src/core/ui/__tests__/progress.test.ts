/**
 * Tests for the terminal progress bar.
 */

import { describe, it, expect } from 'vitest';
import { ProgressBar, formatBytes } from '../progress.js';

class MemorySink {
  writes: string[] = [];
  write(chunk: string): boolean {
    this.writes.push(chunk);
    return true;
  }
}

describe('formatBytes', () => {
  it('uses binary units with one decimal', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MiB');
    expect(formatBytes(3 * 1024 * 1024 * 1024)).toBe('3.0 GiB');
  });
});

describe('ProgressBar', () => {
  it('redraws at most once per interval, and always on completion', () => {
    let clock = 0;
    const sink = new MemorySink();
    const bar = new ProgressBar(100, sink, { width: 10, now: () => clock });

    bar.advance(50);
    clock = 50;
    bar.advance(10);
    clock = 2000;
    bar.advance(20);
    clock = 2010;
    bar.advance(100);

    expect(sink.writes).toEqual([
      '\r[00:00:00] =====>---- 50 B/100 B',
      '\r[00:00:02] ========>- 80 B/100 B (eta 1s)',
      '\r[00:00:02] ========== 100 B/100 B',
    ]);
    expect(bar.position).toBe(100);
  });

  it('clears the line once on finish and ignores later advances', () => {
    const sink = new MemorySink();
    const bar = new ProgressBar(100, sink, { width: 10, now: () => 0 });
    bar.finish();
    bar.finish();
    bar.advance(10);
    expect(sink.writes).toEqual(['\r\x1b[2K']);
    expect(bar.position).toBe(0);
  });

  it('ignores non-positive increments', () => {
    const sink = new MemorySink();
    const bar = new ProgressBar(100, sink, { now: () => 0 });
    bar.advance(0);
    bar.advance(-5);
    expect(sink.writes).toEqual([]);
  });

  it('renders a full bar for an empty total', () => {
    const bar = new ProgressBar(0, new MemorySink(), { width: 4, now: () => 0 });
    expect(bar.render(0)).toBe('[00:00:00] ==== 0 B/0 B');
  });
});
