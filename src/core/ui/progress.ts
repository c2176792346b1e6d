/**
 * Byte-driven terminal progress bar.
 *
 * Renders `[HH:MM:SS] ====>---- 1.5 MiB/4.0 MiB (eta 3s)` on a single
 * line, redrawn in place with a carriage return. Purely a side channel:
 * nothing it does feeds back into ingestion.
 */

/** Receives bytes-consumed increments from ingestion. */
export interface ProgressReporter {
  advance(bytes: number): void;
  finish(): void;
}

/** Minimal writable sink (process.stderr fits). */
export interface ProgressSink {
  write(chunk: string): boolean;
}

export interface ProgressBarOptions {
  /** Bar width in characters (default 40) */
  width?: number;
  /** Minimum milliseconds between redraws (default 100) */
  redrawIntervalMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

/** Format a byte count with binary units. */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GiB`;
}

function formatElapsed(ms: number): string {
  const total = Math.floor(ms / 1000);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return [h, m, s].map(v => String(v).padStart(2, '0')).join(':');
}

export class ProgressBar implements ProgressReporter {
  private current = 0;
  private lastDraw = Number.NEGATIVE_INFINITY;
  private finished = false;
  private readonly startedAt: number;
  private readonly width: number;
  private readonly redrawIntervalMs: number;
  private readonly now: () => number;

  constructor(
    private readonly total: number,
    private readonly sink: ProgressSink,
    options?: ProgressBarOptions,
  ) {
    this.width = options?.width ?? 40;
    this.redrawIntervalMs = options?.redrawIntervalMs ?? 100;
    this.now = options?.now ?? Date.now;
    this.startedAt = this.now();
  }

  /** Bytes consumed so far (clamped to the total). */
  get position(): number {
    return this.current;
  }

  advance(bytes: number): void {
    if (this.finished || bytes <= 0) return;
    this.current = Math.min(this.total, this.current + bytes);
    const t = this.now();
    if (t - this.lastDraw >= this.redrawIntervalMs || this.current === this.total) {
      this.lastDraw = t;
      this.sink.write(`\r${this.render(t)}`);
    }
  }

  /** Clear the bar line. Further advances are ignored. */
  finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.sink.write('\r\x1b[2K');
  }

  /** Render the bar line for the given instant. */
  render(at: number = this.now()): string {
    const ratio = this.total > 0 ? this.current / this.total : 1;
    const filled = Math.floor(ratio * this.width);
    const bar = filled >= this.width
      ? '='.repeat(this.width)
      : '='.repeat(filled) + '>' + '-'.repeat(this.width - filled - 1);

    const elapsed = at - this.startedAt;
    let eta = '';
    if (this.current > 0 && this.current < this.total && elapsed > 0) {
      const remainingMs = (elapsed * (this.total - this.current)) / this.current;
      eta = ` (eta ${Math.ceil(remainingMs / 1000)}s)`;
    }
    return `[${formatElapsed(elapsed)}] ${bar} ${formatBytes(this.current)}/${formatBytes(this.total)}${eta}`;
  }
}
