/**
 * CLI analyze command - parse, filter and summarize a log file.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';
import { analyzeLogFile, parseTimestamp } from '../../core/analysis/index.js';
import type { LogFilter } from '../../core/analysis/index.js';
import { loadConfig } from '../../core/config.js';
import { AnalyzerError } from '../../core/errors.js';
import { formatError } from '../../core/output.js';
import { getLogger } from '../../core/logger.js';
import { ProgressBar } from '../../core/ui/progress.js';
import { atomicWrite } from '../../store/atomic.js';
import { OUTPUT_FORMATS, resolveFormat } from '../middleware/output-format.js';
import { NO_MATCHES_MESSAGE, colorSupported, renderReport } from '../renderers/index.js';

/** Where the command writes; process streams by default. */
export interface CliIO {
  stdout: { write(chunk: string): boolean; isTTY?: boolean };
  stderr: { write(chunk: string): boolean; isTTY?: boolean };
}

const processIO: CliIO = {
  stdout: process.stdout,
  stderr: process.stderr,
};

/** Parsed analyze flags, as commander hands them over. */
export const AnalyzeFlagsSchema = z.object({
  errorsOnly: z.boolean().optional(),
  search: z.string().optional(),
  top: z.number().int().min(1).optional(),
  since: z.date().optional(),
  until: z.date().optional(),
  format: z.enum(['text', 'json', 'csv']).optional(),
  output: z.string().min(1).optional(),
  parallel: z.boolean().optional(),
  progress: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type AnalyzeFlags = z.infer<typeof AnalyzeFlagsSchema>;

/**
 * Commander parser for --top: a positive integer.
 */
export function parseTopOption(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('--top must be a positive integer.');
  }
  const n = Number(value);
  if (n < 1) {
    throw new InvalidArgumentError('--top must be at least 1.');
  }
  return n;
}

/**
 * Commander parser for --since / --until.
 */
export function parseDateTimeOption(value: string): Date {
  const date = parseTimestamp(value);
  if (!date) {
    throw new InvalidArgumentError('Expected format: YYYY-MM-DD HH:MM:SS.');
  }
  return date;
}

async function writeResult(content: string, output: string | undefined, io: CliIO): Promise<void> {
  if (output) {
    await atomicWrite(output, `${content}\n`);
    io.stdout.write(`Results written to ${output}\n`);
  } else {
    io.stdout.write(`${content}\n`);
  }
}

/**
 * Run the analysis for one file and write the report.
 * Throws AnalyzerError for missing files, I/O and configuration problems.
 */
export async function runAnalyze(
  file: string,
  flags: AnalyzeFlags,
  io: CliIO = processIO,
  cwd?: string,
): Promise<void> {
  const log = getLogger('cli');
  const config = await loadConfig(cwd);
  const topN = flags.top ?? config.analysis.topN;
  const { format } = resolveFormat(flags.format, config.output.defaultFormat);
  const showProgress = config.output.showProgress && flags.progress !== false && io.stderr.isTTY === true;

  const filter: LogFilter = {
    errorsOnly: flags.errorsOnly,
    search: flags.search,
    since: flags.since,
    until: flags.until,
  };

  const outcome = await analyzeLogFile(file, {
    filter,
    topN,
    forceParallel: flags.parallel,
    parallelThresholdBytes: config.analysis.parallelThresholdBytes,
    progressThresholdBytes: config.analysis.progressThresholdBytes,
    workers: config.analysis.workers,
    createProgress: (total) => (showProgress ? new ProgressBar(total, io.stderr) : undefined),
    onStart: ({ sizeBytes, mode }) => {
      if (flags.verbose) {
        io.stderr.write(`Reading ${file} (${sizeBytes} bytes) in ${mode} mode\n`);
      }
    },
  });

  if (outcome.kind === 'no-matches') {
    await writeResult(NO_MATCHES_MESSAGE, flags.output, io);
  } else {
    const color = flags.output === undefined && config.output.showColor && colorSupported(io.stdout);
    const rendered = renderReport(outcome.stats, format, { topN, color });
    await writeResult(rendered, flags.output, io);
  }

  log.debug({ file, format, kind: outcome.kind }, 'analyze finished');

  if (flags.verbose) {
    const { parseMs, analysisMs, totalMs } = outcome.timings;
    io.stderr.write(
      `Performance: parse=${parseMs.toFixed(1)}ms, analysis=${analysisMs.toFixed(1)}ms, total=${totalMs.toFixed(1)}ms\n`,
    );
  }
}

/**
 * Register the analyze command (the default command).
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze', { isDefault: true })
    .description('Analyze and filter a log file')
    .argument('<file>', 'Log file to analyze')
    .option('--errors-only', 'Keep only ERROR entries')
    .option('--search <text>', 'Case-insensitive text to search for in each entry')
    .option('--top <n>', 'Number of most frequent errors to show', parseTopOption)
    .option('--since <datetime>', 'Keep entries from this date/time on (YYYY-MM-DD HH:MM:SS)', parseDateTimeOption)
    .option('--until <datetime>', 'Keep entries up to this date/time (YYYY-MM-DD HH:MM:SS)', parseDateTimeOption)
    .addOption(new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS))
    .option('--output <file>', 'Write the result to a file instead of stdout')
    .option('--parallel', 'Force parallel ingestion whatever the file size')
    .option('--no-progress', 'Never show the progress bar')
    .option('--verbose', 'Show mode and timing information on stderr')
    .action(async (file: string, opts: Record<string, unknown>) => {
      try {
        await runAnalyze(file, AnalyzeFlagsSchema.parse(opts));
      } catch (err) {
        if (err instanceof AnalyzerError) {
          console.error(formatError(err));
          process.exit(err.code);
        }
        throw err;
      }
    });
}
