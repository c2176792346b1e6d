/**
 * loglyzer - parse, filter and summarize timestamped log files.
 */

// Types
export { ExitCode } from './types/exit-codes.js';
export type { LoglyzerConfig, OutputFormat } from './types/config.js';

// Core
export { AnalyzerError } from './core/errors.js';
export { formatError } from './core/output.js';
export { loadConfig, getConfigValue } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';

// Analysis
export {
  analyzeLogFile,
  validateTopN,
  DEFAULT_TOP_N,
  parseLogLine,
  parseLogLines,
  parseTimestamp,
  formatTimestamp,
  readLogLines,
  selectIngestionMode,
  shouldShowProgress,
  createIngestionStrategy,
  SequentialIngestion,
  ParallelIngestion,
  PARALLEL_THRESHOLD_BYTES,
  PROGRESS_THRESHOLD_BYTES,
  createParsePool,
  filterEntries,
  matchesFilter,
  aggregate,
  LOG_LEVELS,
} from './core/analysis/index.js';
export type {
  AnalyzeOptions,
  AnalysisOutcome,
  AnalysisTimings,
  LogLevel,
  LogEntry,
  LogFilter,
  LogStats,
  ErrorFrequency,
  IngestionMode,
  IngestionResult,
  IngestionStrategy,
  ParsePool,
} from './core/analysis/index.js';

// Progress
export { ProgressBar } from './core/ui/progress.js';
export type { ProgressReporter } from './core/ui/progress.js';

// Rendering
export { renderReport, renderText, renderJson, renderCsv } from './cli/renderers/index.js';
