/**
 * Configuration type definitions for loglyzer.
 * Covers project and global config with cascade resolution.
 */

/** Report formats the renderers can produce. */
export type OutputFormat = 'text' | 'json' | 'csv';

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
  showColor: boolean;
  showProgress: boolean;
}

/** Analysis configuration. */
export interface AnalysisConfig {
  /** Number of top error messages to report (>= 1). */
  topN: number;
  /** Inputs strictly larger than this many bytes are ingested in parallel. */
  parallelThresholdBytes: number;
  /** Inputs of at least this many bytes get a progress bar. */
  progressThresholdBytes: number;
  /** Parallel worker count. 0 = available parallelism. */
  workers: number;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'warn') */
  level: LogLevel;
  /** Rotating log file path; null logs to stderr */
  filePath: string | null;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** loglyzer configuration (config.json). */
export interface LoglyzerConfig {
  output: OutputConfig;
  analysis: AnalysisConfig;
  logging: LoggingConfig;
}

/** Configuration resolution priority. */
export type ConfigSource = 'env' | 'project' | 'global' | 'default';

/** A resolved config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
