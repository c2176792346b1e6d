/**
 * Centralized pino logger factory for loglyzer.
 *
 * Singleton pattern. Writes to stderr by default so stdout stays reserved
 * for the rendered report; uses pino-roll for rotating files when
 * `logging.filePath` is configured.
 * Context via child loggers (getLogger('subsystem')).
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;
let currentLogDir: string | null = null;

/**
 * Convert bytes to a human-readable size string for pino-roll.
 * pino-roll accepts '10m', '1g', '500k', etc.
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

const baseOptions: pino.LoggerOptions = {
  formatters: {
    level: (label: string) => ({ level: label.toUpperCase() }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param config - Logging configuration from LoglyzerConfig.logging
 * @param cwd - Base directory for a relative `filePath`
 * @returns The root pino logger instance
 */
export function initLogger(config: LoggingConfig, cwd: string = process.cwd()): pino.Logger {
  if (!config.filePath) {
    currentLogDir = null;
    rootLogger = pino({ ...baseOptions, level: config.level }, pino.destination(2));
    return rootLogger;
  }

  const dest = resolve(cwd, config.filePath);
  currentLogDir = dirname(dest);
  mkdirSync(currentLogDir, { recursive: true });

  // pino.transport() runs in a worker thread; rotation and retention
  // are handled by pino-roll.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      mkdir: true,
      limit: {
        count: config.maxFiles,
      },
    },
  });

  rootLogger = pino({ ...baseOptions, level: config.level }, transport);
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr fallback logger
 * so library callers and tests never crash.
 *
 * @param subsystem - Logical subsystem name (e.g. 'ingest', 'cli', 'config')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    return pino({ ...baseOptions, level: 'warn' }, pino.destination(2)).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/**
 * Get the directory of the rotating log file, or null when logging to stderr.
 */
export function getLogDir(): string | null {
  return currentLogDir;
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
  currentLogDir = null;
}
