/**
 * loglyzer error type with exit code integration.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/**
 * Structured error class for loglyzer operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class AnalyzerError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'AnalyzerError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix ? { fix: this.fix } : {}),
      },
    };
  }
}

/** Narrow an unknown thrown value to a Node errno exception. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
