/**
 * Log file access: size lookup and streaming line reads.
 *
 * Lines are split on "\n"; trailing "\r"/"\n" characters are stripped, so
 * both LF and CRLF files read the same. A final line without terminator is
 * yielded; a trailing newline does not produce an extra empty line. Empty
 * lines in the middle are yielded as "" (they count as unparsable).
 */

import { open, stat, type FileHandle } from 'node:fs/promises';
import { StringDecoder } from 'node:string_decoder';
import { AnalyzerError, isErrnoException } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

const TRAILING_TERMINATORS = /[\r\n]+$/;

/**
 * Map a filesystem error to an AnalyzerError.
 * ENOENT becomes NOT_FOUND; everything else is a generic FILE_ERROR.
 */
export function classifyIoError(err: unknown, filePath: string): AnalyzerError {
  if (err instanceof AnalyzerError) return err;
  if (isErrnoException(err) && err.code === 'ENOENT') {
    return new AnalyzerError(ExitCode.NOT_FOUND, `Log file not found: ${filePath}`, {
      fix: 'Check the path of the log file',
      cause: err,
    });
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new AnalyzerError(ExitCode.FILE_ERROR, `Cannot read log file ${filePath}: ${reason}`, {
    cause: err,
  });
}

/**
 * Size of the log file in bytes.
 */
export async function getLogFileSize(filePath: string): Promise<number> {
  try {
    const info = await stat(filePath);
    return info.size;
  } catch (err) {
    throw classifyIoError(err, filePath);
  }
}

/** Options for readLogLines(). */
export interface ReadLinesOptions {
  /** Called with the byte length of every chunk read from disk */
  onBytes?: (bytes: number) => void;
}

/**
 * Stream the lines of a log file without loading it into memory.
 * Open and read failures are rethrown through classifyIoError().
 */
export async function* readLogLines(
  filePath: string,
  options?: ReadLinesOptions,
): AsyncGenerator<string> {
  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (err) {
    throw classifyIoError(err, filePath);
  }

  // Split by hand: readline would also break on a bare "\r", which must stay in the message
  const stream = handle.createReadStream();
  const decoder = new StringDecoder('utf8');
  let pending = '';

  try {
    for await (const chunk of stream) {
      if (!Buffer.isBuffer(chunk)) continue;
      options?.onBytes?.(chunk.length);
      pending += decoder.write(chunk);

      let start = 0;
      let idx: number;
      while ((idx = pending.indexOf('\n', start)) >= 0) {
        yield pending.slice(start, idx).replace(TRAILING_TERMINATORS, '');
        start = idx + 1;
      }
      pending = pending.slice(start);
    }
  } catch (err) {
    throw classifyIoError(err, filePath);
  } finally {
    stream.destroy();
  }

  pending += decoder.end();
  if (pending.length > 0) {
    yield pending.replace(TRAILING_TERMINATORS, '');
  }
}
