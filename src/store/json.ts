/**
 * JSON file reads for configuration data.
 */

import { safeReadFile } from './atomic.js';
import { AnalyzerError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    throw new AnalyzerError(
      ExitCode.CONFIG_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
}
