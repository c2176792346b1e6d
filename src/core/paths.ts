/**
 * Path resolution for loglyzer configuration.
 *
 * Environment variables:
 *   LOGLYZER_HOME - Global directory (default: ~/.loglyzer)
 *   LOGLYZER_DIR  - Project directory (default: .loglyzer)
 */

import { resolve, join, isAbsolute } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the global loglyzer home directory.
 * Respects LOGLYZER_HOME env var, defaults to ~/.loglyzer.
 */
export function getLoglyzerHome(): string {
  return process.env['LOGLYZER_HOME'] ?? join(homedir(), '.loglyzer');
}

/**
 * Get the absolute path to the project loglyzer directory.
 * Respects LOGLYZER_DIR env var, defaults to "<cwd>/.loglyzer".
 */
export function getProjectDir(cwd?: string): string {
  const dir = process.env['LOGLYZER_DIR'] ?? '.loglyzer';
  if (isAbsolute(dir)) {
    return dir;
  }
  return resolve(cwd ?? process.cwd(), dir);
}

/**
 * Get the path to the project's config.json file.
 */
export function getConfigPath(cwd?: string): string {
  return join(getProjectDir(cwd), 'config.json');
}

/**
 * Get the path to the global config.json file.
 */
export function getGlobalConfigPath(): string {
  return join(getLoglyzerHome(), 'config.json');
}
