#!/usr/bin/env node
/**
 * loglyzer CLI entry point.
 */

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerConfigCommand } from './commands/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { formatError } from '../core/output.js';

// Centralized pino logger
import { initLogger } from '../core/logger.js';
import { loadConfig } from '../core/config.js';

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  try {
    // src/cli/index.ts and dist/cli/index.js both sit two levels below the root
    const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const CLI_VERSION = getPackageVersion();
const program = new Command();

program
  .name('loglyzer')
  .description('Analyze and filter structured log files')
  .version(CLI_VERSION)
  // Usage errors (bad option values, missing file argument) exit with INVALID_INPUT
  .exitOverride((err: CommanderError) => {
    process.exit(err.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.INVALID_INPUT);
  });

registerAnalyzeCommand(program);
registerConfigCommand(program);

// Initialize centralized pino logger before any command runs.
// Best-effort: if config loading fails here, the command reports it itself.
let loggerInitialized = false;
program.hook('preAction', async () => {
  if (loggerInitialized) return;
  loggerInitialized = true;
  try {
    const config = await loadConfig();
    initLogger(config.logging);
  } catch {
    // Logger init is best-effort; the stderr fallback logger is used
  }
});

try {
  await program.parseAsync();
} catch (err) {
  process.stderr.write(`${formatError(err instanceof Error ? err : new Error(String(err)))}\n`);
  process.exit(ExitCode.GENERAL_ERROR);
}
