/**
 * CLI config command - inspect the resolved configuration.
 */

import { Command } from 'commander';
import { formatError } from '../../core/output.js';
import { AnalyzerError } from '../../core/errors.js';
import { loadConfig, getConfigValue } from '../../core/config.js';
import { getConfigPath, getGlobalConfigPath } from '../../core/paths.js';

async function runConfigAction(action: () => Promise<string>): Promise<void> {
  try {
    console.log(await action());
  } catch (err) {
    if (err instanceof AnalyzerError) {
      console.error(formatError(err));
      process.exit(err.code);
    }
    throw err;
  }
}

/**
 * Render a single resolved value: `<key> = <json> (<source>)`.
 */
export async function describeConfigValue(key: string, cwd?: string): Promise<string> {
  const resolved = await getConfigValue(key, cwd);
  return `${key} = ${JSON.stringify(resolved.value) ?? 'undefined'} (${resolved.source})`;
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Inspect configuration');

  config
    .command('get <key>')
    .description('Get a configuration value and where it comes from')
    .action(async (key: string) => {
      await runConfigAction(() => describeConfigValue(key));
    });

  config
    .command('show')
    .description('Show the merged configuration')
    .action(async () => {
      await runConfigAction(async () => JSON.stringify(await loadConfig(), null, 2));
    });

  config
    .command('path')
    .description('Show the project and global config file locations')
    .action(async () => {
      await runConfigAction(async () => `project: ${getConfigPath()}\nglobal:  ${getGlobalConfigPath()}`);
    });
}
