/**
 * Tests for config engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, getConfigValue } from '../config.js';
import { getConfigPath, getGlobalConfigPath } from '../paths.js';
import { ExitCode } from '../../types/exit-codes.js';

const ENV_KEYS = [
  'LOGLYZER_HOME',
  'LOGLYZER_DIR',
  'LOGLYZER_FORMAT',
  'LOGLYZER_TOP',
  'LOGLYZER_COLOR',
  'LOGLYZER_WORKERS',
  'LOGLYZER_LOG_LEVEL',
];

describe('loadConfig', () => {
  let tempDir: string;
  let projectDir: string;
  const saved = new Map<string, string | undefined>();

  beforeEach(async () => {
    for (const key of ENV_KEYS) saved.set(key, process.env[key]);
    for (const key of ENV_KEYS) delete process.env[key];
    tempDir = await mkdtemp(join(tmpdir(), 'loglyzer-config-test-'));
    projectDir = join(tempDir, 'project');
    // Point to a non-existent global config
    process.env['LOGLYZER_HOME'] = join(tempDir, 'global');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    for (const [key, value] of saved) {
      if (value !== undefined) process.env[key] = value;
      else delete process.env[key];
    }
  });

  async function writeConfig(dir: string, data: unknown): Promise<void> {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'config.json'), typeof data === 'string' ? data : JSON.stringify(data));
  }

  it('returns defaults when no config files exist', async () => {
    const config = await loadConfig(projectDir);
    expect(config.output).toEqual({ defaultFormat: 'text', showColor: true, showProgress: true });
    expect(config.analysis).toEqual({
      topN: 5,
      parallelThresholdBytes: 10 * 1024 * 1024,
      progressThresholdBytes: 5 * 1024 * 1024,
      workers: 0,
    });
    expect(config.logging.level).toBe('warn');
    expect(config.logging.filePath).toBeNull();
  });

  it('finds the project config under <cwd>/.loglyzer by default', async () => {
    expect(getConfigPath(projectDir)).toBe(join(projectDir, '.loglyzer', 'config.json'));
    await writeConfig(join(projectDir, '.loglyzer'), { analysis: { topN: 8 } });
    const config = await loadConfig(projectDir);
    expect(config.analysis.topN).toBe(8);
    // Other defaults preserved
    expect(config.analysis.workers).toBe(0);
  });

  it('merges project config over global config', async () => {
    expect(getGlobalConfigPath()).toBe(join(tempDir, 'global', 'config.json'));
    await writeConfig(join(tempDir, 'global'), { output: { defaultFormat: 'csv', showColor: false } });
    await writeConfig(join(projectDir, '.loglyzer'), { output: { defaultFormat: 'json' } });
    const config = await loadConfig(projectDir);
    expect(config.output.defaultFormat).toBe('json');
    expect(config.output.showColor).toBe(false);
  });

  it('environment variables override config files', async () => {
    await writeConfig(join(projectDir, '.loglyzer'), { output: { defaultFormat: 'json' }, analysis: { topN: 8 } });
    process.env['LOGLYZER_FORMAT'] = 'csv';
    process.env['LOGLYZER_TOP'] = '12';
    process.env['LOGLYZER_COLOR'] = 'false';
    process.env['LOGLYZER_LOG_LEVEL'] = 'debug';
    const config = await loadConfig(projectDir);
    expect(config.output.defaultFormat).toBe('csv');
    expect(config.output.showColor).toBe(false);
    expect(config.analysis.topN).toBe(12);
    expect(config.logging.level).toBe('debug');
  });

  it('honors LOGLYZER_DIR', async () => {
    const custom = join(tempDir, 'elsewhere');
    process.env['LOGLYZER_DIR'] = custom;
    await writeConfig(custom, { analysis: { workers: 3 } });
    const config = await loadConfig(projectDir);
    expect(config.analysis.workers).toBe(3);
  });

  it('rejects invalid values with CONFIG_ERROR', async () => {
    await writeConfig(join(projectDir, '.loglyzer'), { output: { defaultFormat: 'xml' } });
    await expect(loadConfig(projectDir)).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
  });

  it('rejects invalid environment values with CONFIG_ERROR', async () => {
    process.env['LOGLYZER_WORKERS'] = '-1';
    await expect(loadConfig(projectDir)).rejects.toMatchObject({
      code: ExitCode.CONFIG_ERROR,
      message: expect.stringContaining('analysis.workers'),
    });
  });

  it('rejects malformed JSON with CONFIG_ERROR', async () => {
    await writeConfig(join(projectDir, '.loglyzer'), '{ not json');
    await expect(loadConfig(projectDir)).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
  });

  it('rejects a config file that is not an object', async () => {
    await writeConfig(join(projectDir, '.loglyzer'), [1, 2]);
    await expect(loadConfig(projectDir)).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
  });

  describe('getConfigValue', () => {
    it('reports the default source', async () => {
      expect(await getConfigValue('analysis.topN', projectDir)).toEqual({ value: 5, source: 'default' });
    });

    it('reports the file a value comes from', async () => {
      await writeConfig(join(tempDir, 'global'), { analysis: { topN: 9 } });
      expect(await getConfigValue('analysis.topN', projectDir)).toEqual({ value: 9, source: 'global' });

      await writeConfig(join(projectDir, '.loglyzer'), { analysis: { topN: 4 } });
      expect(await getConfigValue('analysis.topN', projectDir)).toEqual({ value: 4, source: 'project' });
    });

    it('prefers the environment', async () => {
      process.env['LOGLYZER_TOP'] = '11';
      expect(await getConfigValue('analysis.topN', projectDir)).toEqual({ value: 11, source: 'env' });
    });

    it('returns undefined for unknown keys', async () => {
      expect(await getConfigValue('analysis.nope', projectDir)).toEqual({ value: undefined, source: 'default' });
    });
  });
});
