/**
 * Configuration engine for loglyzer.
 *
 * Resolution priority: CLI flags > Environment vars > Project config > Global config > Defaults
 * CLI flags are applied by the command layer on top of loadConfig().
 */

import { z } from 'zod';
import type { LoglyzerConfig, ConfigSource, ResolvedValue } from '../types/config.js';
import { readJson } from '../store/json.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';
import { AnalyzerError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

const MIB = 1024 * 1024;

/** Default configuration values. */
const DEFAULTS: LoglyzerConfig = {
  output: {
    defaultFormat: 'text',
    showColor: true,
    showProgress: true,
  },
  analysis: {
    topN: 5,
    parallelThresholdBytes: 10 * MIB,
    progressThresholdBytes: 5 * MIB,
    workers: 0,
  },
  logging: {
    level: 'warn',
    filePath: null,
    maxFileSize: 10 * MIB,
    maxFiles: 5,
  },
};

/** Schema for the fully merged configuration. */
export const LoglyzerConfigSchema = z.object({
  output: z.object({
    defaultFormat: z.enum(['text', 'json', 'csv']),
    showColor: z.boolean(),
    showProgress: z.boolean(),
  }),
  analysis: z.object({
    topN: z.number().int().min(1),
    parallelThresholdBytes: z.number().int().min(0),
    progressThresholdBytes: z.number().int().min(0),
    workers: z.number().int().min(0),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1).nullable(),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
}) satisfies z.ZodType<LoglyzerConfig>;

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'LOGLYZER_FORMAT': 'output.defaultFormat',
  'LOGLYZER_COLOR': 'output.showColor',
  'LOGLYZER_PROGRESS': 'output.showProgress',
  'LOGLYZER_TOP': 'analysis.topN',
  'LOGLYZER_PARALLEL_THRESHOLD': 'analysis.parallelThresholdBytes',
  'LOGLYZER_WORKERS': 'analysis.workers',
  'LOGLYZER_LOG_LEVEL': 'logging.level',
  'LOGLYZER_LOG_FILE': 'logging.filePath',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/**
 * Read a config file, insisting on a JSON object at the top level.
 */
async function readConfigFile(filePath: string): Promise<Record<string, unknown> | null> {
  const raw = await readJson(filePath);
  if (raw === null) return null;
  if (!isRecord(raw)) {
    throw new AnalyzerError(
      ExitCode.CONFIG_ERROR,
      `Config file must contain a JSON object: ${filePath}`,
    );
  }
  return raw;
}

/** Deep copy of the defaults as a plain record. */
function defaultsRecord(): Record<string, unknown> {
  const copy: unknown = JSON.parse(JSON.stringify(DEFAULTS));
  return isRecord(copy) ? copy : {};
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<LoglyzerConfig> {
  let merged = defaultsRecord();

  // Layer 1: Global config
  const globalConfig = await readConfigFile(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  // Layer 2: Project config
  const projectConfig = await readConfigFile(getConfigPath(cwd));
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  // Layer 3: Environment variables
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  const result = LoglyzerConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : result.error.message;
    throw new AnalyzerError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration (${where})`,
      {
        fix: `Check ${getConfigPath(cwd)}, ${getGlobalConfigPath()} and LOGLYZER_* variables`,
        cause: result.error,
      },
    );
  }
  return result.data;
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(
  path: string,
  cwd?: string,
): Promise<ResolvedValue<unknown>> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, Record<string, unknown> | null]> = [
    ['project', await readConfigFile(getConfigPath(cwd))],
    ['global', await readConfigFile(getGlobalConfigPath())],
  ];
  for (const [source, config] of layers) {
    if (!config) continue;
    const val = getNestedValue(config, path);
    if (val !== undefined) {
      return { value: val, source };
    }
  }

  return { value: getNestedValue(defaultsRecord(), path), source: 'default' };
}
