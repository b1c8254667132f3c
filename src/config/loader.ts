/**
 * Compressor configuration loading
 * Reads the YAML config file, applies environment and command-line overrides
 * and resolves the result with defaults
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { isAggregationMethod } from '../compressor/aggregate.js';
import { resolveConfig } from '../compressor/config.js';
import type { CompressorConfig } from '../compressor/types.js';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * On-disk config file shape. Every key is optional; keys this tool does not
 * know (such as a transport section) are ignored.
 */
const configFileSchema = z.object({
  timestamp: z.string().nullish(),
  values: z.array(z.string()).nullish(),
  groupby: z.array(z.string()).nullish(),
  unique: z.array(z.string()).nullish(),
  method: z.string().nullish(),
  window: z.union([z.string(), z.number()]).nullish(),
  workers: z.number().int().nullish(),
  allow_zero_timestamp: z.boolean().nullish(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface LoadConfigOptions {
  /** Path to a YAML config file */
  path?: string;
  /** Values given on the command line; these win over everything else */
  overrides?: Partial<CompressorConfig>;
  env?: NodeJS.ProcessEnv;
}

const DURATION_UNITS_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION_PATTERN = /^([+-])?(?:(?:\d+(?:\.\d*)?|\.\d+)(?:ns|us|µs|μs|ms|s|m|h))+$/;
const DURATION_PART = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/g;
const PLAIN_NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse a duration into milliseconds.
 *
 * Accepts unit strings such as '90s', '1m', '1h30m' or '250ms'. A bare
 * number (or numeric string) is a count of seconds.
 */
export function parseDuration(input: string | number, source?: string): number {
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new ConfigurationError(`Invalid duration: ${input}`, source);
    }
    return input * 1000;
  }

  const text = input.trim();
  if (PLAIN_NUMBER.test(text)) {
    return Number(text) * 1000;
  }

  const match = DURATION_PATTERN.exec(text);
  if (!match) {
    throw new ConfigurationError(`Invalid duration: "${input}"`, source);
  }

  let total = 0;
  for (const [, amount, unit] of text.matchAll(DURATION_PART)) {
    total += Number(amount) * DURATION_UNITS_MS[unit];
  }
  return match[1] === '-' ? -total : total;
}

function fileToConfig(file: ConfigFile, source: string): Partial<CompressorConfig> {
  return {
    timestampField: file.timestamp ?? undefined,
    valueFields: file.values ?? undefined,
    groupByFields: file.groupby ?? undefined,
    uniqueFields: file.unique ?? undefined,
    aggregationMethod: file.method ?? undefined,
    timeWindowMs: file.window != null ? parseDuration(file.window, source) : undefined,
    workers: file.workers ?? undefined,
    allowZeroTimestamp: file.allow_zero_timestamp ?? undefined,
  };
}

/**
 * Read and validate a YAML config file
 * @returns The settings it names; unset keys are undefined
 */
export async function loadConfigFile(path: string): Promise<Partial<CompressorConfig>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file: ${getErrorMessage(error)}`, path);
  }

  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML: ${getErrorMessage(error)}`, path);
  }

  const parsed = configFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config: ${details}`, path);
  }

  logger.debug(`Loaded config file ${path}`);
  return fileToConfig(parsed.data, path);
}

function splitList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

/**
 * Settings taken from TS_COMPRESSOR_* environment variables
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<CompressorConfig> {
  const config: {
    -readonly [K in keyof CompressorConfig]?: CompressorConfig[K];
  } = {};

  if (env.TS_COMPRESSOR_TIMESTAMP) {
    config.timestampField = env.TS_COMPRESSOR_TIMESTAMP;
  }
  if (env.TS_COMPRESSOR_VALUES) {
    config.valueFields = splitList(env.TS_COMPRESSOR_VALUES);
  }
  if (env.TS_COMPRESSOR_GROUP_BY) {
    config.groupByFields = splitList(env.TS_COMPRESSOR_GROUP_BY);
  }
  if (env.TS_COMPRESSOR_UNIQUE) {
    config.uniqueFields = splitList(env.TS_COMPRESSOR_UNIQUE);
  }
  if (env.TS_COMPRESSOR_METHOD) {
    config.aggregationMethod = env.TS_COMPRESSOR_METHOD;
  }
  if (env.TS_COMPRESSOR_WINDOW) {
    config.timeWindowMs = parseDuration(env.TS_COMPRESSOR_WINDOW, 'TS_COMPRESSOR_WINDOW');
  }
  if (env.TS_COMPRESSOR_WORKERS) {
    const workers = Number(env.TS_COMPRESSOR_WORKERS);
    if (Number.isInteger(workers)) {
      config.workers = workers;
    } else {
      logger.warn(`Ignoring TS_COMPRESSOR_WORKERS=${env.TS_COMPRESSOR_WORKERS}: not an integer`);
    }
  }

  return config;
}

/**
 * Load the compressor configuration
 * Priority: command-line overrides > environment variables > config file > defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CompressorConfig> {
  const fileLayer: Partial<CompressorConfig> = options.path ? await loadConfigFile(options.path) : {};
  const envLayer = readEnvConfig(options.env ?? process.env);
  const overrides: Partial<CompressorConfig> = options.overrides ?? {};

  const pick = <K extends keyof CompressorConfig>(key: K): CompressorConfig[K] | undefined =>
    overrides[key] ?? envLayer[key] ?? fileLayer[key];

  const config = resolveConfig({
    timestampField: pick('timestampField'),
    valueFields: pick('valueFields'),
    groupByFields: pick('groupByFields'),
    uniqueFields: pick('uniqueFields'),
    aggregationMethod: pick('aggregationMethod'),
    timeWindowMs: pick('timeWindowMs'),
    workers: pick('workers'),
    allowZeroTimestamp: pick('allowZeroTimestamp'),
  });

  if (!isAggregationMethod(config.aggregationMethod)) {
    logger.warn(`Unknown aggregation method "${config.aggregationMethod}", aggregating as sum`);
  }
  return config;
}
