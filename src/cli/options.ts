import { Command, InvalidArgumentError } from 'commander';
import type { CompressorConfig } from '../compressor/types.js';
import { getErrorMessage } from '../utils/errors.js';
import { parseDuration } from '../config/loader.js';

/**
 * Streams a command reads payloads from and writes results to.
 * Defaults to the process streams; tests pass their own.
 */
export interface CommandIO {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
}

export const processIO: CommandIO = {
  stdin: process.stdin,
  stdout: process.stdout,
};

/**
 * Options shared by every command that builds a compressor config
 */
export interface ConfigOptions {
  config?: string;
  timestamp?: string;
  values?: string[];
  groupBy?: string[];
  unique?: string[];
  method?: string;
  window?: number;
  workers?: number;
  allowZeroTimestamp?: boolean;
}

function parseList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function parseWorkers(value: string): number {
  const workers = Number(value);
  if (!Number.isInteger(workers) || workers <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return workers;
}

function parseWindow(value: string): number {
  try {
    return parseDuration(value);
  } catch (error) {
    throw new InvalidArgumentError(getErrorMessage(error));
  }
}

export function addConfigOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to a YAML config file')
    .option('--timestamp <field>', 'Timestamp field name')
    .option('--values <fields>', 'Comma-separated value fields', parseList)
    .option('--group-by <fields>', 'Comma-separated group-by fields', parseList)
    .option('--unique <fields>', 'Comma-separated fields that must match to aggregate', parseList)
    .option('--method <method>', 'Aggregation method: sum, avg, mean, min, max, count, first, last')
    .option('--window <duration>', 'Time window, e.g. 30s, 1m, 1h', parseWindow)
    .option('--workers <count>', 'Maximum payloads compressed at once', parseWorkers)
    .option('--allow-zero-timestamp', 'Accept records whose timestamp is literally 0');
}

export function toOverrides(options: ConfigOptions): Partial<CompressorConfig> {
  return {
    timestampField: options.timestamp,
    valueFields: options.values,
    groupByFields: options.groupBy,
    uniqueFields: options.unique,
    aggregationMethod: options.method,
    timeWindowMs: options.window,
    workers: options.workers,
    allowZeroTimestamp: options.allowZeroTimestamp,
  };
}

/**
 * Log line for one compressed payload
 */
export function formatStats(label: string, inputBytes: number, outputBytes: number, ratio: number): string {
  return `${label}: Compressed ${inputBytes} bytes to ${outputBytes} bytes (${(ratio * 100).toFixed(2)}% reduction)`;
}
