import type { CompressorConfig } from './types.js';
import { DEFAULT_COMPRESSOR_CONFIG } from './types.js';

/**
 * Fill every zero-valued setting with its default.
 *
 * Empty strings, empty lists, a zero window and a non-positive worker count
 * count as unset. Never throws; resolving a resolved config returns an equal
 * config. The result is frozen.
 */
export function resolveConfig(config: Partial<CompressorConfig> = {}): CompressorConfig {
  const workers = config.workers ?? 0;

  return Object.freeze({
    timestampField: config.timestampField || DEFAULT_COMPRESSOR_CONFIG.timestampField,
    valueFields: Object.freeze(
      config.valueFields && config.valueFields.length > 0
        ? [...config.valueFields]
        : [...DEFAULT_COMPRESSOR_CONFIG.valueFields]
    ),
    groupByFields: Object.freeze([...(config.groupByFields ?? [])]),
    uniqueFields: Object.freeze([...(config.uniqueFields ?? [])]),
    aggregationMethod: config.aggregationMethod || DEFAULT_COMPRESSOR_CONFIG.aggregationMethod,
    timeWindowMs: config.timeWindowMs || DEFAULT_COMPRESSOR_CONFIG.timeWindowMs,
    workers: Number.isInteger(workers) && workers > 0 ? workers : DEFAULT_COMPRESSOR_CONFIG.workers,
    allowZeroTimestamp: config.allowZeroTimestamp ?? DEFAULT_COMPRESSOR_CONFIG.allowZeroTimestamp,
  });
}
